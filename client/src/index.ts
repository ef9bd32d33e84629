import ExternalLinksBehavior from "./behaviors/external_links";
import { NEW_BROWSING_CONTEXT } from "./links";

export { isExternal, markExternalLinks, NEW_BROWSING_CONTEXT } from "./links";
export type { MarkOptions } from "./links";

export type ExternalLinksOptions = {
  hostname?: string;
  target?: string;
  rel?: string;
  debug?: boolean;
};

type InitializeOptions = {
  hostname: string;
  target: string;
  rel?: string;
  debug: boolean;
};

class ExternalLinks {
  private hostname: string;
  private target: string;
  private rel?: string;
  private debug: boolean;

  public static initialize(options: ExternalLinksOptions = {}): ExternalLinks {
    const target = options.target ?? NEW_BROWSING_CONTEXT;

    if (options.hostname !== undefined && !options.hostname) {
      throw new Error("Invalid hostname");
    }

    // file:// previews and about:blank frames have no hostname; every hosted link is external there
    const hostname = options.hostname ?? window.location.hostname;

    if (!target) {
      throw new Error("Invalid target");
    }

    return new ExternalLinks({
      hostname,
      target,
      rel: options.rel,
      debug: options.debug ?? false,
    });
  }

  private constructor(options: InitializeOptions) {
    this.hostname = options.hostname;
    this.target = options.target;
    this.rel = options.rel;
    this.debug = options.debug;
  }

  public start(): void {
    new ExternalLinksBehavior(this.hostname, {
      target: this.target,
      rel: this.rel,
      debug: this.debug,
    });
  }
}

export default ExternalLinks;
