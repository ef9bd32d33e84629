export type MarkOptions = {
  target?: string;
  rel?: string;
};

export const NEW_BROWSING_CONTEXT = "_blank";

const MAILTO = /^mailto:/;
const JAVASCRIPT = /^javascript:/;

export function isExternal(anchor: HTMLAnchorElement, hostname: string): boolean {
  const href = anchor.getAttribute("href");

  if (!href) {
    return false;
  }

  if (MAILTO.test(anchor.href) || JAVASCRIPT.test(anchor.href)) {
    return false;
  }

  // tel:, data: and hrefs the parser could not resolve carry no host
  if (!anchor.hostname) {
    return false;
  }

  return anchor.hostname !== hostname;
}

/**
 * Points every external anchor at a new browsing context. Anchors that are
 * not external are left untouched. Returns how many anchors were marked.
 */
export function markExternalLinks(
  anchors: Iterable<HTMLAnchorElement>,
  hostname: string,
  options: MarkOptions = {},
): number {
  const target = options.target ?? NEW_BROWSING_CONTEXT;
  let marked = 0;

  for (const anchor of anchors) {
    if (!isExternal(anchor, hostname)) {
      continue;
    }

    anchor.setAttribute("target", target);

    if (options.rel) {
      anchor.setAttribute("rel", options.rel);
    }

    marked++;
  }

  return marked;
}
