import { markExternalLinks } from "../links"

export type BehaviorOptions = {
    target: string
    rel?: string
    debug: boolean
}

class ExternalLinksBehavior {
    private hostname: string
    private options: BehaviorOptions

    constructor(hostname: string, options: BehaviorOptions) {
        this.hostname = hostname
        this.options = options

        if (document.readyState === "loading") {
            document.addEventListener("DOMContentLoaded", this.handleReady.bind(this), { once: true })
        } else {
            this.handleReady()
        }
    }

    handleReady(): void {
        // inline SVG <a> elements match too
        const anchors = Array.from(document.querySelectorAll<Element>("a")).filter(
            (anchor): anchor is HTMLAnchorElement => anchor instanceof HTMLAnchorElement
        )
        const marked = markExternalLinks(anchors, this.hostname, { target: this.options.target, rel: this.options.rel })

        if (this.options.debug) {
            console.log(`External links marked: ${marked}`)
        }
    }
}

export default ExternalLinksBehavior
