import type { EventBus } from "../events/EventBus.js"

export interface CreateRendererOptions {
    verbose?: boolean
    /** Defaults to stdout. */
    write?: (line: string) => void
}

export interface Renderer {
    attach(bus: EventBus): void
    detach(): void
}
