import type { RendererType } from "../types.js"
import { LogRenderer } from "./LogRenderer.js"
import type { CreateRendererOptions, Renderer } from "./types.js"

export function createRenderer(
    type: RendererType,
    options?: CreateRendererOptions
): Renderer | null {
    switch (type) {
        case "log":
            return new LogRenderer(options)
        case "none":
            return null
    }
}

export { LogRenderer } from "./LogRenderer.js"
export type { CreateRendererOptions, Renderer } from "./types.js"
