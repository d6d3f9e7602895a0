import { EventEmitter } from "node:events"

import type { StepwrightEvent } from "./types.js"

type EventHandler = (event: StepwrightEvent) => void

export class EventBus {
    private readonly emitter: EventEmitter = new EventEmitter()

    /** Subscribe to every event. Returns the matching unsubscribe. */
    public on(handler: EventHandler): () => void {
        this.emitter.on("event", handler)
        return () => this.off(handler)
    }

    public emit(event: StepwrightEvent): void {
        this.emitter.emit("event", event)
    }

    public off(handler: EventHandler): void {
        this.emitter.off("event", handler)
    }
}
