import chalk, { Chalk, type ChalkInstance } from "chalk"

import type { EventBus } from "../events/EventBus.js"
import type { StepwrightEvent } from "../events/types.js"
import type { RunStatus, StepStatus } from "../types.js"
import type { CreateRendererOptions, Renderer } from "./types.js"

export interface LogRendererOptions extends CreateRendererOptions {
    /** Force colors off, e.g. when the output is parsed. */
    color?: boolean
}

export class LogRenderer implements Renderer {
    private readonly verbose: boolean
    private readonly write: (line: string) => void
    private readonly paint: ChalkInstance
    private unsubscribe: (() => void) | null = null
    private startedAt = 0

    constructor(options: LogRendererOptions = {}) {
        this.verbose = options.verbose ?? false
        this.write =
            options.write ?? ((line: string): void => void process.stdout.write(`${line}\n`))
        this.paint = options.color === false ? new Chalk({ level: 0 }) : chalk
    }

    public attach(bus: EventBus): void {
        this.detach()
        this.unsubscribe = bus.on((event) => this.handleEvent(event))
    }

    public detach(): void {
        this.unsubscribe?.()
        this.unsubscribe = null
    }

    private handleEvent(event: StepwrightEvent): void {
        const line = this.formatEvent(event)
        if (line) {
            this.write(`${this.paint.dim(`[${this.formatElapsed()}]`)} ${line}`)
        }
    }

    private formatElapsed(): string {
        if (!this.startedAt) this.startedAt = Date.now()
        const seconds = (Date.now() - this.startedAt) / 1000
        const minutes = Math.floor(seconds / 60)
        const secs = (seconds % 60).toFixed(1)
        return `${String(minutes).padStart(2, "0")}:${secs.padStart(4, "0")}`
    }

    public formatEvent(event: StepwrightEvent): string | null {
        const c = this.paint
        switch (event.type) {
            case "run:start": {
                const resumed = event.resumedFrom
                    ? `  resumed from ${event.resumedFrom.slice(0, 8)}`
                    : ""
                return `${c.bold("run:start")}       ${event.workflowName}  ${event.runId.slice(0, 8)}  ${event.totalSteps} step(s)${resumed}`
            }
            case "run:complete":
                return `${c.bold("run:done")}        ${this.runStatus(event.status)}  ${formatDuration(event.duration)}`
            case "run:aborted":
                return `${c.yellow("run:aborted")}     before step ${event.stepIndex}`
            case "step:start":
                if (!this.verbose && event.phase === "initial") return null
                return `step:start      ${pad(event.stepId)}  ${event.agent}  attempt ${event.attempt}  ${event.phase}`
            case "step:complete": {
                const error = event.error ? `  ${c.dim(`${event.error.kind}: ${truncate(event.error.message, 60)}`)}` : ""
                return `step:complete   ${pad(event.stepId)}  ${this.stepStatus(event.status)}  ${formatDuration(event.duration)}${error}`
            }
            case "step:retry":
                return `${c.yellow("step:retry")}      ${pad(event.stepId)}  retry ${event.attempt}/${event.maxRetries}  "${truncate(event.reason, 60)}"`
            case "step:skipped":
                return `${c.yellow("step:skipped")}    ${pad(event.stepId)}`
            case "review:start":
                if (!this.verbose) return null
                return `review:start    step ${event.stepIndex}  ${event.reviewType}  cycle ${event.cycle}`
            case "review:complete":
                return `review:done     step ${event.stepIndex}  ${event.reviewType}  ${event.approved ? c.green("approved") : c.red("rejected")}  ${event.issueCount} issue(s), ${event.requiredFixCount} required`
            case "remediation:start":
                return `${c.magenta("remediation")}     step ${event.stepIndex}  cycle ${event.cycle}/${event.maxCycles}  ${event.fixCount} fix(es)`
        }
    }

    private runStatus(status: RunStatus): string {
        switch (status) {
            case "succeeded":
                return this.paint.green(status)
            case "failed":
                return this.paint.red(status)
            case "aborted":
                return this.paint.yellow(status)
            case "running":
                return this.paint.blue(status)
        }
    }

    private stepStatus(status: StepStatus): string {
        switch (status) {
            case "succeeded":
                return this.paint.green(status)
            case "failed":
                return this.paint.red(status)
            case "review_failed":
                return this.paint.yellow(status)
        }
    }
}

function pad(str: string): string {
    return str.padEnd(16)
}

function truncate(str: string, maxLen: number): string {
    if (str.length <= maxLen) return str
    return str.slice(0, maxLen - 1) + "…"
}

export function formatDuration(ms: number): string {
    const seconds = ms / 1000
    if (seconds < 60) return `${seconds.toFixed(1)}s`
    const minutes = Math.floor(seconds / 60)
    const remainingSeconds = Math.round(seconds % 60)
    return `${minutes}m${String(remainingSeconds).padStart(2, "0")}s`
}
