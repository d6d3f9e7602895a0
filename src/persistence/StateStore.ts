import { z } from "zod"

import { ConcurrentRunError, StepwrightError } from "../core/errors.js"
import { jsonObjectSchema } from "../core/json.js"
import { log } from "../core/Logger.js"
import type { WorkflowState } from "../types.js"
import type { FileStore } from "./FileStore.js"

/**
 * Exclusive right to write one run's state. Obtained from
 * `StateStore.claim` and released when the run ends.
 */
export interface WriteLease {
    readonly runId: string
    save(state: WorkflowState): Promise<void>
    release(): void
}

export interface StateStore {
    /** Fails with `ConcurrentRunError` while another lease is held. */
    claim(runId: string): WriteLease
    load(runId: string): Promise<WorkflowState | null>
    list(): Promise<string[]>
}

/** Tracks lease holders so each run id has at most one writer. */
abstract class LeasedStore implements StateStore {
    private readonly holders: Set<string> = new Set()

    public claim(runId: string): WriteLease {
        if (this.holders.has(runId)) throw new ConcurrentRunError(runId)
        this.holders.add(runId)
        log.store("Claimed run %s", runId)
        let released = false
        return {
            runId,
            save: (state: WorkflowState): Promise<void> => {
                if (released) {
                    return Promise.reject(
                        new StepwrightError(
                            `Lease for run ${runId} was released`,
                            "LEASE_RELEASED"
                        )
                    )
                }
                return this.persist(runId, state)
            },
            release: (): void => {
                if (released) return
                released = true
                this.holders.delete(runId)
                log.store("Released run %s", runId)
            },
        }
    }

    public abstract load(runId: string): Promise<WorkflowState | null>
    public abstract list(): Promise<string[]>
    protected abstract persist(runId: string, state: WorkflowState): Promise<void>
}

export class MemoryStateStore extends LeasedStore {
    private readonly states: Map<string, string> = new Map()

    public load(runId: string): Promise<WorkflowState | null> {
        const raw = this.states.get(runId)
        return Promise.resolve(raw ? parseState(JSON.parse(raw), runId) : null)
    }

    public list(): Promise<string[]> {
        return Promise.resolve([...this.states.keys()].sort())
    }

    protected persist(runId: string, state: WorkflowState): Promise<void> {
        this.states.set(runId, JSON.stringify(state))
        return Promise.resolve()
    }
}

export class FileStateStore extends LeasedStore {
    private readonly store: FileStore

    constructor(store: FileStore) {
        super()
        this.store = store
    }

    public async load(runId: string): Promise<WorkflowState | null> {
        const raw = await this.store.read(`runs/${runId}`)
        return raw === null ? null : parseState(raw, runId)
    }

    public async list(): Promise<string[]> {
        const keys = await this.store.list("runs")
        return keys.map((key) => key.slice("runs/".length))
    }

    protected persist(runId: string, state: WorkflowState): Promise<void> {
        return this.store.write(`runs/${runId}`, state)
    }
}

const issueSchema = z.object({
    rule: z.string(),
    location: z.string(),
    severity: z.enum(["info", "warning", "error", "critical"]),
    message: z.string(),
    suggestedFix: z.string().optional(),
})

const outcomeSchema = z.object({
    reviewType: z.string(),
    approved: z.boolean(),
    feedback: z.array(issueSchema),
    requiredFixes: z.array(issueSchema),
})

const recordSchema = z.object({
    stepIndex: z.number().int(),
    stepId: z.string(),
    stepType: z.string(),
    agent: z.string(),
    attempt: z.number().int(),
    phase: z.enum(["initial", "retry", "remediation"]),
    status: z.enum(["succeeded", "failed", "review_failed"]),
    output: jsonObjectSchema,
    request: jsonObjectSchema,
    error: z
        .object({ kind: z.string(), message: z.string(), retryable: z.boolean() })
        .optional(),
    reviewFeedback: z.array(issueSchema).optional(),
    review: outcomeSchema.optional(),
})

const stateSchema = z.object({
    runId: z.string(),
    definitionName: z.string(),
    status: z.enum(["running", "succeeded", "failed", "aborted"]),
    currentStepIndex: z.number().int().min(0),
    steps: z.array(recordSchema),
    context: jsonObjectSchema,
    failure: z
        .object({
            stepIndex: z.number().int(),
            stepId: z.string(),
            kind: z.string(),
            message: z.string(),
        })
        .optional(),
    lastReview: outcomeSchema.optional(),
    recoveryOptions: z
        .array(
            z.object({
                action: z.enum(["retry-step", "skip-step", "abort-run"]),
                stepIndex: z.number().int(),
                description: z.string(),
            })
        )
        .optional(),
    resumedFrom: z.string().optional(),
    startedAt: z.string(),
    updatedAt: z.string(),
    completedAt: z.string().optional(),
})

/** Check the shape of a stored state before a run is resumed from it. */
export function parseState(raw: unknown, runId: string): WorkflowState {
    const parsed = stateSchema.safeParse(raw)
    if (!parsed.success) {
        throw new StepwrightError(
            `Stored state for run ${runId} is malformed: ${parsed.error.issues[0]?.message ?? "unknown issue"}`,
            "CORRUPT_STATE"
        )
    }
    return parsed.data
}
