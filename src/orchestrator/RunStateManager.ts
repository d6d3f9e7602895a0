import { InvariantError } from "../core/errors.js"
import type { WriteLease } from "../persistence/StateStore.js"
import type {
    JsonObject,
    ReviewOutcome,
    RecoveryOption,
    RunFailure,
    RunStatus,
    StepRecord,
    WorkflowState,
} from "../types.js"

export interface CreateStateOptions {
    definitionName: string
    context: JsonObject
    startIndex?: number
    priorSteps?: StepRecord[]
    resumedFrom?: string
}

export interface FinishDetails {
    failure?: RunFailure
    lastReview?: ReviewOutcome
    recoveryOptions?: RecoveryOption[]
}

/**
 * Owns one run's `WorkflowState`. Every mutation is persisted through
 * the run's write lease before the call resolves.
 */
export class RunStateManager {
    private readonly lease: WriteLease
    private readonly state: WorkflowState

    private constructor(lease: WriteLease, state: WorkflowState) {
        this.lease = lease
        this.state = state
    }

    public static async create(
        lease: WriteLease,
        options: CreateStateOptions
    ): Promise<RunStateManager> {
        const now = new Date().toISOString()
        const manager = new RunStateManager(lease, {
            runId: lease.runId,
            definitionName: options.definitionName,
            status: "running",
            currentStepIndex: options.startIndex ?? 0,
            steps: [...(options.priorSteps ?? [])],
            context: { ...options.context },
            resumedFrom: options.resumedFrom,
            startedAt: now,
            updatedAt: now,
        })
        await manager.persist()
        return manager
    }

    public get runId(): string {
        return this.state.runId
    }

    public get status(): RunStatus {
        return this.state.status
    }

    /** A detached copy; later mutations do not show through. */
    public snapshot(): WorkflowState {
        return structuredClone(this.state)
    }

    public async append(record: StepRecord): Promise<void> {
        this.assertRunning("append a step record")
        this.state.steps.push(record)
        await this.persist()
    }

    public async advance(nextIndex: number, context: JsonObject): Promise<void> {
        this.assertRunning("advance")
        if (nextIndex <= this.state.currentStepIndex) {
            throw new InvariantError(
                `Run ${this.state.runId} cannot move from step ${this.state.currentStepIndex} to ${nextIndex}`
            )
        }
        this.state.currentStepIndex = nextIndex
        this.state.context = { ...context }
        await this.persist()
    }

    public async finish(
        status: Exclude<RunStatus, "running">,
        details: FinishDetails = {}
    ): Promise<void> {
        this.assertRunning(`transition to ${status}`)
        this.state.status = status
        this.state.failure = details.failure
        this.state.lastReview = details.lastReview
        this.state.recoveryOptions = details.recoveryOptions
        this.state.completedAt = new Date().toISOString()
        await this.persist()
    }

    private assertRunning(action: string): void {
        if (this.state.status !== "running") {
            throw new InvariantError(
                `Run ${this.state.runId} is ${this.state.status}; cannot ${action}`
            )
        }
    }

    private async persist(): Promise<void> {
        this.state.updatedAt = new Date().toISOString()
        await this.lease.save(this.state)
    }
}
