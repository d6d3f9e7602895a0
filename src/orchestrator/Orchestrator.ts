import { randomUUID } from "node:crypto"

import type { AgentRegistry } from "../agents/Agent.js"
import {
    getAgentTimeout,
    getReviewTimeout,
    resolveStepPolicy,
} from "../core/Config.js"
import {
    DefinitionError,
    RunExistsError,
    RunNotFoundError,
    StepwrightError,
    TimeoutError,
    WorkflowValidationError,
    toError,
    type ValidationReport,
} from "../core/errors.js"
import { log } from "../core/Logger.js"
import { withTimeout } from "../core/timeout.js"
import { EventBus } from "../events/EventBus.js"
import {
    MemoryStateStore,
    type StateStore,
    type WriteLease,
} from "../persistence/StateStore.js"
import { ReviewGate } from "../review/ReviewGate.js"
import { EMPTY_RULE_SET } from "../rules/DomainRules.js"
import type {
    EngineSettings,
    JsonObject,
    RecoveryAction,
    RecoveryOption,
    ReviewOutcome,
    RunContext,
    RunFailure,
    RunReport,
    RuleSet,
    StepError,
    StepPhase,
    StepResult,
    StepSpec,
    WorkflowDefinition,
    WorkflowState,
} from "../types.js"
import { StepExecutor, issueToJson } from "../workflow/StepExecutor.js"
import { StepTypeRegistry } from "../workflow/stepTypes.js"
import { stepLabel, validateDefinition } from "../workflow/validate.js"
import { RunStateManager } from "./RunStateManager.js"

export interface OrchestratorConfig {
    agents: AgentRegistry
    reviewGate?: ReviewGate
    stepTypes?: StepTypeRegistry
    rules?: RuleSet
    store?: StateStore
    eventBus?: EventBus
    settings?: EngineSettings
}

export interface RunOptions {
    runId?: string
    /** Observed between steps; the run then ends as `aborted`. */
    signal?: AbortSignal
}

export interface ResumeOptions extends RunOptions {
    action: Exclude<RecoveryAction, "abort-run">
}

type StepOutcome =
    | { kind: "succeeded"; output: JsonObject }
    | { kind: "failed"; failure: RunFailure; lastReview?: ReviewOutcome }
    | { kind: "aborted" }

interface StepRun {
    manager: RunStateManager
    step: StepSpec
    index: number
    context: RunContext
    signal?: AbortSignal
}

/**
 * Drives workflow runs. An instance holds only read-only collaborators,
 * so independent runs may execute on it concurrently; each run owns its
 * own state, context and write lease.
 */
export class Orchestrator {
    private readonly agents: AgentRegistry
    private readonly reviewGate: ReviewGate
    private readonly stepTypes: StepTypeRegistry
    private readonly rules: RuleSet
    private readonly store: StateStore
    private readonly eventBus: EventBus
    private readonly settings: EngineSettings
    private readonly executor: StepExecutor

    constructor(config: OrchestratorConfig) {
        this.agents = config.agents
        this.reviewGate = config.reviewGate ?? new ReviewGate()
        this.stepTypes = config.stepTypes ?? new StepTypeRegistry()
        this.rules = config.rules ?? EMPTY_RULE_SET
        this.store = config.store ?? new MemoryStateStore()
        this.eventBus = config.eventBus ?? new EventBus()
        this.settings = config.settings ?? {}
        this.executor = new StepExecutor(
            this.agents,
            getAgentTimeout(this.settings)
        )
    }

    public getEventBus(): EventBus {
        return this.eventBus
    }

    public getStore(): StateStore {
        return this.store
    }

    public validate(
        definition: WorkflowDefinition,
        initialInput: JsonObject = {},
        fromIndex = 0
    ): ValidationReport {
        return validateDefinition(
            definition,
            {
                agents: this.agents,
                stepTypes: this.stepTypes,
                reviewGate: this.reviewGate,
            },
            Object.keys(initialInput),
            fromIndex
        )
    }

    public async run(
        definition: WorkflowDefinition,
        initialInput: JsonObject = {},
        options: RunOptions = {}
    ): Promise<WorkflowState> {
        this.assertValid(this.validate(definition, initialInput))

        const lease = await this.claimNewRun(options.runId)
        try {
            const manager = await RunStateManager.create(lease, {
                definitionName: definition.name,
                context: initialInput,
            })
            return await this.drive(definition, manager, 0, options.signal)
        } finally {
            lease.release()
        }
    }

    /** Stored runs are never overwritten; a new run needs an unused id. */
    private async claimNewRun(runId: string = randomUUID()): Promise<WriteLease> {
        const lease = this.store.claim(runId)
        try {
            if (await this.store.load(runId)) throw new RunExistsError(runId)
        } catch (error) {
            lease.release()
            throw error
        }
        return lease
    }

    /**
     * Continue a failed or aborted run in a new run. The stored context
     * and records carry over; `skip-step` moves past an optional step.
     */
    public async resume(
        previousRunId: string,
        definition: WorkflowDefinition,
        options: ResumeOptions
    ): Promise<WorkflowState> {
        const previous = await this.store.load(previousRunId)
        if (!previous) throw new RunNotFoundError(previousRunId)
        if (previous.status !== "failed" && previous.status !== "aborted") {
            throw new StepwrightError(
                `Run ${previousRunId} is ${previous.status} and cannot be resumed`,
                "NOT_RESUMABLE"
            )
        }
        if (previous.definitionName !== definition.name) {
            throw new StepwrightError(
                `Run ${previousRunId} belongs to workflow "${previous.definitionName}", not "${definition.name}"`,
                "DEFINITION_MISMATCH"
            )
        }

        let startIndex = previous.currentStepIndex
        if (options.action === "skip-step") {
            const step = definition.steps[startIndex]
            if (!step?.optional) {
                throw new StepwrightError(
                    `Step ${startIndex} of "${definition.name}" is not optional and cannot be skipped`,
                    "NOT_SKIPPABLE"
                )
            }
            startIndex++
        }

        this.assertValid(this.validate(definition, previous.context, startIndex))

        const lease = await this.claimNewRun(options.runId)
        try {
            const manager = await RunStateManager.create(lease, {
                definitionName: definition.name,
                context: previous.context,
                startIndex,
                priorSteps: previous.steps,
                resumedFrom: previousRunId,
            })
            if (options.action === "skip-step") {
                const skipped = startIndex - 1
                this.eventBus.emit({
                    type: "step:skipped",
                    runId: manager.runId,
                    stepIndex: skipped,
                    stepId: stepLabel(
                        skipped,
                        definition.steps[skipped].type,
                        definition.steps[skipped].id
                    ),
                })
            }
            return await this.drive(
                definition,
                manager,
                startIndex,
                options.signal
            )
        } finally {
            lease.release()
        }
    }

    private assertValid(report: ValidationReport): void {
        if (!report.valid) {
            log.engine(
                "Workflow %s rejected: %o",
                report.workflow,
                report.issues.map((issue) => issue.code)
            )
            throw new WorkflowValidationError(report)
        }
    }

    private async drive(
        definition: WorkflowDefinition,
        manager: RunStateManager,
        startIndex: number,
        signal?: AbortSignal
    ): Promise<WorkflowState> {
        const runId = manager.runId
        const context: RunContext = new Map(
            Object.entries(manager.snapshot().context)
        )
        const startedAt = Date.now()
        const resumedFrom = manager.snapshot().resumedFrom

        log.engine(
            "Run %s of %s starting at step %d",
            runId,
            definition.name,
            startIndex
        )
        this.eventBus.emit({
            type: "run:start",
            runId,
            workflowName: definition.name,
            totalSteps: definition.steps.length,
            resumedFrom,
        })

        for (let index = startIndex; index < definition.steps.length; index++) {
            const step = definition.steps[index]
            const outcome = await this.runStep({
                manager,
                step,
                index,
                context,
                signal,
            })

            if (outcome.kind === "aborted") {
                await this.abortRun(manager, definition, index)
                return this.complete(manager, startedAt)
            }
            if (outcome.kind === "failed") {
                log.engine(
                    "Run %s failed at step %d: %s",
                    runId,
                    index,
                    outcome.failure.message
                )
                await manager.finish("failed", {
                    failure: outcome.failure,
                    lastReview: outcome.lastReview,
                    recoveryOptions: recoveryOptionsFor(step, index),
                })
                return this.complete(manager, startedAt)
            }

            for (const [key, value] of Object.entries(outcome.output)) {
                context.set(key, value)
            }
            await manager.advance(index + 1, Object.fromEntries(context))
        }

        await manager.finish("succeeded")
        return this.complete(manager, startedAt)
    }

    private async abortRun(
        manager: RunStateManager,
        definition: WorkflowDefinition,
        index: number
    ): Promise<void> {
        log.engine("Run %s aborted before step %d", manager.runId, index)
        this.eventBus.emit({
            type: "run:aborted",
            runId: manager.runId,
            stepIndex: index,
        })
        const step = definition.steps[index]
        await manager.finish("aborted", {
            recoveryOptions: [
                {
                    action: "retry-step",
                    stepIndex: index,
                    description: `Resume the run from step ${index} (${step.type})`,
                },
                {
                    action: "abort-run",
                    stepIndex: index,
                    description: "Leave the run aborted",
                },
            ],
        })
    }

    private complete(
        manager: RunStateManager,
        startedAt: number
    ): WorkflowState {
        const state = manager.snapshot()
        this.eventBus.emit({
            type: "run:complete",
            runId: state.runId,
            status: state.status,
            duration: Date.now() - startedAt,
        })
        return state
    }

    /**
     * Attempt one step until it succeeds, exhausts its retries or review
     * cycles, or the run is cancelled. Every attempt appends a record.
     */
    private async runStep(run: StepRun): Promise<StepOutcome> {
        const { manager, step, index, context, signal } = run
        const stepId = stepLabel(index, step.type, step.id)
        const handler = this.stepTypes.resolve(step.type)
        const policy = resolveStepPolicy(step.type, this.settings, handler.policy)

        let attempt = 0
        let retries = 0
        let cycles = 0
        let phase: StepPhase = "initial"
        let extraParams: JsonObject | undefined
        let lastReview: ReviewOutcome | undefined

        for (;;) {
            if (signal?.aborted) return { kind: "aborted" }

            attempt++
            this.eventBus.emit({
                type: "step:start",
                runId: manager.runId,
                stepIndex: index,
                stepId,
                stepType: step.type,
                agent: step.agent,
                attempt,
                phase,
            })
            const started = Date.now()

            let result = await this.executeStep(step, context, {
                runId: manager.runId,
                stepIndex: index,
                signal,
                extraParams,
            })
            if (result.status === "succeeded" && step.requireReview) {
                result = await this.reviewStep(manager.runId, index, step, result, cycles)
            }

            await manager.append({
                ...result,
                stepIndex: index,
                stepId,
                stepType: step.type,
                agent: step.agent,
                attempt,
                phase,
            })
            this.eventBus.emit({
                type: "step:complete",
                runId: manager.runId,
                stepIndex: index,
                stepId,
                status: result.status,
                duration: Date.now() - started,
                error: result.error,
            })

            if (result.status === "succeeded") {
                return { kind: "succeeded", output: result.output }
            }

            if (result.status === "failed") {
                const error: StepError = result.error ?? {
                    kind: "unknown",
                    message: "Step failed without an error",
                    retryable: false,
                }
                if (signal?.aborted) return { kind: "aborted" }
                if (error.retryable && retries < policy.maxRetries) {
                    retries++
                    phase = "retry"
                    log.engine(
                        "Retrying %s (%d/%d): %s",
                        stepId,
                        retries,
                        policy.maxRetries,
                        error.message
                    )
                    this.eventBus.emit({
                        type: "step:retry",
                        runId: manager.runId,
                        stepIndex: index,
                        stepId,
                        attempt: retries,
                        maxRetries: policy.maxRetries,
                        reason: error.message,
                    })
                    continue
                }
                return {
                    kind: "failed",
                    failure: {
                        stepIndex: index,
                        stepId,
                        kind: error.kind,
                        message: error.message,
                    },
                    lastReview,
                }
            }

            // review_failed: either the gate or a reviewing agent rejected
            const review: ReviewOutcome = result.review ?? {
                reviewType: step.type,
                approved: false,
                feedback: result.reviewFeedback ?? [],
                requiredFixes: result.reviewFeedback ?? [],
            }
            lastReview = review

            if (result.review && handler.remediable && cycles < policy.maxReviewCycles) {
                cycles++
                phase = "remediation"
                extraParams = {
                    required_fixes: review.requiredFixes.map(issueToJson),
                }
                this.eventBus.emit({
                    type: "remediation:start",
                    runId: manager.runId,
                    stepIndex: index,
                    cycle: cycles,
                    maxCycles: policy.maxReviewCycles,
                    fixCount: review.requiredFixes.length,
                })
                continue
            }

            const reason = !result.review
                ? `rejected by agent ${step.agent}`
                : handler.remediable
                  ? `review cycles exhausted after ${cycles} remediation(s)`
                  : "step type is not remediable"
            return {
                kind: "failed",
                failure: {
                    stepIndex: index,
                    stepId,
                    kind: "review_rejected",
                    message: `${review.reviewType} review rejected ${stepId} with ${review.requiredFixes.length} required fix(es); ${reason}`,
                },
                lastReview,
            }
        }
    }

    /** Definition errors surfacing at run time become failed results. */
    private async executeStep(
        step: StepSpec,
        context: RunContext,
        options: {
            runId: string
            stepIndex: number
            signal?: AbortSignal
            extraParams?: JsonObject
        }
    ): Promise<StepResult> {
        try {
            return await this.executor.execute(step, context, options)
        } catch (error) {
            const err = toError(error)
            return {
                status: "failed",
                output: {},
                request: { action: step.type },
                error: {
                    kind:
                        err instanceof DefinitionError
                            ? err.code.toLowerCase()
                            : "executor_error",
                    message: err.message,
                    retryable: false,
                },
            }
        }
    }

    private async reviewStep(
        runId: string,
        stepIndex: number,
        step: StepSpec,
        result: StepResult,
        cycle: number
    ): Promise<StepResult> {
        const reviewType = step.reviewType ?? ""
        this.eventBus.emit({
            type: "review:start",
            runId,
            stepIndex,
            reviewType,
            cycle,
        })
        let review: ReviewOutcome
        try {
            review = await withTimeout(
                () => this.reviewGate.review(reviewType, result.output, this.rules),
                getReviewTimeout(this.settings),
                `Review "${reviewType}"`
            )
        } catch (error) {
            const err = toError(error)
            return {
                status: "failed",
                output: {},
                request: result.request,
                error: {
                    kind:
                        err instanceof TimeoutError
                            ? "review_timeout"
                            : err instanceof DefinitionError
                              ? err.code.toLowerCase()
                              : "review_error",
                    message: err.message,
                    retryable: err instanceof TimeoutError,
                },
            }
        }
        this.eventBus.emit({
            type: "review:complete",
            runId,
            stepIndex,
            reviewType,
            approved: review.approved,
            issueCount: review.feedback.length,
            requiredFixCount: review.requiredFixes.length,
        })
        if (review.approved) return { ...result, review }
        return {
            status: "review_failed",
            output: result.output,
            request: result.request,
            reviewFeedback: review.feedback,
            review,
        }
    }
}

export function recoveryOptionsFor(
    step: StepSpec,
    index: number
): RecoveryOption[] {
    const options: RecoveryOption[] = [
        {
            action: "retry-step",
            stepIndex: index,
            description: `Resume the run and retry step ${index} (${step.type})`,
        },
    ]
    if (step.optional) {
        options.push({
            action: "skip-step",
            stepIndex: index,
            description: `Resume the run after skipping optional step ${index} (${step.type})`,
        })
    }
    options.push({
        action: "abort-run",
        stepIndex: index,
        description: "Leave the run failed",
    })
    return options
}

export function toRunReport(state: WorkflowState): RunReport {
    const ended = state.status === "failed" || state.status === "aborted"
    return {
        runId: state.runId,
        status: state.status,
        steps: state.steps,
        partialResults: ended ? state.steps : [],
        recoveryOptions: state.recoveryOptions,
        failure: state.failure,
        lastReview: state.lastReview,
    }
}
