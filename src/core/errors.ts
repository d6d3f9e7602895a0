import type { ReviewIssue, StepError } from "../types.js"

export class StepwrightError extends Error {
    public readonly code: string
    public override readonly cause?: Error

    constructor(message: string, code: string, cause?: Error) {
        super(message)
        this.name = "StepwrightError"
        this.code = code
        this.cause = cause
    }
}

/** Raised by static validation; a run with definition errors never starts. */
export class DefinitionError extends StepwrightError {
    constructor(message: string, code: string) {
        super(message, code)
        this.name = "DefinitionError"
    }
}

export class UnknownAgentError extends DefinitionError {
    public readonly agent: string

    constructor(agent: string) {
        super(`Unknown agent: ${agent}`, "UNKNOWN_AGENT")
        this.name = "UnknownAgentError"
        this.agent = agent
    }
}

export class UnknownStepTypeError extends DefinitionError {
    public readonly stepType: string

    constructor(stepType: string) {
        super(`Unknown step type: ${stepType}`, "UNKNOWN_STEP_TYPE")
        this.name = "UnknownStepTypeError"
        this.stepType = stepType
    }
}

export class UnknownReviewTypeError extends DefinitionError {
    public readonly reviewType: string

    constructor(reviewType: string) {
        super(`Unknown review type: ${reviewType}`, "UNKNOWN_REVIEW_TYPE")
        this.name = "UnknownReviewTypeError"
        this.reviewType = reviewType
    }
}

export class UnresolvedReferenceError extends DefinitionError {
    public readonly key: string

    constructor(key: string) {
        super(`Unresolved context reference: ${key}`, "UNRESOLVED_REFERENCE")
        this.name = "UnresolvedReferenceError"
        this.key = key
    }
}

export interface ValidationIssue {
    code: string
    message: string
    location: string
}

export interface ValidationReport {
    workflow: string
    valid: boolean
    issues: ValidationIssue[]
}

export class WorkflowValidationError extends StepwrightError {
    public readonly report: ValidationReport

    constructor(report: ValidationReport) {
        const first = report.issues[0]
        super(
            `Workflow "${report.workflow}" failed validation with ${report.issues.length} issue(s)${first ? `: ${first.message}` : ""}`,
            "VALIDATION_FAILED"
        )
        this.name = "WorkflowValidationError"
        this.report = report
    }
}

/**
 * Structured failure an agent rejects with. `retryable` drives the
 * orchestrator's retry policy.
 */
export class AgentFailure extends StepwrightError {
    public readonly kind: string
    public readonly retryable: boolean
    public readonly feedback?: ReviewIssue[]

    constructor(
        kind: string,
        message: string,
        options: { retryable?: boolean; feedback?: ReviewIssue[]; cause?: Error } = {}
    ) {
        super(message, "AGENT_FAILURE", options.cause)
        this.name = "AgentFailure"
        this.kind = kind
        this.retryable = options.retryable ?? false
        this.feedback = options.feedback
    }

    public toStepError(): StepError {
        return {
            kind: this.kind,
            message: this.message,
            retryable: this.retryable,
        }
    }
}

export class TimeoutError extends StepwrightError {
    public readonly timeoutMs: number

    constructor(operation: string, timeoutMs: number) {
        super(`${operation} timed out after ${timeoutMs}ms`, "TIMEOUT")
        this.name = "TimeoutError"
        this.timeoutMs = timeoutMs
    }
}

/** A programming defect inside the engine, never a user-facing outcome. */
export class InvariantError extends StepwrightError {
    constructor(message: string) {
        super(message, "INVARIANT_VIOLATION")
        this.name = "InvariantError"
    }
}

export class ConfigError extends StepwrightError {
    constructor(message: string, cause?: Error) {
        super(message, "CONFIG_ERROR", cause)
        this.name = "ConfigError"
    }
}

export class ConcurrentRunError extends StepwrightError {
    public readonly runId: string

    constructor(runId: string) {
        super(`Run ${runId} already has an active writer`, "CONCURRENT_RUN")
        this.name = "ConcurrentRunError"
        this.runId = runId
    }
}

export class RunNotFoundError extends StepwrightError {
    public readonly runId: string

    constructor(runId: string) {
        super(`Run ${runId} not found`, "RUN_NOT_FOUND")
        this.name = "RunNotFoundError"
        this.runId = runId
    }
}

export class RunExistsError extends StepwrightError {
    public readonly runId: string

    constructor(runId: string) {
        super(`Run ${runId} already exists`, "RUN_EXISTS")
        this.name = "RunExistsError"
        this.runId = runId
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value))
}
