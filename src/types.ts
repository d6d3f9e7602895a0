export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue }

export type JsonObject = { [key: string]: JsonValue }

/** Built-in step type tags. Custom tags can be registered at startup. */
export type BuiltinStepType =
    | "design_architecture"
    | "analyze_structure"
    | "validate_deployment"
    | "create_component"
    | "update_component"
    | "implement_feature"
    | "fix_issue"
    | "review_code"
    | "verify_fix"

export type BuiltinReviewType =
    | "domain_validation"
    | "security"
    | "coverage"
    | "code_review"

export type RunStatus = "running" | "succeeded" | "failed" | "aborted"

export type StepStatus = "succeeded" | "failed" | "review_failed"

export type StepPhase = "initial" | "retry" | "remediation"

export type Severity = "info" | "warning" | "error" | "critical"

export type NamingConvention =
    | "PascalCase"
    | "camelCase"
    | "kebab-case"
    | "snake_case"

export type RecoveryAction = "retry-step" | "skip-step" | "abort-run"

export interface StepSpec {
    id?: string
    type: string
    agent: string
    params: JsonObject
    requireReview: boolean
    reviewType?: string
    outputs: string[]
    optional?: boolean
}

export interface WorkflowDefinition {
    name: string
    description?: string
    steps: readonly StepSpec[]
}

export type RunContext = Map<string, JsonValue>

export interface StepError {
    kind: string
    message: string
    retryable: boolean
}

export interface ReviewIssue {
    rule: string
    location: string
    severity: Severity
    message: string
    suggestedFix?: string
}

export interface ReviewOutcome {
    reviewType: string
    approved: boolean
    feedback: ReviewIssue[]
    requiredFixes: ReviewIssue[]
}

export interface StepResult {
    status: StepStatus
    output: JsonObject
    request: JsonObject
    error?: StepError
    reviewFeedback?: ReviewIssue[]
    review?: ReviewOutcome
}

export interface StepRecord extends StepResult {
    stepIndex: number
    stepId: string
    stepType: string
    agent: string
    attempt: number
    phase: StepPhase
}

export interface RunFailure {
    stepIndex: number
    stepId: string
    kind: string
    message: string
}

export interface RecoveryOption {
    action: RecoveryAction
    stepIndex: number
    description: string
}

export interface WorkflowState {
    runId: string
    definitionName: string
    status: RunStatus
    currentStepIndex: number
    steps: StepRecord[]
    context: JsonObject
    failure?: RunFailure
    lastReview?: ReviewOutcome
    recoveryOptions?: RecoveryOption[]
    resumedFrom?: string
    startedAt: string
    updatedAt: string
    completedAt?: string
}

export interface RunReport {
    runId: string
    status: RunStatus
    steps: StepRecord[]
    partialResults: StepRecord[]
    recoveryOptions?: RecoveryOption[]
    failure?: RunFailure
    lastReview?: ReviewOutcome
}

export interface DomainRules {
    directories: string[]
    extensions: string[]
    naming: {
        components?: NamingConvention
        files?: NamingConvention
        modules?: NamingConvention
    }
    requireTests: boolean
    maxFileSize?: number
    maxFunctionLength?: number
    /** Packages a project in this domain is expected to declare. */
    dependencies?: string[]
}

export interface ReviewRules {
    coverageThreshold: number
    maxFileSize: number
    maxFunctionLength: number
    severityThreshold: Severity
}

export interface RuleSet {
    domains: Record<string, DomainRules>
    review: ReviewRules
}

export interface FileChange {
    path: string
    content: string
}

export interface StepPolicy {
    maxRetries: number
    maxReviewCycles: number
}

export type RendererType = "log" | "none"

export interface EngineSettings {
    maxRetries?: number
    maxReviewCycles?: number
    agentTimeoutMs?: number
    reviewTimeoutMs?: number
    stepPolicies?: Record<string, Partial<StepPolicy>>
}

export interface StepwrightConfig extends EngineSettings {
    workingDirectory: string
    persistencePath?: string
    renderer?: RendererType
    verbose?: boolean
    outputDirectory?: string
}
