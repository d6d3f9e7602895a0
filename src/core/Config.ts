import type { EngineSettings, ReviewRules, StepPolicy } from "../types.js"

export const DEFAULT_MAX_RETRIES = 2
export const DEFAULT_MAX_REVIEW_CYCLES = 2
export const DEFAULT_AGENT_TIMEOUT_MS = 120_000
export const DEFAULT_REVIEW_TIMEOUT_MS = 30_000
export const DEFAULT_PERSISTENCE_DIR = ".stepwright"

export const DEFAULT_REVIEW_RULES: ReviewRules = {
    coverageThreshold: 80,
    maxFileSize: 1_000_000,
    maxFunctionLength: 50,
    severityThreshold: "error",
}

/**
 * Resolve the retry and review bounds for a step type. Per-type
 * overrides from configuration win over the handler's defaults, which
 * win over the engine-wide settings.
 */
export function resolveStepPolicy(
    stepType: string,
    settings: EngineSettings,
    handlerDefaults: Partial<StepPolicy> = {}
): StepPolicy {
    const override = settings.stepPolicies?.[stepType] ?? {}
    return {
        maxRetries:
            override.maxRetries ??
            handlerDefaults.maxRetries ??
            settings.maxRetries ??
            DEFAULT_MAX_RETRIES,
        maxReviewCycles:
            override.maxReviewCycles ??
            handlerDefaults.maxReviewCycles ??
            settings.maxReviewCycles ??
            DEFAULT_MAX_REVIEW_CYCLES,
    }
}

export function getAgentTimeout(settings: EngineSettings): number {
    return settings.agentTimeoutMs ?? DEFAULT_AGENT_TIMEOUT_MS
}

export function getReviewTimeout(settings: EngineSettings): number {
    return settings.reviewTimeoutMs ?? DEFAULT_REVIEW_TIMEOUT_MS
}
