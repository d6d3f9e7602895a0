import type { AgentRegistry } from "../agents/Agent.js"
import { DEFAULT_AGENT_TIMEOUT_MS } from "../core/Config.js"
import { AgentFailure, TimeoutError, toError } from "../core/errors.js"
import { isJsonObject, jsonObjectSchema } from "../core/json.js"
import { log } from "../core/Logger.js"
import { withTimeout } from "../core/timeout.js"
import type {
    JsonObject,
    ReviewIssue,
    RunContext,
    StepError,
    StepResult,
    StepSpec,
} from "../types.js"
import { formatZodError } from "./definitions.js"
import { resolveParams } from "./references.js"

export interface ExecuteOptions {
    runId?: string
    stepIndex?: number
    signal?: AbortSignal
    timeoutMs?: number
    /** Appended to the request after params, e.g. `required_fixes`. */
    extraParams?: JsonObject
}

export function issueToJson(issue: ReviewIssue): JsonObject {
    const json: JsonObject = {
        rule: issue.rule,
        location: issue.location,
        severity: issue.severity,
        message: issue.message,
    }
    if (issue.suggestedFix !== undefined) json.suggested_fix = issue.suggestedFix
    return json
}

/**
 * Build the request an agent receives for a step: the action tag, the
 * params with context references substituted, then any extra params.
 * Throws `UnresolvedReferenceError` when a referenced key is missing.
 */
export function buildRequest(
    step: StepSpec,
    context: RunContext,
    extraParams: JsonObject = {}
): JsonObject {
    return {
        action: step.type,
        ...resolveParams(step.params, context),
        ...extraParams,
    }
}

export function classifyFailure(error: unknown): StepError {
    if (error instanceof AgentFailure) return error.toStepError()
    if (error instanceof TimeoutError) {
        return { kind: "timeout", message: error.message, retryable: true }
    }
    const err = toError(error)
    if (err.name === "AbortError") {
        return { kind: "aborted", message: err.message, retryable: false }
    }
    return { kind: "agent_error", message: err.message, retryable: false }
}

/**
 * Runs one step. Stateless: the same step, context and a pure agent
 * always yield an equal `StepResult`, so retries can call it again.
 */
export class StepExecutor {
    private readonly agents: AgentRegistry
    private readonly defaultTimeoutMs: number

    constructor(agents: AgentRegistry, defaultTimeoutMs = DEFAULT_AGENT_TIMEOUT_MS) {
        this.agents = agents
        this.defaultTimeoutMs = defaultTimeoutMs
    }

    public async execute(
        step: StepSpec,
        context: RunContext,
        options: ExecuteOptions = {}
    ): Promise<StepResult> {
        const agent = this.agents.resolve(step.agent)
        const request = buildRequest(step, context, options.extraParams)
        const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs

        const controller = new AbortController()
        const forwardAbort = (): void => controller.abort(options.signal?.reason)
        if (options.signal?.aborted) forwardAbort()
        options.signal?.addEventListener("abort", forwardAbort, { once: true })

        let response: unknown
        try {
            response = await withTimeout(
                () =>
                    agent.process(request, {
                        runId: options.runId ?? "",
                        stepIndex: options.stepIndex ?? 0,
                        signal: controller.signal,
                    }),
                timeoutMs,
                `Agent "${step.agent}" (${step.type})`
            )
        } catch (error) {
            if (error instanceof TimeoutError) controller.abort(error)
            return this.failureResult(step, request, error)
        } finally {
            options.signal?.removeEventListener("abort", forwardAbort)
        }

        if (!isJsonObject(response)) {
            return this.invalidResponse(step, request, "a non-object response")
        }
        let body: JsonObject
        try {
            const parsed = jsonObjectSchema.safeParse(response)
            if (!parsed.success) {
                return this.invalidResponse(
                    step,
                    request,
                    `a response that is not JSON (${formatZodError(parsed.error)})`
                )
            }
            body = parsed.data
        } catch (error) {
            // cyclic structures overflow the schema walk
            return this.invalidResponse(
                step,
                request,
                `a response that is not JSON (${toError(error).message})`
            )
        }

        const output: JsonObject = {}
        const missing: string[] = []
        for (const key of step.outputs) {
            if (Object.hasOwn(body, key)) {
                output[key] = body[key]
            } else {
                missing.push(key)
            }
        }
        if (missing.length > 0) {
            return {
                status: "failed",
                output: {},
                request,
                error: {
                    kind: "missing_output",
                    message: `Agent "${step.agent}" did not produce declared output(s): ${missing.join(", ")}`,
                    retryable: false,
                },
            }
        }

        log.executor(
            "%s via %s succeeded with outputs [%s]",
            step.type,
            step.agent,
            Object.keys(output).join(", ")
        )
        return { status: "succeeded", output, request }
    }

    private invalidResponse(
        step: StepSpec,
        request: JsonObject,
        what: string
    ): StepResult {
        return {
            status: "failed",
            output: {},
            request,
            error: {
                kind: "invalid_response",
                message: `Agent "${step.agent}" returned ${what}`,
                retryable: false,
            },
        }
    }

    private failureResult(
        step: StepSpec,
        request: JsonObject,
        error: unknown
    ): StepResult {
        if (error instanceof AgentFailure && error.feedback) {
            log.executor("%s via %s rejected: %s", step.type, step.agent, error.message)
            return {
                status: "review_failed",
                output: {},
                request,
                reviewFeedback: error.feedback,
            }
        }
        const stepError = classifyFailure(error)
        log.executor(
            "%s via %s failed (%s, retryable=%s): %s",
            step.type,
            step.agent,
            stepError.kind,
            stepError.retryable,
            stepError.message
        )
        return { status: "failed", output: {}, request, error: stepError }
    }
}
