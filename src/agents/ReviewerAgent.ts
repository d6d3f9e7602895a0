import { AgentFailure, UnknownReviewTypeError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import { ReviewGate } from "../review/ReviewGate.js"
import { EMPTY_RULE_SET } from "../rules/DomainRules.js"
import type { JsonObject, ReviewOutcome, RuleSet } from "../types.js"
import { issueToJson } from "../workflow/StepExecutor.js"
import type { Agent, AgentContext } from "./Agent.js"

const DEFAULT_REVIEW_TYPES: Record<string, string> = {
    review_code: "code_review",
    verify_fix: "domain_validation",
}

export interface ReviewerAgentOptions {
    name?: string
    gate?: ReviewGate
}

/**
 * Runs a review checker over the files in its request. The checker
 * comes from `review_type`, or from the action when the param is absent.
 * A rejection fails the step with the required fixes as feedback.
 */
export class ReviewerAgent implements Agent {
    public readonly name: string
    private readonly rules: RuleSet
    private readonly gate: ReviewGate

    constructor(rules: RuleSet = EMPTY_RULE_SET, options: ReviewerAgentOptions = {}) {
        this.name = options.name ?? "reviewer"
        this.rules = rules
        this.gate = options.gate ?? new ReviewGate()
    }

    public async process(
        request: JsonObject,
        context: AgentContext
    ): Promise<JsonObject> {
        const action = typeof request.action === "string" ? request.action : ""
        const fallback = Object.hasOwn(DEFAULT_REVIEW_TYPES, action)
            ? DEFAULT_REVIEW_TYPES[action]
            : undefined
        if (!fallback) {
            throw new AgentFailure(
                "unsupported_action",
                `${this.name} cannot handle action "${action}"`
            )
        }
        const reviewType =
            typeof request.review_type === "string" ? request.review_type : fallback

        let outcome: ReviewOutcome
        try {
            outcome = await this.gate.review(reviewType, request, this.rules)
        } catch (error) {
            if (error instanceof UnknownReviewTypeError) {
                throw new AgentFailure("unknown_review_type", error.message, {
                    cause: error,
                })
            }
            throw error
        }
        log.agents(
            "%s %s via %s for run %s: %s",
            this.name,
            action,
            reviewType,
            context.runId,
            outcome.approved ? "approved" : "rejected"
        )

        if (!outcome.approved) {
            throw new AgentFailure(
                "review_rejected",
                `${reviewType} found ${outcome.requiredFixes.length} issue(s) that must be fixed`,
                { feedback: outcome.requiredFixes }
            )
        }
        return {
            review: {
                review_type: reviewType,
                approved: true,
                issues: outcome.feedback.map(issueToJson),
            },
        }
    }
}
