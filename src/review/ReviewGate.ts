import { ConfigError, UnknownReviewTypeError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type {
    BuiltinReviewType,
    JsonObject,
    ReviewIssue,
    ReviewOutcome,
    RuleSet,
    Severity,
} from "../types.js"
import {
    checkCodeReview,
    checkCoverage,
    checkDomainValidation,
    checkSecurity,
    type ReviewChecker,
} from "./checkers.js"

const SEVERITY_RANK: Record<Severity, number> = {
    info: 0,
    warning: 1,
    error: 2,
    critical: 3,
}

const BUILTIN_CHECKERS: Record<BuiltinReviewType, ReviewChecker> = {
    domain_validation: checkDomainValidation,
    security: checkSecurity,
    coverage: checkCoverage,
    code_review: checkCodeReview,
}

export function isAtLeast(severity: Severity, threshold: Severity): boolean {
    return SEVERITY_RANK[severity] >= SEVERITY_RANK[threshold]
}

export class ReviewGate {
    private readonly checkers: Map<string, ReviewChecker>
    private sealed = false

    constructor(extra: Record<string, ReviewChecker> = {}) {
        this.checkers = new Map(Object.entries(BUILTIN_CHECKERS))
        for (const [name, checker] of Object.entries(extra)) {
            this.register(name, checker)
        }
    }

    public register(name: string, checker: ReviewChecker): this {
        if (this.sealed) {
            throw new ConfigError(
                `Review gate is sealed; cannot register "${name}"`
            )
        }
        this.checkers.set(name, checker)
        return this
    }

    public seal(): this {
        this.sealed = true
        return this
    }

    public has(reviewType: string): boolean {
        return this.checkers.has(reviewType)
    }

    public types(): string[] {
        return [...this.checkers.keys()]
    }

    /**
     * Run the named checker. Issues at or above the rule set's severity
     * threshold become required fixes; the review is approved iff there
     * are none.
     */
    public async review(
        reviewType: string,
        candidateOutput: JsonObject,
        rules: RuleSet
    ): Promise<ReviewOutcome> {
        const checker = this.checkers.get(reviewType)
        if (!checker) throw new UnknownReviewTypeError(reviewType)
        const feedback = await checker(candidateOutput, rules)
        const outcome = buildOutcome(
            reviewType,
            feedback,
            rules.review.severityThreshold
        )
        log.review(
            "%s: %d issue(s), %d required fix(es)",
            reviewType,
            outcome.feedback.length,
            outcome.requiredFixes.length
        )
        return outcome
    }
}

export function buildOutcome(
    reviewType: string,
    feedback: ReviewIssue[],
    threshold: Severity
): ReviewOutcome {
    const requiredFixes = feedback.filter((issue) =>
        isAtLeast(issue.severity, threshold)
    )
    return {
        reviewType,
        approved: requiredFixes.length === 0,
        feedback,
        requiredFixes,
    }
}
