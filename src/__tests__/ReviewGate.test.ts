import { describe, expect, it } from "vitest"

import { ConfigError, UnknownReviewTypeError } from "../core/errors.js"
import { ReviewGate, buildOutcome, isAtLeast } from "../review/ReviewGate.js"
import { EMPTY_RULE_SET, freezeRuleSet } from "../rules/DomainRules.js"
import type { ReviewIssue } from "../types.js"

const warning: ReviewIssue = {
    rule: "function_length",
    location: "src/a.ts:1",
    severity: "warning",
    message: "too long",
}
const error: ReviewIssue = {
    rule: "naming_convention",
    location: "src/a.ts",
    severity: "error",
    message: "bad name",
}

describe("ReviewGate", () => {
    it("knows the built-in review types", () => {
        expect(new ReviewGate().types()).toEqual([
            "domain_validation",
            "security",
            "coverage",
            "code_review",
        ])
    })

    it("approves when no issue reaches the threshold", () => {
        expect(buildOutcome("custom", [warning], "error")).toEqual({
            reviewType: "custom",
            approved: true,
            feedback: [warning],
            requiredFixes: [],
        })
        expect(buildOutcome("custom", [warning, error], "warning").requiredFixes).toEqual([
            warning,
            error,
        ])
        expect(isAtLeast("critical", "error")).toBe(true)
        expect(isAtLeast("info", "warning")).toBe(false)
    })

    it("runs custom and async checkers", async () => {
        const gate = new ReviewGate({
            always: () => [error],
            later: async () => [warning],
        })

        const rejected = await gate.review("always", {}, EMPTY_RULE_SET)
        expect(rejected.approved).toBe(false)
        expect(rejected.requiredFixes).toEqual([error])

        const approved = await gate.review("later", {}, EMPTY_RULE_SET)
        expect(approved.approved).toBe(true)
    })

    it("uses the rule set's severity threshold", async () => {
        const gate = new ReviewGate({ warn: () => [warning] })
        const strict = freezeRuleSet({
            domains: {},
            review: { ...EMPTY_RULE_SET.review, severityThreshold: "warning" },
        })

        expect((await gate.review("warn", {}, strict)).approved).toBe(false)
    })

    it("rejects unknown review types", async () => {
        await expect(new ReviewGate().review("vibes", {}, EMPTY_RULE_SET)).rejects.toBeInstanceOf(
            UnknownReviewTypeError
        )
    })

    it("refuses registration once sealed", () => {
        const gate = new ReviewGate().seal()
        expect(() => gate.register("late", () => [])).toThrow(ConfigError)
        expect(gate.has("late")).toBe(false)
    })
})
