import type { z } from "zod"

import { AgentFailure } from "../core/errors.js"
import type { JsonObject, ReviewIssue } from "../types.js"
import { formatZodError } from "../workflow/definitions.js"

/** Validate an agent request; a malformed one is never worth retrying. */
export function parseRequest<T extends z.ZodTypeAny>(
    schema: T,
    request: JsonObject
): z.output<T> {
    const parsed = schema.safeParse(request)
    if (!parsed.success) {
        throw new AgentFailure(
            "invalid_request",
            `Malformed "${String(request.action)}" request: ${formatZodError(parsed.error)}`
        )
    }
    return parsed.data
}

export function issueFromJson(issue: {
    rule: string
    location: string
    severity: ReviewIssue["severity"]
    message: string
    suggested_fix?: string
}): ReviewIssue {
    return {
        rule: issue.rule,
        location: issue.location,
        severity: issue.severity,
        message: issue.message,
        suggestedFix: issue.suggested_fix,
    }
}
