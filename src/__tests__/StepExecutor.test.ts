import { describe, expect, it } from "vitest"

import { AgentRegistry } from "../agents/Agent.js"
import { AgentFailure, UnknownAgentError, UnresolvedReferenceError } from "../core/errors.js"
import type { RunContext } from "../types.js"
import { StepExecutor, buildRequest, classifyFailure } from "../workflow/StepExecutor.js"
import { HangingAgent, ScriptedAgent, step } from "./helpers/stubAgents.js"

const context: RunContext = new Map([["ref", 1]])

describe("buildRequest", () => {
    it("tags the action and appends extra params last", () => {
        const request = buildRequest(
            step({ type: "fix_issue", agent: "developer", params: { id: { $ref: "ref" } } }),
            context,
            { required_fixes: [] }
        )
        expect(request).toEqual({ action: "fix_issue", id: 1, required_fixes: [] })
    })
})

describe("classifyFailure", () => {
    it("keeps structured failures and maps the rest", () => {
        expect(classifyFailure(new AgentFailure("flaky", "later", { retryable: true }))).toEqual({
            kind: "flaky",
            message: "later",
            retryable: true,
        })
        const abort = new Error("stop")
        abort.name = "AbortError"
        expect(classifyFailure(abort)).toEqual({ kind: "aborted", message: "stop", retryable: false })
        expect(classifyFailure("boom")).toEqual({
            kind: "agent_error",
            message: "boom",
            retryable: false,
        })
    })
})

describe("StepExecutor", () => {
    it("keeps only the declared outputs", async () => {
        const agent = new ScriptedAgent("architect", [{ architecture: { layers: 2 }, notes: "x" }])
        const executor = new StepExecutor(new AgentRegistry([agent]))

        const result = await executor.execute(
            step({ type: "design_architecture", agent: "architect", outputs: ["architecture"] }),
            context
        )

        expect(result).toEqual({
            status: "succeeded",
            output: { architecture: { layers: 2 } },
            request: { action: "design_architecture" },
        })
    })

    it("returns equal results for equal inputs", async () => {
        const agent = new ScriptedAgent("developer", [(request) => ({ echo: request.id ?? null })])
        const executor = new StepExecutor(new AgentRegistry([agent]))
        const spec = step({
            type: "fix_issue",
            agent: "developer",
            params: { id: { $ref: "ref" } },
            outputs: ["echo"],
        })

        const first = await executor.execute(spec, context)
        const second = await executor.execute(spec, context)

        expect(second).toEqual(first)
        expect(first.output).toEqual({ echo: 1 })
    })

    it("turns a feedback-carrying failure into review_failed", async () => {
        const feedback = [
            { rule: "security", location: "a.ts:1", severity: "critical" as const, message: "eval" },
        ]
        const agent = new ScriptedAgent("reviewer", [
            new AgentFailure("review_rejected", "1 issue", { feedback }),
        ])
        const executor = new StepExecutor(new AgentRegistry([agent]))

        const result = await executor.execute(step({ type: "review_code", agent: "reviewer" }), context)

        expect(result.status).toBe("review_failed")
        expect(result.reviewFeedback).toEqual(feedback)
        expect(result.error).toBeUndefined()
    })

    it("reports a non-object response", async () => {
        const agent = new ScriptedAgent("developer", [
            // an agent written without types can still answer with a list
            () => JSON.parse("[1, 2]"),
        ])
        const executor = new StepExecutor(new AgentRegistry([agent]))

        const result = await executor.execute(step({ type: "fix_issue", agent: "developer" }), context)

        expect(result.error).toEqual({
            kind: "invalid_response",
            message: 'Agent "developer" returned a non-object response',
            retryable: false,
        })
    })

    it("rejects responses that cannot be stored as JSON", async () => {
        const bigint = new ScriptedAgent("developer", [
            () => JSON.parse('{"x": 1}', (_key, value) => (typeof value === "number" ? BigInt(value) : value)),
        ])
        const cyclic = new ScriptedAgent("architect", [
            () => {
                const reply = JSON.parse('{"self": null}')
                reply.self = reply
                return reply
            },
        ])
        const executor = new StepExecutor(new AgentRegistry([bigint, cyclic]))

        const first = await executor.execute(
            step({ type: "fix_issue", agent: "developer", outputs: ["x"] }),
            context
        )
        const second = await executor.execute(
            step({ type: "design_architecture", agent: "architect", outputs: ["self"] }),
            context
        )

        for (const result of [first, second]) {
            expect(result.status).toBe("failed")
            expect(result.output).toEqual({})
            expect(result.error).toMatchObject({ kind: "invalid_response", retryable: false })
            expect(result.error?.message).toMatch(/returned a response that is not JSON/)
        }
    })

    it("does not take inherited properties as declared outputs", async () => {
        const executor = new StepExecutor(new AgentRegistry([new ScriptedAgent("developer", [{}])]))

        const result = await executor.execute(
            step({ type: "fix_issue", agent: "developer", outputs: ["toString"] }),
            context
        )

        expect(result.error?.kind).toBe("missing_output")
    })

    it("times out a call that never settles", async () => {
        const executor = new StepExecutor(new AgentRegistry([new HangingAgent("developer")]), 10)

        const result = await executor.execute(step({ type: "fix_issue", agent: "developer" }), context)

        expect(result.error).toEqual({
            kind: "timeout",
            message: 'Agent "developer" (fix_issue) timed out after 10ms',
            retryable: true,
        })
    })

    it("hands the agent an aborted signal when the run is cancelled", async () => {
        const controller = new AbortController()
        controller.abort()
        let seen: boolean | undefined
        const agent = new ScriptedAgent("developer", [
            (_request, ctx) => {
                seen = ctx.signal?.aborted
                return {}
            },
        ])
        const executor = new StepExecutor(new AgentRegistry([agent]))

        await executor.execute(step({ type: "fix_issue", agent: "developer" }), context, {
            signal: controller.signal,
        })

        expect(seen).toBe(true)
    })

    it("throws definition errors instead of returning a result", async () => {
        const executor = new StepExecutor(new AgentRegistry([new ScriptedAgent("developer", [{}])]))

        await expect(
            executor.execute(step({ type: "fix_issue", agent: "ghost" }), context)
        ).rejects.toBeInstanceOf(UnknownAgentError)
        await expect(
            executor.execute(
                step({ type: "fix_issue", agent: "developer", params: { x: { $ref: "nope" } } }),
                context
            )
        ).rejects.toBeInstanceOf(UnresolvedReferenceError)
    })
})
