import { describe, expect, it } from "vitest"

import { AgentRegistry } from "../agents/Agent.js"
import { ReviewGate } from "../review/ReviewGate.js"
import { StepTypeRegistry } from "../workflow/stepTypes.js"
import { validateDefinition, type ValidationContext } from "../workflow/validate.js"
import { ScriptedAgent, step, workflow } from "./helpers/stubAgents.js"

const registries: ValidationContext = {
    agents: new AgentRegistry([
        new ScriptedAgent("architect", [{}]),
        new ScriptedAgent("developer", [{}]),
    ]),
    stepTypes: new StepTypeRegistry(),
    reviewGate: new ReviewGate(),
}

describe("validateDefinition", () => {
    it("accepts references to initial input and earlier outputs", () => {
        const report = validateDefinition(
            workflow("ok", [
                step({
                    type: "design_architecture",
                    agent: "architect",
                    params: { requirements: { $ref: "requirements" } },
                    outputs: ["architecture"],
                }),
                step({
                    type: "create_component",
                    agent: "developer",
                    params: { stack: "{{architecture.frontend}}" },
                    requireReview: true,
                    reviewType: "domain_validation",
                }),
            ]),
            registries,
            ["requirements"]
        )

        expect(report).toEqual({ workflow: "ok", valid: true, issues: [] })
    })

    it("collects every problem in one report", () => {
        const report = validateDefinition(
            workflow("bad", [
                step({
                    type: "summon",
                    agent: "ghost",
                    params: { later: { $ref: "files" } },
                }),
                step({
                    id: "build",
                    type: "create_component",
                    agent: "developer",
                    outputs: ["files"],
                    requireReview: true,
                    reviewType: "vibes",
                }),
                step({
                    id: "build",
                    type: "fix_issue",
                    agent: "developer",
                    requireReview: true,
                }),
            ]),
            registries
        )

        expect(report.valid).toBe(false)
        expect(report.issues.map((i) => [i.code, i.location])).toEqual([
            ["UNKNOWN_STEP_TYPE", "step:0-summon"],
            ["UNKNOWN_AGENT", "step:0-summon"],
            ["UNRESOLVED_REFERENCE", "step:0-summon"],
            ["UNKNOWN_REVIEW_TYPE", "step:build"],
            ["DUPLICATE_STEP_ID", "step:build"],
            ["MISSING_REVIEW_TYPE", "step:build"],
        ])
    })

    it("reports an empty workflow", () => {
        const report = validateDefinition(workflow("empty", []), registries)
        expect(report.issues.map((i) => i.code)).toEqual(["EMPTY_WORKFLOW"])
    })

    it("skips reference checks for steps that already ran", () => {
        const definition = workflow("resumed", [
            step({
                type: "design_architecture",
                agent: "architect",
                params: { requirements: { $ref: "requirements" } },
                outputs: ["architecture"],
            }),
            step({
                type: "create_component",
                agent: "developer",
                params: { arch: { $ref: "architecture" } },
            }),
        ])

        expect(validateDefinition(definition, registries, ["architecture"], 1).valid).toBe(true)
        expect(validateDefinition(definition, registries, [], 1).issues.map((i) => i.code)).toEqual([
            "UNRESOLVED_REFERENCE",
        ])
    })
})
