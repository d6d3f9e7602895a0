import type { AgentRegistry } from "../agents/Agent.js"
import type { ValidationIssue, ValidationReport } from "../core/errors.js"
import type { ReviewGate } from "../review/ReviewGate.js"
import type { WorkflowDefinition } from "../types.js"
import { collectReferences, rootKey } from "./references.js"
import type { StepTypeRegistry } from "./stepTypes.js"

export interface ValidationContext {
    agents: AgentRegistry
    stepTypes: StepTypeRegistry
    reviewGate: ReviewGate
}

export function stepLabel(index: number, type: string, id?: string): string {
    return id ?? `${index}-${type}`
}

/**
 * Static pass over a definition before any step runs: every agent, step
 * type and review type must be registered, and every param reference
 * must name a key from the initial input or from the outputs of an
 * earlier step. Steps before `fromIndex` already ran (a resumed run);
 * their outputs are expected among `initialKeys`.
 */
export function validateDefinition(
    definition: WorkflowDefinition,
    registries: ValidationContext,
    initialKeys: Iterable<string> = [],
    fromIndex = 0
): ValidationReport {
    const issues: ValidationIssue[] = []
    const available = new Set(initialKeys)
    const seenIds = new Set<string>()

    if (definition.steps.length === 0) {
        issues.push({
            code: "EMPTY_WORKFLOW",
            message: `Workflow "${definition.name}" has no steps`,
            location: `workflow:${definition.name}`,
        })
    }

    definition.steps.forEach((step, index) => {
        const label = stepLabel(index, step.type, step.id)
        const location = `step:${label}`

        if (seenIds.has(label)) {
            issues.push({
                code: "DUPLICATE_STEP_ID",
                message: `Step id "${label}" is used more than once`,
                location,
            })
        }
        seenIds.add(label)

        if (!registries.stepTypes.has(step.type)) {
            issues.push({
                code: "UNKNOWN_STEP_TYPE",
                message: `Step ${index} has unknown type "${step.type}"`,
                location,
            })
        }

        if (!registries.agents.has(step.agent)) {
            issues.push({
                code: "UNKNOWN_AGENT",
                message: `Step ${index} references unknown agent "${step.agent}"`,
                location,
            })
        }

        if (step.requireReview) {
            if (!step.reviewType) {
                issues.push({
                    code: "MISSING_REVIEW_TYPE",
                    message: `Step ${index} requires review but names no review type`,
                    location,
                })
            } else if (!registries.reviewGate.has(step.reviewType)) {
                issues.push({
                    code: "UNKNOWN_REVIEW_TYPE",
                    message: `Step ${index} uses unknown review type "${step.reviewType}"`,
                    location,
                })
            }
        }

        if (index < fromIndex) return

        for (const ref of collectReferences(step.params)) {
            const key = rootKey(ref)
            if (!available.has(key)) {
                issues.push({
                    code: "UNRESOLVED_REFERENCE",
                    message: `Step ${index} references "${ref}" but "${key}" is not produced by an earlier step`,
                    location,
                })
            }
        }

        for (const key of step.outputs) available.add(key)
    })

    return {
        workflow: definition.name,
        valid: issues.length === 0,
        issues,
    }
}
