import { ConfigError, UnknownStepTypeError } from "../core/errors.js"
import type { BuiltinStepType, StepPolicy } from "../types.js"

export interface StepTypeHandler {
    type: string
    description: string
    /**
     * Whether a rejected review may be answered by re-invoking the agent
     * with the required fixes instead of failing the run.
     */
    remediable: boolean
    policy?: Partial<StepPolicy>
}

const BUILTIN_STEP_TYPES: Record<BuiltinStepType, StepTypeHandler> = {
    design_architecture: {
        type: "design_architecture",
        description: "Produce an architecture outline from requirements",
        remediable: true,
    },
    analyze_structure: {
        type: "analyze_structure",
        description: "Report the domains, frameworks and dependencies of a project",
        remediable: false,
    },
    validate_deployment: {
        type: "validate_deployment",
        description: "Check deployment settings and plan missing dependencies",
        remediable: false,
    },
    create_component: {
        type: "create_component",
        description: "Create a component following its domain rules",
        remediable: true,
    },
    update_component: {
        type: "update_component",
        description: "Update an existing component",
        remediable: true,
    },
    implement_feature: {
        type: "implement_feature",
        description: "Create and update components for a feature",
        remediable: true,
    },
    fix_issue: {
        type: "fix_issue",
        description: "Apply a fix to existing files",
        remediable: true,
    },
    review_code: {
        type: "review_code",
        description: "Review produced files against the domain rules",
        remediable: false,
        policy: { maxReviewCycles: 0 },
    },
    verify_fix: {
        type: "verify_fix",
        description: "Verify that a fix satisfies the domain rules",
        remediable: false,
        policy: { maxReviewCycles: 0 },
    },
}

/**
 * Closed table of step type tags. Built-ins are always present; custom
 * tags are registered before the table is sealed at startup.
 */
export class StepTypeRegistry {
    private readonly handlers: Map<string, StepTypeHandler>
    private sealed = false

    constructor(extra: StepTypeHandler[] = []) {
        this.handlers = new Map(Object.entries(BUILTIN_STEP_TYPES))
        for (const handler of extra) this.register(handler)
    }

    public register(handler: StepTypeHandler): this {
        if (this.sealed) {
            throw new ConfigError(
                `Step type registry is sealed; cannot register "${handler.type}"`
            )
        }
        this.handlers.set(handler.type, handler)
        return this
    }

    public seal(): this {
        this.sealed = true
        return this
    }

    public has(type: string): boolean {
        return this.handlers.has(type)
    }

    public resolve(type: string): StepTypeHandler {
        const handler = this.handlers.get(type)
        if (!handler) throw new UnknownStepTypeError(type)
        return handler
    }

    public types(): string[] {
        return [...this.handlers.keys()]
    }
}
