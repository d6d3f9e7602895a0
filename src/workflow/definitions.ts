import { readFile } from "node:fs/promises"
import { extname } from "node:path"

import { parse as parseYaml } from "yaml"
import { z } from "zod"

import { DEFAULT_REVIEW_RULES } from "../core/Config.js"
import { ConfigError, toError } from "../core/errors.js"
import { jsonObjectSchema } from "../core/json.js"
import { log } from "../core/Logger.js"
import { freezeRuleSet } from "../rules/DomainRules.js"
import type {
    EngineSettings,
    RuleSet,
    StepSpec,
    WorkflowDefinition,
} from "../types.js"

const namingSchema = z.enum(["PascalCase", "camelCase", "kebab-case", "snake_case"])
const severitySchema = z.enum(["info", "warning", "error", "critical"])

export const stepSpecSchema = z
    .object({
        id: z.string().min(1).optional(),
        type: z.string().min(1),
        agent: z.string().min(1),
        params: jsonObjectSchema.default({}),
        require_review: z.boolean().default(false),
        review_type: z.string().min(1).optional(),
        outputs: z.array(z.string().min(1)).default([]),
        optional: z.boolean().default(false),
    })
    .strict()
    .superRefine((step, ctx) => {
        if (step.require_review && !step.review_type) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["review_type"],
                message: "review_type is required when require_review is true",
            })
        }
        if (!step.require_review && step.review_type) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["review_type"],
                message: "review_type is only allowed when require_review is true",
            })
        }
    })
    .transform(
        (step): StepSpec => ({
            id: step.id,
            type: step.type,
            agent: step.agent,
            params: step.params,
            requireReview: step.require_review,
            reviewType: step.review_type,
            outputs: step.outputs,
            optional: step.optional,
        })
    )

export const workflowSchema = z
    .object({
        name: z.string().min(1).optional(),
        description: z.string().optional(),
        steps: z.array(stepSpecSchema).min(1, "a workflow needs at least one step"),
    })
    .strict()

const domainSchema = z
    .object({
        directories: z.array(z.string().min(1)).min(1),
        extensions: z.array(z.string()).default([]),
        naming_conventions: z
            .object({
                components: namingSchema.optional(),
                files: namingSchema.optional(),
                modules: namingSchema.optional(),
            })
            .strict()
            .default({}),
        require_tests: z.boolean().default(true),
        max_file_size: z.number().int().positive().optional(),
        max_function_length: z.number().int().positive().optional(),
        dependencies: z.array(z.string().min(1)).default([]),
    })
    .strict()

const reviewSchema = z
    .object({
        coverage_threshold: z.number().min(0).max(100).optional(),
        max_file_size: z.number().int().positive().optional(),
        max_function_length: z.number().int().positive().optional(),
        severity_threshold: severitySchema.optional(),
    })
    .strict()
    .default({})

const policySchema = z
    .object({
        max_retries: z.number().int().min(0).optional(),
        max_review_cycles: z.number().int().min(0).optional(),
    })
    .strict()

const engineSchema = z
    .object({
        max_retries: z.number().int().min(0).optional(),
        max_review_cycles: z.number().int().min(0).optional(),
        agent_timeout_ms: z.number().int().positive().optional(),
        review_timeout_ms: z.number().int().positive().optional(),
        step_policies: z.record(policySchema).optional(),
    })
    .strict()
    .default({})

export const projectSchema = z.object({
    domains: z.record(domainSchema).default({}),
    review: reviewSchema,
    engine: engineSchema,
    workflows: z.record(workflowSchema).default({}),
})

export interface ProjectConfig {
    rules: RuleSet
    engine: EngineSettings
    workflows: Record<string, WorkflowDefinition>
}

export function formatZodError(error: z.ZodError): string {
    return error.issues
        .map((issue) => {
            const path = issue.path.length > 0 ? issue.path.join(".") : "(root)"
            return `${path}: ${issue.message}`
        })
        .join("; ")
}

/** Definitions are shared across runs, so they are frozen on load. */
export function freezeDefinition(
    definition: WorkflowDefinition
): WorkflowDefinition {
    for (const step of definition.steps) {
        Object.freeze(step.outputs)
        Object.freeze(step)
    }
    Object.freeze(definition.steps)
    return Object.freeze(definition)
}

export function parseWorkflowDefinition(
    raw: unknown,
    fallbackName: string,
    source = "<definition>"
): WorkflowDefinition {
    const parsed = workflowSchema.safeParse(raw)
    if (!parsed.success) {
        throw new ConfigError(`${source}: ${formatZodError(parsed.error)}`)
    }
    return freezeDefinition({
        name: parsed.data.name ?? fallbackName,
        description: parsed.data.description,
        steps: parsed.data.steps,
    })
}

export function parseProjectConfig(
    raw: unknown,
    source = "<config>"
): ProjectConfig {
    const parsed = projectSchema.safeParse(raw ?? {})
    if (!parsed.success) {
        throw new ConfigError(`${source}: ${formatZodError(parsed.error)}`)
    }
    const { domains, review, engine, workflows } = parsed.data

    const rules = freezeRuleSet({
        domains: Object.fromEntries(
            Object.entries(domains).map(([name, domain]) => [
                name,
                {
                    directories: domain.directories,
                    extensions: domain.extensions,
                    naming: domain.naming_conventions,
                    requireTests: domain.require_tests,
                    maxFileSize: domain.max_file_size,
                    maxFunctionLength: domain.max_function_length,
                    dependencies: domain.dependencies,
                },
            ])
        ),
        review: {
            coverageThreshold:
                review.coverage_threshold ??
                DEFAULT_REVIEW_RULES.coverageThreshold,
            maxFileSize: review.max_file_size ?? DEFAULT_REVIEW_RULES.maxFileSize,
            maxFunctionLength:
                review.max_function_length ??
                DEFAULT_REVIEW_RULES.maxFunctionLength,
            severityThreshold:
                review.severity_threshold ??
                DEFAULT_REVIEW_RULES.severityThreshold,
        },
    })

    const stepPolicies = engine.step_policies
        ? Object.fromEntries(
              Object.entries(engine.step_policies).map(([type, policy]) => [
                  type,
                  {
                      maxRetries: policy.max_retries,
                      maxReviewCycles: policy.max_review_cycles,
                  },
              ])
          )
        : undefined

    const definitions: Record<string, WorkflowDefinition> = {}
    for (const [name, workflow] of Object.entries(workflows)) {
        definitions[name] = freezeDefinition({
            name: workflow.name ?? name,
            description: workflow.description,
            steps: workflow.steps,
        })
    }

    return {
        rules,
        engine: {
            maxRetries: engine.max_retries,
            maxReviewCycles: engine.max_review_cycles,
            agentTimeoutMs: engine.agent_timeout_ms,
            reviewTimeoutMs: engine.review_timeout_ms,
            stepPolicies,
        },
        workflows: definitions,
    }
}

export function parseDocument(text: string, source: string): unknown {
    try {
        return extname(source) === ".json" ? JSON.parse(text) : parseYaml(text)
    } catch (error) {
        throw new ConfigError(
            `${source}: could not parse document: ${toError(error).message}`,
            toError(error)
        )
    }
}

export async function loadProjectFile(filePath: string): Promise<ProjectConfig> {
    let text: string
    try {
        text = await readFile(filePath, "utf-8")
    } catch (error) {
        throw new ConfigError(
            `Cannot read project file ${filePath}: ${toError(error).message}`,
            toError(error)
        )
    }
    const project = parseProjectConfig(parseDocument(text, filePath), filePath)
    log.config(
        "Loaded %s: %d domain(s), %d workflow(s)",
        filePath,
        Object.keys(project.rules.domains).length,
        Object.keys(project.workflows).length
    )
    return project
}
