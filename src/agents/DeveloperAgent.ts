import { mkdir, writeFile } from "node:fs/promises"
import { dirname, isAbsolute, join } from "node:path"

import { z } from "zod"

import { AgentFailure, toError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import {
    EMPTY_RULE_SET,
    applyConvention,
    expectedConvention,
    fileStem,
    isInDomain,
    isTestFile,
    matchesConvention,
    normalizePath,
    resolveDomain,
    testPathFor,
} from "../rules/DomainRules.js"
import type {
    DomainRules,
    FileChange,
    JsonObject,
    ReviewIssue,
    RuleSet,
} from "../types.js"
import type { Agent, AgentContext } from "./Agent.js"
import { issueFromJson, parseRequest } from "./request.js"
import { testContentFor } from "./templates.js"

const fileSchema = z.object({
    path: z.string().min(1),
    content: z.string().default(""),
})

const componentSchema = z.object({
    name: z.string().min(1),
    domain: z.string().optional(),
    files: z.array(fileSchema).default([]),
})

const fixSchema = z.object({
    rule: z.string(),
    location: z.string(),
    severity: z.enum(["info", "warning", "error", "critical"]),
    message: z.string(),
    suggested_fix: z.string().optional(),
})

const fixesSchema = z.object({
    required_fixes: z.array(fixSchema).default([]),
})

const componentRequestSchema = fixesSchema.extend({
    component: componentSchema,
})

const featureRequestSchema = fixesSchema.extend({
    feature: z.object({
        domain: z.string().min(1),
        components: z.array(componentSchema).default([]),
        updates: z.array(componentSchema).default([]),
    }),
})

const issueRequestSchema = fixesSchema.extend({
    issue: z.object({
        files: z.array(fileSchema).min(1),
        update_tests: z.boolean().default(false),
    }),
})

type ComponentInput = z.infer<typeof componentSchema>

export interface DeveloperAgentOptions {
    name?: string
    /** When set, produced files are also written below this directory. */
    outputDirectory?: string
}

interface Remediation {
    rename: Set<string>
    addTests: boolean
}

interface Produced {
    domain: string
    files: FileChange[]
}

const DEVELOPER_ACTIONS = new Set([
    "create_component",
    "update_component",
    "implement_feature",
    "fix_issue",
])

/**
 * Produces file changes inside the configured domains. On remediation the
 * request carries `required_fixes`; naming fixes rename the offending
 * files and coverage fixes add the missing tests.
 */
export class DeveloperAgent implements Agent {
    public readonly name: string
    private readonly rules: RuleSet
    private readonly outputDirectory?: string

    constructor(rules: RuleSet = EMPTY_RULE_SET, options: DeveloperAgentOptions = {}) {
        this.name = options.name ?? "developer"
        this.rules = rules
        this.outputDirectory = options.outputDirectory
    }

    public async process(
        request: JsonObject,
        context: AgentContext
    ): Promise<JsonObject> {
        const action = typeof request.action === "string" ? request.action : ""
        if (!DEVELOPER_ACTIONS.has(action)) {
            throw new AgentFailure(
                "unsupported_action",
                `${this.name} cannot handle action "${action}"`
            )
        }
        log.agents("%s handling %s (run %s)", this.name, action, context.runId)

        let response: JsonObject
        let files: FileChange[]
        switch (action) {
            case "create_component":
            case "update_component": {
                const parsed = parseRequest(componentRequestSchema, request)
                const produced = this.buildComponent(
                    parsed.component,
                    remediationFrom(parsed.required_fixes.map(issueFromJson)),
                    action === "create_component"
                )
                files = produced.files
                response = {
                    files: files.map(toJson),
                    domain: produced.domain,
                    component: parsed.component.name,
                }
                break
            }
            case "implement_feature": {
                const parsed = parseRequest(featureRequestSchema, request)
                const result = this.implementFeature(
                    parsed.feature,
                    remediationFrom(parsed.required_fixes.map(issueFromJson))
                )
                files = [...result.created, ...result.updated]
                response = {
                    files: files.map(toJson),
                    created: result.created.map((f) => f.path),
                    updated: result.updated.map((f) => f.path),
                    domain: parsed.feature.domain,
                }
                break
            }
            default: {
                const parsed = parseRequest(issueRequestSchema, request)
                const remediation = remediationFrom(
                    parsed.required_fixes.map(issueFromJson)
                )
                files = this.fixIssue(
                    parsed.issue.files,
                    parsed.issue.update_tests,
                    remediation
                )
                response = {
                    files: files.map(toJson),
                    domain: resolveDomain(files[0].path, this.rules) ?? null,
                }
            }
        }

        if (context.signal?.aborted) {
            throw new AgentFailure("aborted", `${this.name} was cancelled`)
        }
        await this.writeFiles(files)
        return response
    }

    private buildComponent(
        component: ComponentInput,
        remediation: Remediation,
        checkName: boolean
    ): Produced {
        const domainName = this.componentDomain(component)
        const domain = this.rules.domains[domainName]
        const convention = domain.naming.components
        const name = remediation.rename.size > 0 && convention
            ? applyConvention(component.name, convention)
            : component.name

        if (checkName && convention && !matchesConvention(name, convention)) {
            throw new AgentFailure(
                "naming_convention",
                `Component name "${name}" must use ${convention} in domain ${domainName}`
            )
        }

        const files: FileChange[] = []
        for (const spec of component.files) {
            const path = this.renamed(normalizePath(spec.path), domain, remediation)
            if (!isInDomain(path, domain)) {
                throw new AgentFailure(
                    "domain_boundary",
                    `File ${path} must be under one of: ${domain.directories.join(", ")}`
                )
            }
            files.push({ path, content: spec.content })
        }

        const withTests = domain.requireTests || remediation.addTests
        return {
            domain: domainName,
            files: withTests ? addTests(files) : files,
        }
    }

    private implementFeature(
        feature: z.infer<typeof featureRequestSchema>["feature"],
        remediation: Remediation
    ): { created: FileChange[]; updated: FileChange[] } {
        if (!Object.hasOwn(this.rules.domains, feature.domain)) {
            throw new AgentFailure(
                "unknown_domain",
                `Feature domain "${feature.domain}" is not defined`
            )
        }
        const created: FileChange[] = []
        const updated: FileChange[] = []
        for (const component of feature.components) {
            const produced = this.buildComponent(
                { ...component, domain: component.domain ?? feature.domain },
                remediation,
                true
            )
            created.push(...produced.files)
        }
        for (const component of feature.updates) {
            const produced = this.buildComponent(
                { ...component, domain: component.domain ?? feature.domain },
                remediation,
                false
            )
            updated.push(...produced.files)
        }
        return { created, updated }
    }

    private fixIssue(
        specs: z.infer<typeof fileSchema>[],
        updateTests: boolean,
        remediation: Remediation
    ): FileChange[] {
        const files = specs.map((spec) => {
            const path = normalizePath(spec.path)
            const domainName = resolveDomain(path, this.rules)
            return {
                path: domainName
                    ? this.renamed(path, this.rules.domains[domainName], remediation)
                    : path,
                content: spec.content,
            }
        })
        return updateTests || remediation.addTests ? addTests(files) : files
    }

    private componentDomain(component: ComponentInput): string {
        if (component.domain !== undefined) {
            if (Object.hasOwn(this.rules.domains, component.domain)) return component.domain
            throw new AgentFailure(
                "unknown_domain",
                `Component ${component.name} names unknown domain "${component.domain}"`
            )
        }
        for (const file of component.files) {
            const domain = resolveDomain(file.path, this.rules)
            if (domain) return domain
        }
        throw new AgentFailure(
            "unknown_domain",
            `Component ${component.name} does not belong to any defined domain`
        )
    }

    private renamed(
        path: string,
        domain: DomainRules,
        remediation: Remediation
    ): string {
        if (!remediation.rename.has(path) || isTestFile(path)) return path
        const convention = expectedConvention(path, domain)
        const stem = fileStem(path)
        if (!convention || matchesConvention(stem, convention)) return path
        const slash = path.lastIndexOf("/")
        const dir = path.slice(0, slash + 1)
        const rest = path.slice(slash + 1 + stem.length)
        return `${dir}${applyConvention(stem, convention)}${rest}`
    }

    private async writeFiles(files: FileChange[]): Promise<void> {
        const root = this.outputDirectory
        if (!root) return
        for (const file of files) {
            if (isAbsolute(file.path) || file.path.split("/").includes("..")) {
                throw new AgentFailure(
                    "invalid_path",
                    `Refusing to write outside the output directory: ${file.path}`
                )
            }
            const target = join(root, file.path)
            try {
                await mkdir(dirname(target), { recursive: true })
                await writeFile(target, file.content, "utf-8")
            } catch (error) {
                throw new AgentFailure(
                    "write_failed",
                    `Could not write ${target}: ${toError(error).message}`,
                    { retryable: true, cause: toError(error) }
                )
            }
        }
        log.agents("%s wrote %d file(s) under %s", this.name, files.length, root)
    }
}

function remediationFrom(fixes: ReviewIssue[]): Remediation {
    return {
        rename: new Set(
            fixes
                .filter((fix) => fix.rule === "naming_convention")
                .map((fix) => normalizePath(fix.location))
        ),
        addTests: fixes.some((fix) => fix.rule === "test_coverage"),
    }
}

/** Append a starter test for every source file that lacks one. */
function addTests(files: FileChange[]): FileChange[] {
    const paths = new Set(files.map((f) => f.path))
    const result = [...files]
    for (const file of files) {
        const testPath = testPathFor(file.path)
        if (!testPath || paths.has(testPath)) continue
        const content = testContentFor(file.path)
        if (!content) continue
        paths.add(testPath)
        result.push({ path: testPath, content })
    }
    return result
}

function toJson(file: FileChange): JsonObject {
    return { path: file.path, content: file.content }
}
