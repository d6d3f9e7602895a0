import { isAbsolute, join } from "node:path"

import { z } from "zod"

import { AgentFailure } from "../core/errors.js"
import { isJsonObject, jsonObjectSchema } from "../core/json.js"
import { log } from "../core/Logger.js"
import { EMPTY_RULE_SET, normalizePath } from "../rules/DomainRules.js"
import type { JsonObject, JsonValue, RuleSet } from "../types.js"
import type { Agent, AgentContext } from "./Agent.js"
import {
    analyzeStructure,
    missingDependencies,
    structureToJson,
} from "./projectStructure.js"
import { parseRequest } from "./request.js"

const requirementsSchema = z.object({
    stack: z
        .object({
            frontend: z.string().optional(),
            backend: z.string().optional(),
        })
        .default({}),
    features: z.array(z.string()).default([]),
    port: z.number().int().positive().default(3000),
    backend_port: z.number().int().positive().default(8000),
    environment: z.string().default("development"),
})

const requestSchema = z.object({ requirements: requirementsSchema })

const deploymentRequestSchema = z.object({ requirements: jsonObjectSchema })

const structureRequestSchema = z.object({ path: z.string().min(1).default(".") })

const REQUIRED_DEPLOYMENT_FIELDS = ["app_name", "port", "environment", "stack"]

export interface DeploymentRules {
    portRange: { min: number; max: number }
    environments: string[]
}

export const DEFAULT_DEPLOYMENT_RULES: DeploymentRules = {
    portRange: { min: 1024, max: 65535 },
    environments: ["development", "staging", "production"],
}

export interface ArchitectAgentOptions {
    name?: string
    /** Directory `analyze_structure` and `validate_deployment` inspect. */
    projectRoot?: string
    deployment?: Partial<DeploymentRules>
}

type Requirements = z.infer<typeof requirementsSchema>

interface ComponentOutline {
    name: string
    type: string
}

interface EndpointOutline {
    path: string
    methods: string[]
    auth_required: boolean
}

const FEATURE_COMPONENTS: Record<string, ComponentOutline[]> = {
    authentication: [
        { name: "AuthProvider", type: "context" },
        { name: "LoginForm", type: "form" },
        { name: "ProtectedRoute", type: "hoc" },
    ],
    dashboard: [
        { name: "Dashboard", type: "page" },
        { name: "Sidebar", type: "navigation" },
        { name: "Header", type: "navigation" },
    ],
}

const FEATURE_ENDPOINTS: Record<string, EndpointOutline[]> = {
    authentication: [
        { path: "/api/auth/login", methods: ["POST"], auth_required: false },
        { path: "/api/auth/register", methods: ["POST"], auth_required: false },
    ],
    dashboard: [
        { path: "/api/dashboard", methods: ["GET"], auth_required: true },
    ],
}

function featureEntries<T>(table: Record<string, T[]>, feature: string): T[] {
    return Object.hasOwn(table, feature) ? table[feature] : []
}

function invalidDeployment(reason: string): AgentFailure {
    return new AgentFailure("invalid_deployment", reason)
}

/**
 * Turns requirements into an architecture outline: frontend components,
 * backend endpoints, deployment ports and the configured domains. Also
 * inspects an existing project for its domains and dependencies.
 */
export class ArchitectAgent implements Agent {
    public readonly name: string
    private readonly rules: RuleSet
    private readonly projectRoot: string
    private readonly deployment: DeploymentRules

    constructor(rules: RuleSet = EMPTY_RULE_SET, options: ArchitectAgentOptions = {}) {
        this.name = options.name ?? "architect"
        this.rules = rules
        this.projectRoot = options.projectRoot ?? process.cwd()
        this.deployment = { ...DEFAULT_DEPLOYMENT_RULES, ...options.deployment }
    }

    public async process(request: JsonObject, context: AgentContext): Promise<JsonObject> {
        log.agents(
            "%s handling %s for run %s step %d",
            this.name,
            String(request.action),
            context.runId,
            context.stepIndex
        )
        switch (request.action) {
            case "design_architecture": {
                const { requirements } = parseRequest(requestSchema, request)
                return { architecture: this.design(requirements) }
            }
            case "analyze_structure": {
                const { path } = parseRequest(structureRequestSchema, request)
                const structure = await analyzeStructure(this.resolvePath(path), this.rules)
                return { status: "valid", structure: structureToJson(structure) }
            }
            case "validate_deployment": {
                const { requirements } = parseRequest(deploymentRequestSchema, request)
                return this.validateDeployment(requirements)
            }
            default:
                throw new AgentFailure(
                    "unsupported_action",
                    `${this.name} cannot handle action "${String(request.action)}"`
                )
        }
    }

    private resolvePath(path: string): string {
        const normalized = normalizePath(path)
        if (isAbsolute(normalized) || normalized.split("/").includes("..")) {
            throw new AgentFailure(
                "invalid_path",
                `Path "${path}" must stay inside the project`
            )
        }
        return join(this.projectRoot, normalized)
    }

    private async validateDeployment(requirements: JsonObject): Promise<JsonObject> {
        for (const field of REQUIRED_DEPLOYMENT_FIELDS) {
            if (!Object.hasOwn(requirements, field)) {
                throw invalidDeployment(`Missing required field: ${field}`)
            }
        }
        const { app_name: appName, port, environment, stack } = requirements
        const { min, max } = this.deployment.portRange
        if (typeof port !== "number" || !Number.isInteger(port) || port < min || port > max) {
            throw invalidDeployment(`Invalid port number. Must be between ${min} and ${max}`)
        }
        const { environments } = this.deployment
        if (typeof environment !== "string" || !environments.includes(environment)) {
            throw invalidDeployment(
                `Invalid environment. Must be one of: ${environments.join(", ")}`
            )
        }
        if (!isJsonObject(stack)) {
            throw invalidDeployment("Invalid stack. Expected a mapping of layer to framework")
        }

        const structure = await analyzeStructure(this.projectRoot, this.rules)
        const tasks: JsonValue[] = []
        for (const layer of Object.keys(stack)) {
            if (!Object.hasOwn(this.rules.domains, layer)) continue
            const missing = missingDependencies(
                structure[layer].dependencies,
                this.rules.domains[layer].dependencies ?? []
            )
            if (missing.length > 0) {
                tasks.push({ action: "update_dependencies", domain: layer, dependencies: missing })
            }
        }
        return {
            status: "valid",
            configuration: { app_name: appName, port, environment, stack },
            structure: structureToJson(structure),
            tasks,
        }
    }

    private design(requirements: Requirements): JsonObject {
        const { stack, features, environment } = requirements
        return {
            frontend: stack.frontend
                ? this.frontend(stack.frontend, features)
                : null,
            backend: stack.backend ? this.backend(stack.backend, features) : null,
            deployment: {
                frontend: { port: requirements.port, environment },
                backend: { port: requirements.backend_port, environment },
            },
            domains: this.domains(),
        }
    }

    private frontend(framework: string, features: string[]): JsonObject {
        const components: JsonValue[] = [
            { name: "App", type: "root", children: [] },
        ]
        for (const feature of features) {
            for (const component of featureEntries(FEATURE_COMPONENTS, feature)) {
                components.push({ name: component.name, type: component.type })
            }
        }
        return {
            framework,
            components,
            routing: framework === "next" ? "file-based" : "react-router",
            state_management: features.includes("api")
                ? "react-query"
                : "react-context",
        }
    }

    private backend(framework: string, features: string[]): JsonObject {
        const endpoints: JsonValue[] = []
        for (const feature of features) {
            for (const endpoint of featureEntries(FEATURE_ENDPOINTS, feature)) {
                endpoints.push({
                    path: endpoint.path,
                    methods: [...endpoint.methods],
                    auth_required: endpoint.auth_required,
                })
            }
        }
        return {
            framework,
            database:
                framework === "fastapi" || framework === "flask"
                    ? "sqlalchemy"
                    : "django-orm",
            authentication: "jwt",
            endpoints,
        }
    }

    private domains(): JsonObject {
        const domains: JsonObject = {}
        for (const [name, domain] of Object.entries(this.rules.domains)) {
            const naming: JsonObject = {}
            for (const [kind, convention] of Object.entries(domain.naming)) {
                if (convention) naming[kind] = convention
            }
            domains[name] = {
                directories: [...domain.directories],
                extensions: [...domain.extensions],
                naming,
                require_tests: domain.requireTests,
            }
        }
        return domains
    }
}
