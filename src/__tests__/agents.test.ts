import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import { afterEach, beforeEach, describe, expect, it } from "vitest"

import type { AgentContext } from "../agents/Agent.js"
import { ArchitectAgent } from "../agents/ArchitectAgent.js"
import { createReferenceAgents } from "../agents/index.js"
import { ReviewerAgent } from "../agents/ReviewerAgent.js"
import { AgentFailure } from "../core/errors.js"
import { ReviewGate } from "../review/ReviewGate.js"
import type { JsonObject } from "../types.js"
import { parseProjectConfig } from "../workflow/definitions.js"

const { rules } = parseProjectConfig({
    domains: {
        frontend: {
            directories: ["src/components/"],
            extensions: [".tsx"],
            naming_conventions: { components: "PascalCase" },
        },
    },
})

const ctx: AgentContext = { runId: "run-1", stepIndex: 2 }

describe("ArchitectAgent", () => {
    const architect = new ArchitectAgent(rules)

    it("outlines components and endpoints for the requested features", async () => {
        const { architecture } = await architect.process(
            {
                action: "design_architecture",
                requirements: {
                    stack: { frontend: "next", backend: "fastapi" },
                    features: ["authentication", "api"],
                    environment: "staging",
                },
            },
            ctx
        )

        expect(architecture).toEqual({
            frontend: {
                framework: "next",
                components: [
                    { name: "App", type: "root", children: [] },
                    { name: "AuthProvider", type: "context" },
                    { name: "LoginForm", type: "form" },
                    { name: "ProtectedRoute", type: "hoc" },
                ],
                routing: "file-based",
                state_management: "react-query",
            },
            backend: {
                framework: "fastapi",
                database: "sqlalchemy",
                authentication: "jwt",
                endpoints: [
                    { path: "/api/auth/login", methods: ["POST"], auth_required: false },
                    { path: "/api/auth/register", methods: ["POST"], auth_required: false },
                ],
            },
            deployment: {
                frontend: { port: 3000, environment: "staging" },
                backend: { port: 8000, environment: "staging" },
            },
            domains: {
                frontend: {
                    directories: ["src/components/"],
                    extensions: [".tsx"],
                    naming: { components: "PascalCase" },
                    require_tests: true,
                },
            },
        })
    })

    it("leaves out a layer the stack does not name", async () => {
        const { architecture } = await architect.process(
            { action: "design_architecture", requirements: { stack: { backend: "django" } } },
            ctx
        )
        expect(architecture).toMatchObject({
            frontend: null,
            backend: { database: "django-orm", endpoints: [] },
        })
    })

    it("rejects a request without requirements", async () => {
        await expect(
            architect.process({ action: "design_architecture" }, ctx)
        ).rejects.toMatchObject({ kind: "invalid_request" })
    })
})

describe("ArchitectAgent on an existing project", () => {
    const { rules: projectRules } = parseProjectConfig({
        domains: {
            frontend: {
                directories: ["web/src/"],
                extensions: [".tsx"],
                dependencies: ["react", "@tanstack/react-query"],
            },
            backend: {
                directories: ["api/"],
                extensions: [".py"],
                dependencies: ["fastapi", "sqlalchemy"],
            },
        },
    })
    let root: string
    let architect: ArchitectAgent

    beforeEach(async () => {
        root = await mkdtemp(join(tmpdir(), "stepwright-arch-"))
        await mkdir(join(root, "web/src"), { recursive: true })
        await mkdir(join(root, "api"))
        await mkdir(join(root, "node_modules/left-pad"), { recursive: true })
        await writeFile(
            join(root, "package.json"),
            JSON.stringify({
                dependencies: { react: "^18.3.0", "react-dom": "^18.3.0" },
                devDependencies: { vitest: "^2.1.0" },
            })
        )
        await writeFile(join(root, "web/src/App.tsx"), "export function App() {}\n")
        await writeFile(join(root, "web/src/styles.css"), "body {}\n")
        await writeFile(join(root, "api/main.py"), "app = None\n")
        await writeFile(join(root, "api/requirements.txt"), "fastapi==0.110.0\n# server\nuvicorn>=0.29\n")
        await writeFile(join(root, "node_modules/left-pad/index.js"), "")
        architect = new ArchitectAgent(projectRules, { projectRoot: root })
    })

    afterEach(async () => {
        await rm(root, { recursive: true, force: true })
    })

    it("groups files, frameworks and dependencies by domain", async () => {
        const response = await architect.process({ action: "analyze_structure" }, ctx)

        expect(response).toEqual({
            status: "valid",
            structure: {
                frontend: {
                    exists: true,
                    framework: "react",
                    dependencies: ["react", "react-dom", "vitest"],
                    files: ["web/src/App.tsx"],
                },
                backend: {
                    exists: true,
                    framework: "fastapi",
                    dependencies: ["fastapi", "uvicorn"],
                    files: ["api/main.py"],
                },
            },
        })
    })

    it("plans the dependencies each layer is missing", async () => {
        const response = await architect.process(
            {
                action: "validate_deployment",
                requirements: {
                    app_name: "tracker",
                    port: 8080,
                    environment: "staging",
                    stack: { frontend: "react", backend: "fastapi" },
                },
            },
            ctx
        )

        expect(response.status).toBe("valid")
        expect(response.configuration).toEqual({
            app_name: "tracker",
            port: 8080,
            environment: "staging",
            stack: { frontend: "react", backend: "fastapi" },
        })
        expect(response.tasks).toEqual([
            { action: "update_dependencies", domain: "frontend", dependencies: ["@tanstack/react-query"] },
            { action: "update_dependencies", domain: "backend", dependencies: ["sqlalchemy"] },
        ])
    })

    it("rejects incomplete or out-of-range deployment settings", async () => {
        const base = { app_name: "tracker", port: 8080, environment: "staging", stack: {} }
        const attempt = (requirements: JsonObject) =>
            architect.process({ action: "validate_deployment", requirements }, ctx)

        await expect(attempt({ app_name: "tracker", environment: "staging", stack: {} })).rejects.toMatchObject({
            kind: "invalid_deployment",
            message: "Missing required field: port",
            retryable: false,
        })
        await expect(attempt({ ...base, port: 80 })).rejects.toMatchObject({
            message: "Invalid port number. Must be between 1024 and 65535",
        })
        await expect(attempt({ ...base, environment: "qa" })).rejects.toMatchObject({
            message: "Invalid environment. Must be one of: development, staging, production",
        })
    })

    it("stays inside the project root", async () => {
        await expect(
            architect.process({ action: "analyze_structure", path: "../elsewhere" }, ctx)
        ).rejects.toMatchObject({ kind: "invalid_path" })
    })
})

describe("ReviewerAgent", () => {
    const reviewer = new ReviewerAgent(rules)

    it("approves clean files with the code review checker", async () => {
        const response = await reviewer.process(
            {
                action: "review_code",
                files: [
                    { path: "src/components/Card.tsx", content: "export const Card = () => null\n" },
                    { path: "src/components/Card.test.tsx", content: "" },
                ],
            },
            ctx
        )
        expect(response).toEqual({
            review: { review_type: "code_review", approved: true, issues: [] },
        })
    })

    it("fails with the required fixes as feedback", async () => {
        const failure = reviewer.process(
            {
                action: "verify_fix",
                review_type: "security",
                files: [{ path: "src/components/Card.tsx", content: "eval(input)\n" }],
            },
            ctx
        )
        await expect(failure).rejects.toBeInstanceOf(AgentFailure)
        await expect(failure).rejects.toMatchObject({
            kind: "review_rejected",
            feedback: [
                {
                    rule: "security",
                    location: "src/components/Card.tsx:1",
                    severity: "critical",
                    message: "Use of eval()",
                    suggestedFix: "Parse the input explicitly instead of evaluating it",
                },
            ],
        })
    })

    it("defaults verify_fix to domain validation", async () => {
        const failure = reviewer.process(
            { action: "verify_fix", files: ["lib/outside.ts"] },
            ctx
        )
        await expect(failure).rejects.toMatchObject({
            feedback: [expect.objectContaining({ rule: "domain_boundary" })],
        })
    })

    it("maps an unknown review type to a structured failure", async () => {
        const sealed = new ReviewerAgent(rules, { gate: new ReviewGate().seal() })
        await expect(
            sealed.process({ action: "review_code", review_type: "vibes", files: [] }, ctx)
        ).rejects.toMatchObject({ kind: "unknown_review_type", retryable: false })
    })
})

describe("createReferenceAgents", () => {
    it("names the three reference agents", () => {
        expect(createReferenceAgents(rules).map((a) => a.name)).toEqual([
            "architect",
            "developer",
            "reviewer",
        ])
    })
})
