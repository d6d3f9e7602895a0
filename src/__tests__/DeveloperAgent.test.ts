import { mkdtemp, readFile, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import { afterEach, beforeEach, describe, expect, it } from "vitest"

import type { AgentContext } from "../agents/Agent.js"
import { DeveloperAgent } from "../agents/DeveloperAgent.js"
import { AgentFailure } from "../core/errors.js"
import type { JsonObject, JsonValue } from "../types.js"
import { parseProjectConfig } from "../workflow/definitions.js"

const { rules } = parseProjectConfig({
    domains: {
        frontend: {
            directories: ["src/components/"],
            naming_conventions: { components: "PascalCase" },
            require_tests: true,
        },
        backend: {
            directories: ["api/"],
            naming_conventions: { components: "snake_case", modules: "snake_case" },
            require_tests: false,
        },
    },
})

const ctx: AgentContext = { runId: "run-1", stepIndex: 0 }

function paths(response: JsonObject): JsonValue[] {
    const files = response.files
    if (!Array.isArray(files)) return []
    return files.map((f) => (f !== null && typeof f === "object" && !Array.isArray(f) ? f.path : f))
}

describe("DeveloperAgent", () => {
    const agent = new DeveloperAgent(rules)

    it("creates a component with a generated test", async () => {
        const response = await agent.process(
            {
                action: "create_component",
                component: {
                    name: "UserCard",
                    files: [{ path: "src/components/UserCard.tsx", content: "export const UserCard = () => null\n" }],
                },
            },
            ctx
        )

        expect(response.domain).toBe("frontend")
        expect(response.component).toBe("UserCard")
        expect(paths(response)).toEqual([
            "src/components/UserCard.tsx",
            "src/components/UserCard.test.tsx",
        ])
    })

    it("skips tests when the domain does not require them", async () => {
        const response = await agent.process(
            {
                action: "create_component",
                component: { name: "user_store", domain: "backend", files: [{ path: "api/user_store.py" }] },
            },
            ctx
        )
        expect(paths(response)).toEqual(["api/user_store.py"])
    })

    it("rejects unknown domains and names off convention", async () => {
        await expect(
            agent.process(
                { action: "create_component", component: { name: "X", files: [{ path: "lib/x.ts" }] } },
                ctx
            )
        ).rejects.toMatchObject({ kind: "unknown_domain", retryable: false })

        await expect(
            agent.process(
                { action: "create_component", component: { name: "userCard", domain: "frontend" } },
                ctx
            )
        ).rejects.toMatchObject({ kind: "naming_convention", retryable: false })
    })

    it("does not take inherited names for domains", async () => {
        await expect(
            agent.process(
                { action: "create_component", component: { name: "Card", domain: "toString" } },
                ctx
            )
        ).rejects.toMatchObject({ kind: "unknown_domain" })

        await expect(
            agent.process(
                { action: "implement_feature", feature: { domain: "constructor" } },
                ctx
            )
        ).rejects.toMatchObject({
            kind: "unknown_domain",
            message: 'Feature domain "constructor" is not defined',
        })
    })

    it("keeps files inside their domain", async () => {
        await expect(
            agent.process(
                {
                    action: "create_component",
                    component: { name: "Card", domain: "frontend", files: [{ path: "api/card.py" }] },
                },
                ctx
            )
        ).rejects.toMatchObject({ kind: "domain_boundary" })
    })

    it("applies naming and coverage fixes on remediation", async () => {
        const response = await agent.process(
            {
                action: "create_component",
                component: { name: "user_store", domain: "backend", files: [{ path: "api/UserStore.py" }] },
                required_fixes: [
                    {
                        rule: "naming_convention",
                        location: "api/UserStore.py",
                        severity: "error",
                        message: 'File name "UserStore" should use snake_case',
                    },
                    {
                        rule: "test_coverage",
                        location: "tests",
                        severity: "error",
                        message: "Test coverage (0%) is below threshold (80%)",
                    },
                ],
            },
            ctx
        )

        expect(paths(response)).toEqual(["api/user_store.py", "api/test_user_store.py"])
    })

    it("implements a feature across created and updated components", async () => {
        const response = await agent.process(
            {
                action: "implement_feature",
                feature: {
                    domain: "frontend",
                    components: [{ name: "Sidebar", files: [{ path: "src/components/Sidebar.tsx" }] }],
                    updates: [{ name: "header", files: [{ path: "src/components/Header.tsx" }] }],
                },
            },
            ctx
        )

        expect(response.created).toEqual([
            "src/components/Sidebar.tsx",
            "src/components/Sidebar.test.tsx",
        ])
        expect(response.updated).toEqual([
            "src/components/Header.tsx",
            "src/components/Header.test.tsx",
        ])
    })

    it("fixes an issue and adds tests on request", async () => {
        const response = await agent.process(
            {
                action: "fix_issue",
                issue: { files: [{ path: "api/jobs.py", content: "x = 1\n" }], update_tests: true },
            },
            ctx
        )

        expect(paths(response)).toEqual(["api/jobs.py", "api/test_jobs.py"])
        expect(response.domain).toBe("backend")
    })

    it("fails a malformed request without retry", async () => {
        const failure = agent.process({ action: "fix_issue", issue: { files: [] } }, ctx)
        await expect(failure).rejects.toBeInstanceOf(AgentFailure)
        await expect(failure).rejects.toMatchObject({ kind: "invalid_request", retryable: false })
    })

    it("refuses actions it does not handle", async () => {
        await expect(agent.process({ action: "review_code" }, ctx)).rejects.toMatchObject({
            kind: "unsupported_action",
        })
    })

    describe("with an output directory", () => {
        let tempDir: string

        beforeEach(async () => {
            tempDir = await mkdtemp(join(tmpdir(), "stepwright-dev-"))
        })

        afterEach(async () => {
            await rm(tempDir, { recursive: true, force: true })
        })

        it("writes the produced files", async () => {
            const writer = new DeveloperAgent(rules, { outputDirectory: tempDir })
            await writer.process(
                {
                    action: "fix_issue",
                    issue: { files: [{ path: "api/jobs.py", content: "x = 1\n" }] },
                },
                ctx
            )

            expect(await readFile(join(tempDir, "api/jobs.py"), "utf-8")).toBe("x = 1\n")
        })

        it("refuses paths that leave the directory", async () => {
            const writer = new DeveloperAgent(rules, { outputDirectory: tempDir })
            await expect(
                writer.process(
                    { action: "fix_issue", issue: { files: [{ path: "../escape.py" }] } },
                    ctx
                )
            ).rejects.toMatchObject({ kind: "invalid_path" })
        })
    })
})
