#!/usr/bin/env node

import { readFile } from "node:fs/promises"
import { join, resolve } from "node:path"

import chalk from "chalk"
import { Command, InvalidArgumentError } from "commander"

import { ConfigError, StepwrightError, toError } from "./core/errors.js"
import { isJsonObject } from "./core/json.js"
import { Stepwright } from "./index.js"
import type { JsonObject, RendererType, RunReport, StepwrightConfig } from "./types.js"
import { parseDocument } from "./workflow/definitions.js"

const DEFAULT_PROJECT_FILE = "stepwright.yaml"

interface CommonOptions {
    config: string
    cwd?: string
    renderer: string
    verbose?: boolean
}

interface RunCommandOptions extends CommonOptions {
    input?: string
    outputDir?: string
    maxRetries?: number
    maxReviewCycles?: number
    timeout?: number
}

async function loadEnvFile(cwd: string): Promise<void> {
    let content: string
    try {
        content = await readFile(join(cwd, ".env"), "utf-8")
    } catch {
        return
    }
    for (const line of content.split("\n")) {
        const trimmed = line.replace(/^export\s+/, "").trim()
        if (!trimmed || trimmed.startsWith("#")) continue
        const eqIndex = trimmed.indexOf("=")
        if (eqIndex === -1) continue
        const key = trimmed.slice(0, eqIndex)
        if (process.env[key] === undefined) {
            process.env[key] = trimmed.slice(eqIndex + 1)
        }
    }
}

function parseCount(value: string): number {
    const parsed = Number.parseInt(value, 10)
    if (Number.isNaN(parsed) || parsed < 0) {
        throw new InvalidArgumentError("Expected a non-negative integer.")
    }
    return parsed
}

function parseRenderer(value: string): RendererType {
    if (value === "log" || value === "none") return value
    throw new ConfigError(`Unknown renderer "${value}" (expected log or none)`)
}

async function readInput(path: string | undefined): Promise<JsonObject> {
    if (!path) return {}
    let text: string
    try {
        text = await readFile(path, "utf-8")
    } catch (error) {
        throw new ConfigError(
            `Cannot read input file ${path}: ${toError(error).message}`,
            toError(error)
        )
    }
    const input = parseDocument(text, path)
    if (!isJsonObject(input)) {
        throw new ConfigError(`${path}: input must be a mapping of keys to values`)
    }
    return input
}

async function open(
    options: CommonOptions,
    overrides: Partial<StepwrightConfig> = {}
): Promise<{ app: Stepwright; renderer: RendererType }> {
    const workingDirectory = options.cwd ? resolve(options.cwd) : process.cwd()
    await loadEnvFile(workingDirectory)
    const renderer = parseRenderer(options.renderer)
    const config: StepwrightConfig = {
        workingDirectory,
        persistencePath: process.env.STEPWRIGHT_STATE_DIR,
        renderer,
        verbose: options.verbose ?? false,
        ...overrides,
    }
    const app = await Stepwright.fromProjectFile(
        resolve(workingDirectory, options.config),
        config
    )
    return { app, renderer }
}

function printReport(report: RunReport, renderer: RendererType): void {
    if (renderer === "none") {
        console.log(JSON.stringify(report, null, 2))
        return
    }
    const color =
        report.status === "succeeded"
            ? chalk.green
            : report.status === "aborted"
              ? chalk.yellow
              : chalk.red
    console.log(`\nRun:    ${report.runId}`)
    console.log(`Status: ${color(report.status)}`)
    console.log(`Steps:  ${report.steps.length} attempt(s) recorded`)
    if (report.failure) {
        console.error(
            `\nStep ${report.failure.stepIndex} (${report.failure.stepId}) failed with ${report.failure.kind}: ${report.failure.message}`
        )
    }
    if (report.lastReview) {
        for (const issue of report.lastReview.requiredFixes) {
            console.error(
                `  ${chalk.red(issue.severity)} ${issue.rule} at ${issue.location}: ${issue.message}`
            )
        }
    }
    if (report.recoveryOptions?.length) {
        console.error("\nRecovery options:")
        for (const option of report.recoveryOptions) {
            console.error(`  ${option.action.padEnd(11)} ${option.description}`)
        }
    }
}

function addCommonOptions(command: Command): Command {
    return command
        .option("-c, --config <file>", "Project file", DEFAULT_PROJECT_FILE)
        .option("--cwd <path>", "Working directory (defaults to current directory)")
        .option("--renderer <type>", "Output renderer (log, none)", "log")
        .option("--verbose", "Log every attempt and review")
}

const program = new Command()

program
    .name("stepwright")
    .description("Run agent workflows with review gates and resumable state")
    .version("0.1.0")

addCommonOptions(
    program
        .command("run")
        .description("Run a workflow from the project file")
        .argument("<workflow>", "Workflow name")
        .option("-i, --input <file>", "Initial context (YAML or JSON mapping)")
        .option("-o, --output-dir <path>", "Also write produced files below this directory")
        .option("--max-retries <n>", "Retries per step for transient failures", parseCount)
        .option("--max-review-cycles <n>", "Remediation cycles per step", parseCount)
        .option("--timeout <ms>", "Agent call timeout in milliseconds", parseCount)
).action(async (workflow: string, options: RunCommandOptions) => {
    const { app, renderer } = await open(options, {
        outputDirectory: options.outputDir ? resolve(options.outputDir) : undefined,
        maxRetries: options.maxRetries,
        maxReviewCycles: options.maxReviewCycles,
        agentTimeoutMs: options.timeout,
    })
    const input = await readInput(options.input)

    process.on("SIGINT", () => {
        console.error(chalk.yellow("\nAborting at the next step boundary..."))
        app.abort()
    })

    const report = await app.run(workflow, input)
    printReport(report, renderer)
    process.exitCode = report.status === "succeeded" ? 0 : 1
})

addCommonOptions(
    program
        .command("validate")
        .description("Check workflows without invoking any agent")
        .argument("[workflow]", "Workflow name (defaults to all)")
        .option("-i, --input <file>", "Initial context keys to assume")
).action(async (workflow: string | undefined, options: CommonOptions & { input?: string }) => {
    const { app } = await open(options)
    const reports = app.validate(workflow, await readInput(options.input))
    for (const report of reports) {
        if (report.valid) {
            console.log(`${chalk.green("✓")} ${report.workflow}`)
            continue
        }
        console.log(`${chalk.red("✗")} ${report.workflow}`)
        for (const issue of report.issues) {
            console.log(`    ${issue.code.padEnd(22)} ${issue.location}  ${issue.message}`)
        }
    }
    process.exitCode = reports.every((r) => r.valid) ? 0 : 1
})

addCommonOptions(
    program
        .command("resume")
        .description("Continue a failed or aborted run in a new run")
        .argument("<runId>", "Run id")
        .option("--skip", "Skip the failed step (optional steps only)")
).action(async (runId: string, options: CommonOptions & { skip?: boolean }) => {
    const { app, renderer } = await open(options)
    process.on("SIGINT", () => app.abort())
    const report = await app.resume(runId, options.skip ? "skip-step" : "retry-step")
    printReport(report, renderer)
    process.exitCode = report.status === "succeeded" ? 0 : 1
})

addCommonOptions(
    program
        .command("show")
        .description("Print the stored state of a run")
        .argument("[runId]", "Run id (lists runs when omitted)")
).action(async (runId: string | undefined, options: CommonOptions) => {
    const { app } = await open(options)
    if (!runId) {
        for (const id of await app.listRuns()) console.log(id)
        return
    }
    console.log(JSON.stringify(await app.show(runId), null, 2))
})

program.parseAsync().catch((error: unknown) => {
    const err = toError(error)
    const code = err instanceof StepwrightError ? ` [${err.code}]` : ""
    console.error(`${chalk.red("Error")}${code}: ${err.message}`)
    process.exit(1)
})
