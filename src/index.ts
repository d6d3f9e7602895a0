import { join } from "node:path"

import { AgentRegistry, type Agent } from "./agents/Agent.js"
import { createReferenceAgents } from "./agents/index.js"
import { DEFAULT_PERSISTENCE_DIR } from "./core/Config.js"
import { ConfigError, RunNotFoundError, type ValidationReport } from "./core/errors.js"
import { log } from "./core/Logger.js"
import {
    Orchestrator,
    toRunReport,
} from "./orchestrator/Orchestrator.js"
import { FileStore } from "./persistence/FileStore.js"
import { FileStateStore, type StateStore } from "./persistence/StateStore.js"
import { createRenderer } from "./renderer/index.js"
import { ReviewGate } from "./review/ReviewGate.js"
import type {
    EngineSettings,
    JsonObject,
    RecoveryAction,
    RunReport,
    StepwrightConfig,
    WorkflowDefinition,
    WorkflowState,
} from "./types.js"
import { loadProjectFile, type ProjectConfig } from "./workflow/definitions.js"
import { StepTypeRegistry } from "./workflow/stepTypes.js"

export interface StepwrightOptions {
    config: StepwrightConfig
    project: ProjectConfig
    /** Registered after the reference agents; a matching name replaces one. */
    agents?: Agent[]
    store?: StateStore
}

/** Project-level entry point: loaded workflows, reference agents and a run store. */
export class Stepwright {
    private readonly config: StepwrightConfig
    private readonly project: ProjectConfig
    private readonly orchestrator: Orchestrator
    private readonly controllers: Set<AbortController> = new Set()

    constructor(options: StepwrightOptions) {
        this.config = options.config
        this.project = options.project

        const byName = new Map<string, Agent>()
        const agents = [
            ...createReferenceAgents(options.project.rules, {
                outputDirectory: options.config.outputDirectory,
                projectRoot: options.config.workingDirectory,
            }),
            ...(options.agents ?? []),
        ]
        for (const agent of agents) byName.set(agent.name, agent)

        this.orchestrator = new Orchestrator({
            agents: new AgentRegistry([...byName.values()]).seal(),
            reviewGate: new ReviewGate().seal(),
            stepTypes: new StepTypeRegistry().seal(),
            rules: options.project.rules,
            store:
                options.store ??
                new FileStateStore(
                    new FileStore(
                        options.config.persistencePath ??
                            join(options.config.workingDirectory, DEFAULT_PERSISTENCE_DIR)
                    )
                ),
            settings: mergeSettings(options.project.engine, options.config),
        })
    }

    public static async fromProjectFile(
        filePath: string,
        config: StepwrightConfig,
        extra: Omit<StepwrightOptions, "config" | "project"> = {}
    ): Promise<Stepwright> {
        const project = await loadProjectFile(filePath)
        return new Stepwright({ ...extra, config, project })
    }

    public getOrchestrator(): Orchestrator {
        return this.orchestrator
    }

    public workflowNames(): string[] {
        return Object.keys(this.project.workflows)
    }

    public workflow(name: string): WorkflowDefinition {
        const definition = Object.hasOwn(this.project.workflows, name)
            ? this.project.workflows[name]
            : undefined
        if (!definition) {
            throw new ConfigError(
                `Unknown workflow "${name}". Available: ${this.workflowNames().join(", ") || "(none)"}`
            )
        }
        return definition
    }

    /** Validate one workflow, or every workflow of the project. */
    public validate(name?: string, input: JsonObject = {}): ValidationReport[] {
        const names = name ? [name] : this.workflowNames()
        return names.map((n) => this.orchestrator.validate(this.workflow(n), input))
    }

    public async run(name: string, input: JsonObject = {}): Promise<RunReport> {
        const definition = this.workflow(name)
        return this.withRun((signal) =>
            this.orchestrator.run(definition, input, { signal })
        )
    }

    public async resume(
        runId: string,
        action: Exclude<RecoveryAction, "abort-run"> = "retry-step"
    ): Promise<RunReport> {
        const previous = await this.show(runId)
        const definition = this.workflow(previous.definitionName)
        return this.withRun((signal) =>
            this.orchestrator.resume(runId, definition, { action, signal })
        )
    }

    public async show(runId: string): Promise<WorkflowState> {
        const state = await this.orchestrator.getStore().load(runId)
        if (!state) throw new RunNotFoundError(runId)
        return state
    }

    public listRuns(): Promise<string[]> {
        return this.orchestrator.getStore().list()
    }

    /** Cancel every active run at its next step boundary. */
    public abort(): void {
        for (const controller of this.controllers) controller.abort()
    }

    private async withRun(
        start: (signal: AbortSignal) => Promise<WorkflowState>
    ): Promise<RunReport> {
        const controller = new AbortController()
        this.controllers.add(controller)
        const renderer = createRenderer(this.config.renderer ?? "log", {
            verbose: this.config.verbose,
        })
        renderer?.attach(this.orchestrator.getEventBus())
        try {
            const state = await start(controller.signal)
            log.engine("Run %s finished: %s", state.runId, state.status)
            return toRunReport(state)
        } finally {
            renderer?.detach()
            this.controllers.delete(controller)
        }
    }
}

/** Explicit settings win over the project file's `engine` section. */
export function mergeSettings(
    project: EngineSettings,
    overrides: EngineSettings
): EngineSettings {
    return {
        maxRetries: overrides.maxRetries ?? project.maxRetries,
        maxReviewCycles: overrides.maxReviewCycles ?? project.maxReviewCycles,
        agentTimeoutMs: overrides.agentTimeoutMs ?? project.agentTimeoutMs,
        reviewTimeoutMs: overrides.reviewTimeoutMs ?? project.reviewTimeoutMs,
        stepPolicies: { ...project.stepPolicies, ...overrides.stepPolicies },
    }
}

export {
    AgentRegistry,
    ArchitectAgent,
    DeveloperAgent,
    ReviewerAgent,
    createReferenceAgents,
} from "./agents/index.js"
export type { Agent, AgentContext } from "./agents/index.js"
export * from "./core/errors.js"
export { EventBus } from "./events/EventBus.js"
export type { StepwrightEvent } from "./events/types.js"
export { Orchestrator, toRunReport } from "./orchestrator/Orchestrator.js"
export type { OrchestratorConfig, ResumeOptions, RunOptions } from "./orchestrator/Orchestrator.js"
export { FileStateStore, MemoryStateStore } from "./persistence/StateStore.js"
export type { StateStore, WriteLease } from "./persistence/StateStore.js"
export { ReviewGate } from "./review/ReviewGate.js"
export type { ReviewChecker } from "./review/checkers.js"
export { StepExecutor } from "./workflow/StepExecutor.js"
export { StepTypeRegistry, type StepTypeHandler } from "./workflow/stepTypes.js"
export {
    loadProjectFile,
    parseProjectConfig,
    parseWorkflowDefinition,
    type ProjectConfig,
} from "./workflow/definitions.js"
export type * from "./types.js"
