import { ConfigError, UnknownAgentError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { JsonObject } from "../types.js"

export interface AgentContext {
    runId: string
    stepIndex: number
    signal?: AbortSignal
}

/**
 * An opaque capability. `process` resolves with a response mapping or
 * rejects, preferably with an `AgentFailure` so the engine can tell
 * transient failures from permanent ones.
 */
export interface Agent {
    readonly name: string
    process(request: JsonObject, context: AgentContext): Promise<JsonObject>
}

/** Name → agent table, built once at startup and read-only afterwards. */
export class AgentRegistry {
    private readonly agents: Map<string, Agent> = new Map()
    private sealed = false

    constructor(agents: Agent[] = []) {
        for (const agent of agents) this.register(agent)
    }

    public register(agent: Agent): this {
        if (this.sealed) {
            throw new ConfigError(
                `Agent registry is sealed; cannot register "${agent.name}"`
            )
        }
        this.agents.set(agent.name, agent)
        log.agents("Registered agent %s", agent.name)
        return this
    }

    public seal(): this {
        this.sealed = true
        return this
    }

    public has(name: string): boolean {
        return this.agents.has(name)
    }

    public resolve(name: string): Agent {
        const agent = this.agents.get(name)
        if (!agent) throw new UnknownAgentError(name)
        return agent
    }
}
