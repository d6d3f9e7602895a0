import type { Agent, AgentContext } from "../../agents/Agent.js"
import type { JsonObject, StepSpec, WorkflowDefinition } from "../../types.js"

export type Reply =
    | JsonObject
    | Error
    | ((request: JsonObject, context: AgentContext) => JsonObject | Promise<JsonObject>)

/**
 * Answers each call with the next scripted reply; the last reply repeats
 * once the script runs out. Every request is recorded.
 */
export class ScriptedAgent implements Agent {
    public readonly name: string
    public readonly requests: JsonObject[] = []
    private readonly replies: Reply[]

    constructor(name: string, replies: Reply[]) {
        this.name = name
        this.replies = replies
    }

    public async process(request: JsonObject, context: AgentContext): Promise<JsonObject> {
        this.requests.push(request)
        const reply = this.replies[Math.min(this.requests.length, this.replies.length) - 1]
        if (reply instanceof Error) throw reply
        if (typeof reply === "function") return reply(request, context)
        return reply
    }
}

/** Never settles; only a timeout ends the call. */
export class HangingAgent implements Agent {
    public readonly name: string
    public calls = 0

    constructor(name: string) {
        this.name = name
    }

    public process(): Promise<JsonObject> {
        this.calls++
        return new Promise<JsonObject>(() => {})
    }
}

export function step(
    spec: Pick<StepSpec, "type" | "agent"> & Partial<StepSpec>
): StepSpec {
    return { params: {}, requireReview: false, outputs: [], ...spec }
}

export function workflow(name: string, steps: StepSpec[]): WorkflowDefinition {
    return { name, steps }
}
