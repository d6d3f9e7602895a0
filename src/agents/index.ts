import type { RuleSet } from "../types.js"
import type { Agent } from "./Agent.js"
import { ArchitectAgent } from "./ArchitectAgent.js"
import { DeveloperAgent } from "./DeveloperAgent.js"
import { ReviewerAgent } from "./ReviewerAgent.js"

export { AgentRegistry } from "./Agent.js"
export type { Agent, AgentContext } from "./Agent.js"
export { ArchitectAgent, type ArchitectAgentOptions } from "./ArchitectAgent.js"
export { DeveloperAgent, type DeveloperAgentOptions } from "./DeveloperAgent.js"
export { ReviewerAgent, type ReviewerAgentOptions } from "./ReviewerAgent.js"

export interface ReferenceAgentOptions {
    outputDirectory?: string
    projectRoot?: string
}

/** The architect, developer and reviewer agents bound to one rule set. */
export function createReferenceAgents(
    rules: RuleSet,
    options: ReferenceAgentOptions = {}
): Agent[] {
    return [
        new ArchitectAgent(rules, { projectRoot: options.projectRoot }),
        new DeveloperAgent(rules, { outputDirectory: options.outputDirectory }),
        new ReviewerAgent(rules),
    ]
}
