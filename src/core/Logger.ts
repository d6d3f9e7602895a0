import createDebug from "debug"

const APP_PREFIX = "stepwright"

/**
 * Create a namespaced logger instance.
 * All loggers are prefixed with the APP_PREFIX for easy filtering.
 *
 * @param namespace - The subsystem name (e.g., "engine", "store")
 */
export function createLogger(namespace: string): createDebug.Debugger {
    return createDebug(`${APP_PREFIX}:${namespace}`)
}

/**
 * Usage:
 * ```typescript
 * import { log } from "./core/Logger.js"
 * log.engine("Run %s started", runId)
 * ```
 *
 * Enable via env: `DEBUG=stepwright:*`
 * Enable specific: `DEBUG=stepwright:engine,stepwright:review`
 */
export const log = {
    engine: createLogger("engine"),
    executor: createLogger("executor"),
    review: createLogger("review"),
    store: createLogger("store"),
    agents: createLogger("agents"),
    config: createLogger("config"),
}
