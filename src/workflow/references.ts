import { UnresolvedReferenceError } from "../core/errors.js"
import type { JsonObject, JsonValue, RunContext } from "../types.js"

const WHOLE_TEMPLATE = /^\{\{\s*([\w][\w.-]*)\s*\}\}$/
const EMBEDDED_TEMPLATE = /\{\{\s*([\w][\w.-]*)\s*\}\}/g

function isRefObject(value: JsonValue): value is { $ref: string } {
    return (
        typeof value === "object" &&
        value !== null &&
        !Array.isArray(value) &&
        Object.keys(value).length === 1 &&
        typeof value.$ref === "string"
    )
}

export function rootKey(path: string): string {
    const dot = path.indexOf(".")
    return dot === -1 ? path : path.slice(0, dot)
}

/**
 * Every reference path inside a params tree, in document order. Paths
 * may be dotted; `rootKey` gives the context key they depend on.
 */
export function collectReferences(value: JsonValue): string[] {
    const found: string[] = []
    const visit = (node: JsonValue): void => {
        if (typeof node === "string") {
            for (const match of node.matchAll(EMBEDDED_TEMPLATE)) {
                found.push(match[1])
            }
            return
        }
        if (Array.isArray(node)) {
            node.forEach(visit)
            return
        }
        if (node !== null && typeof node === "object") {
            if (isRefObject(node)) {
                found.push(node.$ref)
                return
            }
            Object.values(node).forEach(visit)
        }
    }
    visit(value)
    return found
}

function lookup(path: string, context: RunContext): JsonValue {
    const [head, ...rest] = path.split(".")
    if (!context.has(head)) throw new UnresolvedReferenceError(path)
    let current: JsonValue | undefined = context.get(head)
    for (const part of rest) {
        if (Array.isArray(current) && /^\d+$/.test(part)) {
            current = current[Number(part)]
        } else if (
            current !== null &&
            typeof current === "object" &&
            !Array.isArray(current) &&
            Object.hasOwn(current, part)
        ) {
            current = current[part]
        } else {
            current = undefined
        }
        if (current === undefined) throw new UnresolvedReferenceError(path)
    }
    // agents get their own copy; the run context stays untouched
    return structuredClone(current ?? null)
}

function stringify(value: JsonValue): string {
    return typeof value === "string" ? value : JSON.stringify(value)
}

/**
 * Substitute context values into a params tree. `{ $ref: "x" }` and a
 * string that is exactly `"{{x}}"` take the raw value; templates inside
 * longer strings are interpolated as text.
 */
export function resolveValue(value: JsonValue, context: RunContext): JsonValue {
    if (typeof value === "string") {
        const whole = WHOLE_TEMPLATE.exec(value)
        if (whole) return lookup(whole[1], context)
        return value.replace(EMBEDDED_TEMPLATE, (_match, path: string) =>
            stringify(lookup(path, context))
        )
    }
    if (Array.isArray(value)) {
        return value.map((item) => resolveValue(item, context))
    }
    if (value !== null && typeof value === "object") {
        if (isRefObject(value)) return lookup(value.$ref, context)
        return resolveParams(value, context)
    }
    return value
}

export function resolveParams(
    params: JsonObject,
    context: RunContext
): JsonObject {
    const resolved: JsonObject = {}
    for (const [key, value] of Object.entries(params)) {
        resolved[key] = resolveValue(value, context)
    }
    return resolved
}
