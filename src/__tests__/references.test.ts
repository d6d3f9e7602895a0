import { describe, expect, it } from "vitest"

import { UnresolvedReferenceError } from "../core/errors.js"
import type { JsonValue, RunContext } from "../types.js"
import { collectReferences, resolveParams, rootKey } from "../workflow/references.js"

const context: RunContext = new Map<string, JsonValue>([
    ["ref", 1],
    ["architecture", { frontend: { framework: "react" }, layers: ["ui", "api"] }],
    ["name", "Card"],
])

describe("collectReferences", () => {
    it("finds $ref objects and templates at any depth", () => {
        expect(
            collectReferences({
                a: { $ref: "ref" },
                b: ["x", "{{ architecture.frontend }}"],
                c: { nested: "Hello {{name}} and {{ref}}" },
            })
        ).toEqual(["ref", "architecture.frontend", "name", "ref"])
    })

    it("treats an object with other keys as plain data", () => {
        expect(collectReferences({ a: { $ref: "ref", extra: true } })).toEqual([])
    })

    it("gives the context key of a dotted path", () => {
        expect(rootKey("architecture.frontend.framework")).toBe("architecture")
        expect(rootKey("ref")).toBe("ref")
    })
})

describe("resolveParams", () => {
    it("substitutes typed values for whole references", () => {
        expect(
            resolveParams(
                {
                    id: { $ref: "ref" },
                    stack: "{{architecture.frontend}}",
                    first: { $ref: "architecture.layers.0" },
                    fixed: 3,
                },
                context
            )
        ).toEqual({
            id: 1,
            stack: { framework: "react" },
            first: "ui",
            fixed: 3,
        })
    })

    it("interpolates embedded templates as text", () => {
        expect(
            resolveParams(
                { title: "{{name}} #{{ref}}", json: "layers={{architecture.layers}}" },
                context
            )
        ).toEqual({ title: "Card #1", json: 'layers=["ui","api"]' })
    })

    it("leaves params without references untouched", () => {
        const params = { list: [1, "two", null], flag: false }
        expect(resolveParams(params, context)).toEqual(params)
    })

    it("throws for a missing key or path", () => {
        expect(() => resolveParams({ a: { $ref: "missing" } }, context)).toThrow(
            UnresolvedReferenceError
        )
        expect(() => resolveParams({ a: "{{architecture.backend}}" }, context)).toThrow(
            "Unresolved context reference: architecture.backend"
        )
    })

    it("only follows properties the value owns", () => {
        expect(() => resolveParams({ a: { $ref: "architecture.constructor" } }, context)).toThrow(
            "Unresolved context reference: architecture.constructor"
        )
        expect(() => resolveParams({ a: "{{architecture.layers.length}}" }, context)).toThrow(
            UnresolvedReferenceError
        )
    })

    it("hands out copies of context values", () => {
        const resolved = resolveParams({ arch: { $ref: "architecture" } }, context)
        const arch = resolved.arch
        if (arch === null || typeof arch !== "object" || Array.isArray(arch)) {
            throw new Error("expected an object")
        }
        arch.layers = []

        expect(context.get("architecture")).toEqual({
            frontend: { framework: "react" },
            layers: ["ui", "api"],
        })
    })
})
