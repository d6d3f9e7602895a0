import { z } from "zod"

import type { JsonObject, JsonValue } from "../types.js"

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(jsonValueSchema),
        z.record(jsonValueSchema),
    ])
)

export const jsonObjectSchema = z.record(jsonValueSchema)

export function isJsonObject(value: unknown): value is JsonObject {
    return value !== null && typeof value === "object" && !Array.isArray(value)
}
