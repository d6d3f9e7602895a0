import { mkdtemp, readdir, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import { afterEach, beforeEach, describe, expect, it } from "vitest"

import { FileStore } from "../persistence/FileStore.js"

describe("FileStore", () => {
    let store: FileStore
    let tempDir: string

    beforeEach(async () => {
        tempDir = await mkdtemp(join(tmpdir(), "stepwright-store-"))
        store = new FileStore(tempDir)
    })

    afterEach(async () => {
        await rm(tempDir, { recursive: true, force: true })
    })

    it("should write and read data", async () => {
        const data = { name: "test", value: 42 }
        await store.write("test-key", data)
        expect(await store.read("test-key")).toEqual(data)
    })

    it("should return null for non-existent keys", async () => {
        expect(await store.read("does-not-exist")).toBeNull()
    })

    it("should check existence correctly", async () => {
        expect(await store.exists("missing")).toBe(false)
        await store.write("present", { ok: true })
        expect(await store.exists("present")).toBe(true)
    })

    it("should handle nested keys and list them", async () => {
        await store.write("runs/b-2", { n: 2 })
        await store.write("runs/a-1", { n: 1 })
        expect(await store.read("runs/a-1")).toEqual({ n: 1 })
        expect(await store.list("runs")).toEqual(["runs/a-1", "runs/b-2"])
    })

    it("should list nothing under a missing prefix", async () => {
        expect(await store.list("runs")).toEqual([])
    })

    it("should overwrite existing data without leaving temp files", async () => {
        await store.write("key", { version: 1 })
        await store.write("key", { version: 2 })
        expect(await store.read("key")).toEqual({ version: 2 })
        expect(await readdir(tempDir)).toEqual(["key.json"])
    })

    it("should reject keys that escape the base path", async () => {
        await expect(store.write("../outside", {})).rejects.toMatchObject({
            code: "INVALID_KEY",
        })
    })
})
