import { randomUUID } from "node:crypto"
import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises"
import { dirname, join } from "node:path"

import { StepwrightError, toError } from "../core/errors.js"
import { log } from "../core/Logger.js"

const KEY_PATTERN = /^[\w-]+(\/[\w-]+)*$/

/** JSON documents on disk, one file per key, written atomically. */
export class FileStore {
    private readonly basePath: string

    constructor(basePath: string) {
        this.basePath = basePath
    }

    public async write(key: string, data: unknown): Promise<void> {
        const filePath = this.keyToPath(key)
        const tempPath = `${filePath}.tmp.${randomUUID()}`
        const content = JSON.stringify(data, null, 2)

        await mkdir(dirname(filePath), { recursive: true })

        try {
            await writeFile(tempPath, content, "utf-8")
            await rename(tempPath, filePath)
        } catch (error) {
            log.store("Failed to write %s: %s", key, toError(error).message)
            await rm(tempPath, { force: true })
            throw error
        }
    }

    public async read(key: string): Promise<unknown> {
        const filePath = this.keyToPath(key)
        let content: string
        try {
            content = await readFile(filePath, "utf-8")
        } catch (error) {
            if (isNotFound(error)) return null
            log.store("Failed to read %s: %s", key, toError(error).message)
            throw error
        }
        return JSON.parse(content)
    }

    public async exists(key: string): Promise<boolean> {
        return (await this.read(key)) !== null
    }

    /** Keys directly under `prefix`, without the `.json` suffix. */
    public async list(prefix: string): Promise<string[]> {
        try {
            const entries = await readdir(join(this.basePath, prefix))
            return entries
                .filter((name) => name.endsWith(".json"))
                .map((name) => `${prefix}/${name.slice(0, -".json".length)}`)
                .sort()
        } catch (error) {
            if (isNotFound(error)) return []
            throw error
        }
    }

    private keyToPath(key: string): string {
        if (!KEY_PATTERN.test(key)) {
            throw new StepwrightError(`Invalid store key: ${key}`, "INVALID_KEY")
        }
        return join(this.basePath, `${key}.json`)
    }
}

function isNotFound(error: unknown): boolean {
    return (
        error instanceof Error &&
        "code" in error &&
        error.code === "ENOENT"
    )
}
