import { readFile, readdir } from "node:fs/promises"
import { extname, join } from "node:path"

import { log } from "../core/Logger.js"
import { isJsonObject } from "../core/json.js"
import { normalizePath, resolveDomain } from "../rules/DomainRules.js"
import type { JsonObject, RuleSet } from "../types.js"

const SKIP_DIRS = new Set([
    "node_modules",
    ".git",
    ".next",
    "dist",
    "build",
    ".stepwright",
    "__pycache__",
    ".venv",
])

const MAX_FILES = 5000

const NODE_EXTENSIONS = new Set([".ts", ".tsx", ".js", ".jsx", ".mjs", ".cjs"])

export interface Manifest {
    framework: string | null
    dependencies: string[]
}

export interface DomainStructure extends Manifest {
    exists: boolean
    files: string[]
}

export type ProjectStructure = Record<string, DomainStructure>

const EMPTY_MANIFEST: Manifest = { framework: null, dependencies: [] }

/** Relative file paths under `root`, sorted, skipping build and vendor dirs. */
export async function listProjectFiles(root: string): Promise<string[]> {
    const files: string[] = []
    const walk = async (dir: string, prefix: string): Promise<void> => {
        const entries = await readdir(dir, { withFileTypes: true })
        entries.sort((a, b) => a.name.localeCompare(b.name))
        for (const entry of entries) {
            if (files.length >= MAX_FILES) return
            const rel = prefix ? `${prefix}/${entry.name}` : entry.name
            if (entry.isDirectory()) {
                if (!SKIP_DIRS.has(entry.name)) await walk(join(dir, entry.name), rel)
            } else if (entry.isFile()) {
                files.push(rel)
            }
        }
    }
    await walk(root, "")
    return files
}

function objectKeys(value: unknown): string[] {
    return isJsonObject(value) ? Object.keys(value) : []
}

export function parsePackageJson(content: string): Manifest {
    let pkg: unknown
    try {
        pkg = JSON.parse(content)
    } catch (error) {
        log.agents("Unreadable package.json: %s", error instanceof Error ? error.message : error)
        return EMPTY_MANIFEST
    }
    if (!isJsonObject(pkg)) return EMPTY_MANIFEST
    const dependencies = [
        ...new Set([...objectKeys(pkg.dependencies), ...objectKeys(pkg.devDependencies)]),
    ]
    let framework: string | null = null
    if (dependencies.includes("react")) {
        framework = dependencies.includes("next") ? "next" : "react"
    } else if (dependencies.includes("vue")) {
        framework = "vue"
    }
    return { framework, dependencies }
}

export function parseRequirements(content: string): Manifest {
    const dependencies: string[] = []
    for (const raw of content.split("\n")) {
        const line = raw.replace(/#.*$/, "").trim()
        if (!line || line.startsWith("-")) continue
        const name = line.split(/[=<>~!;[\s]/)[0]
        if (name && !dependencies.includes(name)) dependencies.push(name)
    }
    const framework =
        ["fastapi", "flask", "django"].find((f) => dependencies.includes(f)) ?? null
    return { framework, dependencies }
}

function manifestParser(fileName: string): ((content: string) => Manifest) | undefined {
    if (fileName === "package.json") return parsePackageJson
    if (fileName === "requirements.txt") return parseRequirements
    return undefined
}

/**
 * Domains a manifest speaks for: the domain containing it, or for a
 * manifest at the project root every domain written in its language.
 */
function manifestDomains(path: string, rules: RuleSet): string[] {
    const owner = resolveDomain(path, rules)
    if (owner) return [owner]
    if (path.includes("/")) return []
    const matches = path === "package.json"
        ? (ext: string) => NODE_EXTENSIONS.has(ext)
        : (ext: string) => ext === ".py"
    return Object.entries(rules.domains)
        .filter(([, domain]) => domain.extensions.some(matches))
        .map(([name]) => name)
}

/**
 * Walk a project and group its files, frameworks and declared
 * dependencies by domain. Every configured domain gets an entry.
 */
export async function analyzeStructure(
    root: string,
    rules: RuleSet
): Promise<ProjectStructure> {
    const structure: ProjectStructure = {}
    for (const name of Object.keys(rules.domains)) {
        structure[name] = { exists: false, framework: null, dependencies: [], files: [] }
    }

    for (const file of await listProjectFiles(root)) {
        const path = normalizePath(file)
        const domainName = resolveDomain(path, rules)
        if (domainName) {
            const { extensions } = rules.domains[domainName]
            if (extensions.length === 0 || extensions.includes(extname(path))) {
                structure[domainName].exists = true
                structure[domainName].files.push(path)
            }
        }

        const parse = manifestParser(path.slice(path.lastIndexOf("/") + 1))
        if (!parse) continue
        const manifest = parse(await readFile(join(root, path), "utf-8"))
        for (const name of manifestDomains(path, rules)) {
            const entry = structure[name]
            entry.framework = entry.framework ?? manifest.framework
            for (const dep of manifest.dependencies) {
                if (!entry.dependencies.includes(dep)) entry.dependencies.push(dep)
            }
        }
    }
    log.agents("Analyzed %s: %d domain(s)", root, Object.keys(structure).length)
    return structure
}

/** Required packages that no declared dependency name starts with. */
export function missingDependencies(existing: string[], required: string[]): string[] {
    return required.filter((dep) => !existing.some((name) => name.startsWith(dep)))
}

export function structureToJson(structure: ProjectStructure): JsonObject {
    const json: JsonObject = {}
    for (const [name, entry] of Object.entries(structure)) {
        json[name] = {
            exists: entry.exists,
            framework: entry.framework,
            dependencies: [...entry.dependencies],
            files: [...entry.files],
        }
    }
    return json
}
