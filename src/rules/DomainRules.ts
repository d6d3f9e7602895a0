import { basename, extname } from "node:path/posix"

import { DEFAULT_REVIEW_RULES } from "../core/Config.js"
import type { DomainRules, NamingConvention, RuleSet } from "../types.js"

export const EMPTY_RULE_SET: RuleSet = freezeRuleSet({
    domains: {},
    review: DEFAULT_REVIEW_RULES,
})

/**
 * Rule sets are shared by reference across concurrent runs, so they are
 * frozen once loaded.
 */
export function freezeRuleSet(rules: RuleSet): RuleSet {
    for (const domain of Object.values(rules.domains)) {
        Object.freeze(domain.directories)
        Object.freeze(domain.extensions)
        Object.freeze(domain.naming)
        if (domain.dependencies) Object.freeze(domain.dependencies)
        Object.freeze(domain)
    }
    Object.freeze(rules.domains)
    Object.freeze(rules.review)
    return Object.freeze(rules)
}

export function normalizePath(filePath: string): string {
    return filePath.replace(/\\/g, "/").replace(/^\.\//, "")
}

/** Route a file to the first domain whose directories contain it. */
export function resolveDomain(
    filePath: string,
    rules: RuleSet
): string | undefined {
    const path = normalizePath(filePath)
    for (const [name, domain] of Object.entries(rules.domains)) {
        if (isInDomain(path, domain)) return name
    }
    return undefined
}

export function isInDomain(filePath: string, domain: DomainRules): boolean {
    const path = normalizePath(filePath)
    return domain.directories.some((dir) => path.startsWith(normalizePath(dir)))
}

export function fileStem(filePath: string): string {
    const name = basename(normalizePath(filePath))
    const dot = name.indexOf(".")
    return dot > 0 ? name.slice(0, dot) : name
}

export function fileExtension(filePath: string): string {
    return extname(normalizePath(filePath))
}

export function isTestFile(filePath: string): boolean {
    const name = basename(normalizePath(filePath))
    return /\.(test|spec)\./.test(name) || name.startsWith("test_")
}

export function matchesConvention(
    name: string,
    convention: NamingConvention
): boolean {
    switch (convention) {
        case "PascalCase":
            return /^[A-Z][A-Za-z0-9]*$/.test(name)
        case "camelCase":
            return /^[a-z][A-Za-z0-9]*$/.test(name)
        case "kebab-case":
            return /^[a-z][a-z0-9]*(-[a-z0-9]+)*$/.test(name)
        case "snake_case":
            return /^[a-z][a-z0-9]*(_[a-z0-9]+)*$/.test(name)
    }
}

function splitWords(name: string): string[] {
    return name
        .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
        .split(/[\s_-]+/)
        .filter(Boolean)
        .map((word) => word.toLowerCase())
}

function capitalize(word: string): string {
    return word.charAt(0).toUpperCase() + word.slice(1)
}

export function applyConvention(
    name: string,
    convention: NamingConvention
): string {
    const words = splitWords(name)
    switch (convention) {
        case "PascalCase":
            return words.map(capitalize).join("")
        case "camelCase":
            return words
                .map((word, i) => (i === 0 ? word : capitalize(word)))
                .join("")
        case "kebab-case":
            return words.join("-")
        case "snake_case":
            return words.join("_")
    }
}

const COMPONENT_EXTENSIONS = new Set([".tsx", ".jsx"])
const SCRIPT_EXTENSIONS = new Set([".ts", ".js"])

/**
 * The convention a file name should follow in its domain: components
 * for .tsx/.jsx, files for other scripts, modules for the rest.
 */
export function expectedConvention(
    filePath: string,
    domain: DomainRules
): NamingConvention | undefined {
    const ext = fileExtension(filePath)
    if (COMPONENT_EXTENSIONS.has(ext)) return domain.naming.components
    if (SCRIPT_EXTENSIONS.has(ext)) return domain.naming.files
    return domain.naming.modules
}

export function testPathFor(filePath: string): string | undefined {
    const path = normalizePath(filePath)
    if (isTestFile(path)) return undefined
    const ext = fileExtension(path)
    const dir = path.slice(0, path.length - basename(path).length)
    const stem = basename(path, ext)
    if (COMPONENT_EXTENSIONS.has(ext) || SCRIPT_EXTENSIONS.has(ext)) {
        return `${dir}${stem}.test${ext}`
    }
    if (ext === ".py") return `${dir}test_${stem}.py`
    return undefined
}
