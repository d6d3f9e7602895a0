import {
    applyConvention,
    expectedConvention,
    fileStem,
    isTestFile,
    matchesConvention,
    normalizePath,
    resolveDomain,
    testPathFor,
} from "../rules/DomainRules.js"
import type {
    FileChange,
    JsonObject,
    JsonValue,
    ReviewIssue,
    RuleSet,
} from "../types.js"

/**
 * A pure function of the candidate output and the rules. Checkers that
 * call out to another process may return a promise.
 */
export type ReviewChecker = (
    output: JsonObject,
    rules: RuleSet
) => ReviewIssue[] | Promise<ReviewIssue[]>

type SyncReviewChecker = (output: JsonObject, rules: RuleSet) => ReviewIssue[]

function isFileChange(value: JsonValue): value is JsonObject & { path: string } {
    return (
        value !== null &&
        typeof value === "object" &&
        !Array.isArray(value) &&
        typeof value.path === "string"
    )
}

/**
 * Collect file changes from a candidate output. Files may appear as
 * `{path, content}` objects or bare paths under `files`, `created` or
 * `updated`, optionally nested under `code`.
 */
export function extractFiles(output: JsonObject): FileChange[] {
    const files: FileChange[] = []
    const seen = new Set<string>()
    const add = (value: JsonValue): void => {
        if (typeof value === "string") {
            const path = normalizePath(value)
            if (seen.has(path)) return
            seen.add(path)
            files.push({ path, content: "" })
        } else if (isFileChange(value)) {
            const path = normalizePath(value.path)
            if (seen.has(path)) return
            seen.add(path)
            files.push({
                path,
                content: typeof value.content === "string" ? value.content : "",
            })
        }
    }
    const visit = (source: JsonObject): void => {
        for (const key of ["files", "created", "updated"]) {
            const list = source[key]
            if (Array.isArray(list)) list.forEach(add)
        }
        const code = source.code
        if (code !== null && typeof code === "object" && !Array.isArray(code)) {
            visit(code)
        }
    }
    visit(output)
    return files
}

function byteLength(content: string): number {
    return Buffer.byteLength(content, "utf-8")
}

interface FunctionSpan {
    name: string
    line: number
    length: number
}

const FUNCTION_START =
    /^\s*(?:export\s+)?(?:async\s+)?(?:function\s+(\w+)|(?:const|let)\s+(\w+)\s*=\s*(?:async\s*)?\([^)]*\)\s*(?::[^=]+)?=>|def\s+(\w+))/

/**
 * Approximate function lengths by brace depth (or indentation for
 * Python). Only used for the `maxFunctionLength` warning.
 */
export function measureFunctions(content: string): FunctionSpan[] {
    const lines = content.split("\n")
    const spans: FunctionSpan[] = []
    for (let i = 0; i < lines.length; i++) {
        const match = FUNCTION_START.exec(lines[i])
        if (!match) continue
        const name = match[1] ?? match[2] ?? match[3] ?? "anonymous"
        if (match[3]) {
            const indent = lines[i].search(/\S/)
            let end = i + 1
            while (
                end < lines.length &&
                (lines[end].trim() === "" || lines[end].search(/\S/) > indent)
            ) {
                end++
            }
            spans.push({ name, line: i + 1, length: end - i })
            continue
        }
        if (!lines[i].includes("{")) {
            spans.push({ name, line: i + 1, length: 1 })
            continue
        }
        let depth = 0
        let opened = false
        let end = i
        for (; end < lines.length; end++) {
            for (const ch of lines[end]) {
                if (ch === "{") {
                    depth++
                    opened = true
                } else if (ch === "}") {
                    depth--
                }
            }
            if (opened && depth <= 0) break
        }
        const last = Math.min(end, lines.length - 1)
        spans.push({ name, line: i + 1, length: opened ? last - i + 1 : 1 })
    }
    return spans
}

export const checkDomainValidation: SyncReviewChecker = (output, rules) => {
    const issues: ReviewIssue[] = []
    for (const file of extractFiles(output)) {
        const domainName = resolveDomain(file.path, rules)
        if (!domainName) {
            issues.push({
                rule: "domain_boundary",
                location: file.path,
                severity: "error",
                message: "File does not belong to any defined domain",
                suggestedFix: `Move the file under one of: ${Object.values(
                    rules.domains
                )
                    .flatMap((d) => d.directories)
                    .join(", ")}`,
            })
            continue
        }
        const domain = rules.domains[domainName]
        const stem = fileStem(file.path)
        const convention = isTestFile(file.path)
            ? undefined
            : expectedConvention(file.path, domain)
        if (convention && !matchesConvention(stem, convention)) {
            issues.push({
                rule: "naming_convention",
                location: file.path,
                severity: "error",
                message: `File name "${stem}" should use ${convention}`,
                suggestedFix: `Rename to ${applyConvention(stem, convention)}`,
            })
        }

        const maxSize = domain.maxFileSize ?? rules.review.maxFileSize
        const size = byteLength(file.content)
        if (size > maxSize) {
            issues.push({
                rule: "file_size",
                location: file.path,
                severity: "error",
                message: `File size (${size} bytes) exceeds maximum allowed (${maxSize} bytes)`,
            })
        }

        const maxLength =
            domain.maxFunctionLength ?? rules.review.maxFunctionLength
        for (const fn of measureFunctions(file.content)) {
            if (fn.length > maxLength) {
                issues.push({
                    rule: "function_length",
                    location: `${file.path}:${fn.line}`,
                    severity: "warning",
                    message: `Function ${fn.name} exceeds maximum length of ${maxLength} lines`,
                    suggestedFix: `Split ${fn.name} into smaller functions`,
                })
            }
        }

        issues.push(...styleHints(file, domainName))
    }
    return issues
}

function styleHints(file: FileChange, domain: string): ReviewIssue[] {
    const hints: ReviewIssue[] = []
    const hint = (message: string): void => {
        hints.push({
            rule: "style",
            location: file.path,
            severity: "info",
            message,
        })
    }
    const { content } = file
    if (domain === "frontend") {
        if (/\bclass\s+\w+/.test(content) && !content.includes("React.Component")) {
            hint("Consider using functional components instead of classes")
        }
        if (/\bvar\s/.test(content)) hint("Use const or let instead of var")
    } else if (domain === "backend") {
        if (content.includes("print(")) {
            hint("Consider using logging instead of print statements")
        }
        if (/except\s*:/.test(content)) hint("Avoid bare except clauses")
    }
    return hints
}

interface SecurityPattern {
    pattern: RegExp
    severity: ReviewIssue["severity"]
    message: string
    suggestedFix: string
}

const SECURITY_PATTERNS: SecurityPattern[] = [
    {
        pattern: /\beval\s*\(/,
        severity: "critical",
        message: "Use of eval()",
        suggestedFix: "Parse the input explicitly instead of evaluating it",
    },
    {
        pattern: /new\s+Function\s*\(/,
        severity: "critical",
        message: "Dynamic code construction with new Function()",
        suggestedFix: "Replace the generated function with a static one",
    },
    {
        pattern: /\.innerHTML\s*=/,
        severity: "error",
        message: "Assignment to innerHTML",
        suggestedFix: "Use textContent or a sanitizer",
    },
    {
        pattern: /dangerouslySetInnerHTML/,
        severity: "error",
        message: "Use of dangerouslySetInnerHTML",
        suggestedFix: "Render the content as text or sanitize it first",
    },
    {
        pattern:
            /\b(?:password|passwd|secret|api[_-]?key|token)\s*[:=]\s*["'][^"']{4,}["']/i,
        severity: "critical",
        message: "Hard-coded credential",
        suggestedFix: "Read the value from configuration or the environment",
    },
    {
        pattern: /["']http:\/\/(?!localhost|127\.0\.0\.1)/,
        severity: "warning",
        message: "Plain HTTP URL",
        suggestedFix: "Use https",
    },
]

export const checkSecurity: SyncReviewChecker = (output) => {
    const issues: ReviewIssue[] = []
    for (const file of extractFiles(output)) {
        const lines = file.content.split("\n")
        lines.forEach((line, index) => {
            for (const rule of SECURITY_PATTERNS) {
                if (rule.pattern.test(line)) {
                    issues.push({
                        rule: "security",
                        location: `${file.path}:${index + 1}`,
                        severity: rule.severity,
                        message: rule.message,
                        suggestedFix: rule.suggestedFix,
                    })
                }
            }
        })
    }
    return issues
}

/**
 * Share of source files with a matching test file among the produced
 * files, in percent. An output without source files counts as covered.
 */
export function coveragePercent(files: FileChange[]): number {
    const paths = new Set(files.map((f) => f.path))
    const sources = files.filter(
        (f) => !isTestFile(f.path) && testPathFor(f.path) !== undefined
    )
    if (sources.length === 0) return 100
    const covered = sources.filter((f) => {
        const testPath = testPathFor(f.path)
        return testPath !== undefined && paths.has(testPath)
    })
    return Math.round((covered.length / sources.length) * 100)
}

export const checkCoverage: SyncReviewChecker = (output, rules) => {
    const files = extractFiles(output)
    const coverage = coveragePercent(files)
    if (coverage >= rules.review.coverageThreshold) return []
    const missing = files
        .filter((f) => !isTestFile(f.path))
        .map((f) => testPathFor(f.path))
        .filter((p): p is string => p !== undefined)
        .filter((p) => !files.some((f) => f.path === p))
    return [
        {
            rule: "test_coverage",
            location: "tests",
            severity: "error",
            message: `Test coverage (${coverage}%) is below threshold (${rules.review.coverageThreshold}%)`,
            suggestedFix: `Add tests: ${missing.join(", ")}`,
        },
    ]
}

export const checkCodeReview: SyncReviewChecker = (output, rules) => [
    ...checkDomainValidation(output, rules),
    ...checkSecurity(output, rules),
    ...checkCoverage(output, rules),
]
