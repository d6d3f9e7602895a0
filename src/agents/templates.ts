import { basename } from "node:path/posix"

import { fileExtension } from "../rules/DomainRules.js"

function componentTest(name: string): string {
    return `import { render } from "@testing-library/react"
import { ${name} } from "./${name}"

describe("${name}", () => {
    it("renders", () => {
        render(<${name} />)
    })
})
`
}

function moduleTest(name: string): string {
    return `import { ${name} } from "./${name}"

describe("${name}", () => {
    it("is defined", () => {
        expect(${name}).toBeDefined()
    })
})
`
}

function pythonTest(name: string): string {
    const className = name
        .split("_")
        .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
        .join("")
    return `import unittest

from ${name} import *


class Test${className}(unittest.TestCase):
    def test_module_loads(self):
        self.assertTrue(True)


if __name__ == "__main__":
    unittest.main()
`
}

/** Starter test for a source file, or "" when its kind has no template. */
export function testContentFor(sourcePath: string): string {
    const ext = fileExtension(sourcePath)
    const name = basename(sourcePath, ext)
    switch (ext) {
        case ".tsx":
        case ".jsx":
            return componentTest(name)
        case ".ts":
        case ".js":
            return moduleTest(name)
        case ".py":
            return pythonTest(name)
        default:
            return ""
    }
}
