import { describe, it, expect, vi } from "vitest"
import { StructureScanner, findStructures } from "@/scanner/structure-scanner"
import { sliceNode, type StructureNode } from "@/scanner/types"

/**
 * Feed text to a fresh scanner in pieces of the given size and collect every root
 */
const chunkwise = (text: string, chunkSize: number): StructureNode[] => {
  const scanner = new StructureScanner()
  const roots: StructureNode[] = []

  for (let i = 0; i < text.length; i += chunkSize) {
    roots.push(...scanner.feed(text.slice(i, i + chunkSize)))
  }

  return roots
}

describe("StructureScanner", () => {
  describe("findStructures", () => {
    it("should find objects and arrays with their nested children", () => {
      const text = 'Hello {"a":1} world [1, {"b":2}, 3] tail'

      expect(findStructures(text)).toEqual([
        { kind: "object", start: 6, end: 12, children: [] },
        { kind: "array", start: 20, end: 34, children: [{ kind: "object", start: 24, end: 30, children: [] }] },
      ])
    })

    it("should return spans that slice back to the structure text", () => {
      const text = 'x {"a":1} y'
      expect(findStructures(text).map((node) => sliceNode(text, node))).toEqual(['{"a":1}'])
    })

    it("should list only direct children on each node", () => {
      const text = '{"outer": {"inner": {"deepest": []}}}'
      const [root] = findStructures(text)

      expect(root?.children).toHaveLength(1)
      expect(root?.children[0]?.children).toHaveLength(1)
      expect(root?.children[0]?.children[0]?.children).toEqual([{ kind: "array", start: 32, end: 33, children: [] }])
    })

    it("should keep children in the order their brackets open", () => {
      const [root] = findStructures('[{"a":1},[2],{"b":[3]}]')

      expect(root?.children.map((child) => child.kind)).toEqual(["object", "array", "object"])
      expect(root?.children.map((child) => child.start)).toEqual([1, 9, 13])
    })

    it("should return nothing for plain text", () => {
      expect(findStructures("Just plain text with no JSON data.")).toEqual([])
    })

    it("should ignore brackets inside string literals", () => {
      const text = String.raw`say "}{" then {"k":"[\\"} end`

      expect(findStructures(text)).toEqual([{ kind: "object", start: 14, end: 24, children: [] }])
    })

    it("should treat an escaped quote as part of the string", () => {
      const text = String.raw`{"a":"x\"}"}`

      expect(findStructures(text)).toEqual([{ kind: "object", start: 0, end: 11, children: [] }])
    })

    it("should never report a structure that does not close", () => {
      expect(findStructures('done {"a": [1, 2')).toEqual([])
    })

    it("should let a closer pop whatever frame is open", () => {
      expect(findStructures("{1]")).toEqual([{ kind: "object", start: 0, end: 2, children: [] }])
    })

    it("should ignore closing brackets with nothing open", () => {
      const logger = { debug: vi.fn(), warn: vi.fn() }
      const text = 'a] {"x":[]} }'

      expect(findStructures(text, { logger })).toEqual([
        { kind: "object", start: 3, end: 10, children: [{ kind: "array", start: 8, end: 9, children: [] }] },
      ])
      expect(logger.debug).toHaveBeenCalledTimes(2)
      expect(logger.warn).not.toHaveBeenCalled()
    })
  })

  describe("incremental feeding", () => {
    it("should complete a structure in a later call", () => {
      const scanner = new StructureScanner()

      expect(scanner.feed('prefix {"a"')).toEqual([])
      expect(scanner.feed(":1}")).toEqual([{ kind: "object", start: 7, end: 13, children: [] }])
    })

    it("should close one root across three chunks", () => {
      const scanner = new StructureScanner()

      expect(scanner.feed('Lead {"x": ')).toEqual([])
      expect(scanner.feed('{"y": [1,2,3]}')).toEqual([])
      expect(scanner.feed(', "z": 3}')).toEqual([
        {
          kind: "object",
          start: 5,
          end: 33,
          children: [{ kind: "object", start: 11, end: 24, children: [{ kind: "array", start: 17, end: 23, children: [] }] }],
        },
      ])
    })

    it("should advance the offset by each chunk's length", () => {
      const scanner = new StructureScanner()

      scanner.feed("abc")
      expect(scanner.offset).toBe(3)
      scanner.feed("")
      expect(scanner.offset).toBe(3)
      scanner.feed('{"k":')
      expect(scanner.offset).toBe(8)
    })

    it("should report depth and the start of the outermost open structure", () => {
      const scanner = new StructureScanner()

      scanner.feed('text {"a": [')
      expect(scanner.depth).toBe(2)
      expect(scanner.openStart).toBe(5)

      scanner.feed("]}")
      expect(scanner.depth).toBe(0)
      expect(scanner.openStart).toBeUndefined()
    })

    it("should keep string state when an escape ends a chunk", () => {
      const scanner = new StructureScanner()

      expect(scanner.feed('{"a":"x\\')).toEqual([])
      expect(scanner.feed('"}"}')).toEqual([{ kind: "object", start: 0, end: 11, children: [] }])
    })

    it("should keep scanners independent of each other", () => {
      const first = new StructureScanner()
      const second = new StructureScanner()

      first.feed('{"a": "')
      expect(second.feed("{}")).toEqual([{ kind: "object", start: 0, end: 1, children: [] }])
    })
  })

  describe("chunk boundary invariance", () => {
    const samples = [
      'Hello {"a":1} world [1, {"b":2}, 3] tail',
      String.raw`{"quote":"he said \"{ not a brace ]\"","list":[{"x":[1,[2]]},"\\"]} and [] {}`,
      'prose with "quoted {braces}" then {"ok":true}\n\n[{"n":1},{"n":2}]',
      '{"unicode":"héllo wörld ✓","nested":{"deep":[{"deeper":{}}]}} trailing {"open": [',
    ]

    samples.forEach((text, index) => {
      it(`should find the same roots for every two-way split (sample ${index + 1})`, () => {
        const expected = findStructures(text)

        for (let split = 0; split <= text.length; split++) {
          const scanner = new StructureScanner()
          const roots = [...scanner.feed(text.slice(0, split)), ...scanner.feed(text.slice(split))]
          expect(roots).toEqual(expected)
        }
      })

      it(`should find the same roots for fixed chunk sizes (sample ${index + 1})`, () => {
        const expected = findStructures(text)

        for (const size of [1, 2, 3, 5, 8, 13]) {
          expect(chunkwise(text, size)).toEqual(expected)
        }
      })
    })
  })
})
