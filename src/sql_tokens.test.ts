import { describe, it, expect } from "vitest"
import {
	codeMask,
	extractParenExpr,
	findTopLevelKeyword,
	identifierMask,
	stripComments,
	tokenizeSQL,
} from "./sql_tokens.js"

describe("tokenizeSQL", () => {
	it("separates literals from code", () => {
		const segments = tokenizeSQL("SELECT 'a;b' FROM t")
		expect(segments.map((s) => [s.type, s.value])).toEqual([
			["code", "SELECT "],
			["single_quote", "'a;b'"],
			["code", " FROM t"],
		])
	})

	it("treats a doubled quote as an escape", () => {
		const segments = tokenizeSQL("SELECT 'it''s' AS x")
		expect(segments[1]).toEqual({ type: "single_quote", value: "'it''s'", start: 7, end: 14 })
	})

	it("honours backslash escapes in E'' literals", () => {
		const segments = tokenizeSQL("SELECT E'it\\'s' AS x")
		expect(segments.map((s) => [s.type, s.value])).toEqual([
			["code", "SELECT "],
			["single_quote", "E'it\\'s'"],
			["code", " AS x"],
		])
	})

	it("ends a backslash escape only at the real closing quote", () => {
		const segments = tokenizeSQL("SELECT * FROM t WHERE E'\\'' = '' OR 1=1 --' AND user_id = 7")
		expect(segments.map((s) => s.type)).toEqual(["code", "single_quote", "code", "single_quote", "code", "line_comment"])
		expect(segments[5].value).toBe("--' AND user_id = 7")
	})

	it("leaves backslashes alone in standard literals", () => {
		expect(tokenizeSQL("SELECT 'a\\' AS x").map((s) => s.value)).toEqual(["SELECT ", "'a\\'", " AS x"])
	})

	it("only reads a standalone E as the escape prefix", () => {
		expect(tokenizeSQL("SELECT date'2024-01-01\\'").map((s) => s.value)).toEqual(["SELECT date", "'2024-01-01\\'"])
	})

	it("recognizes dollar quotes and comments", () => {
		const types = tokenizeSQL("SELECT $$a--b$$ -- note\n/* c */").map((s) => s.type)
		expect(types).toEqual(["code", "dollar_quote", "code", "line_comment", "code", "block_comment"])
	})
})

describe("stripComments", () => {
	it("removes comments and collapses whitespace outside literals", () => {
		expect(stripComments("SELECT a -- note\nFROM t /* x */ WHERE b = '--keep'")).toBe(
			"SELECT a FROM t WHERE b = '--keep'",
		)
	})

	it("keeps whitespace inside literals", () => {
		expect(stripComments("SELECT   'a   b'")).toBe("SELECT 'a   b'")
	})
})

describe("codeMask", () => {
	it("blanks literals while preserving length", () => {
		const mask = codeMask("a 'b' c")
		expect(mask).toBe("a     c")
		expect(mask.length).toBe(7)
	})
})

describe("identifierMask", () => {
	it("keeps double-quoted identifiers as bare names", () => {
		expect(identifierMask('FROM "invoices" i')).toBe("FROM  invoices  i")
	})

	it("keeps qualified quoted names contiguous", () => {
		expect(identifierMask('public."My Table"')).toBe("public.My_Table  ")
	})

	it("still blanks string literals", () => {
		expect(identifierMask(`'x' "y"`)).toBe("     y ")
	})
})

describe("extractParenExpr", () => {
	it("ignores parentheses inside literals", () => {
		expect(extractParenExpr("f(a, ')' , b) x", 1)).toEqual({ content: "a, ')' , b", endIdx: 13 })
	})

	it("returns null when unbalanced or not at a paren", () => {
		expect(extractParenExpr("f(a, b", 1)).toBeNull()
		expect(extractParenExpr("f(a)", 0)).toBeNull()
	})
})

describe("findTopLevelKeyword", () => {
	const sql = "SELECT a FROM (SELECT b FROM t) x"

	it("skips keywords inside parentheses", () => {
		expect(findTopLevelKeyword(sql, "SELECT")).toEqual([0])
		expect(findTopLevelKeyword(sql, "FROM")).toEqual([9])
	})

	it("matches multi-word phrases across whitespace runs", () => {
		expect(findTopLevelKeyword("SELECT a FROM t GROUP   BY a", "GROUP BY")).toEqual([16])
	})

	it("skips keywords inside literals", () => {
		expect(findTopLevelKeyword("SELECT 'FROM' FROM t", "FROM")).toEqual([14])
	})

	it("starts scanning at fromIndex", () => {
		expect(findTopLevelKeyword("SELECT a FROM t WHERE b IN (1) AND c FROM", "FROM", 10)).toEqual([37])
	})
})
