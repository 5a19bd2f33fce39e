import { describe, it, expect } from "vitest"
import { applyDialectRewrites } from "./sql_rewrites.js"

describe("applyDialectRewrites", () => {
	describe("ROUND → ROUND(CAST(... AS numeric), n)", () => {
		it("should cast the argument of a two-argument ROUND", () => {
			const result = applyDialectRewrites("ROUND(AVG(total_amount), 2)")
			expect(result.sql).toBe("ROUND(CAST(AVG(total_amount) AS numeric), 2)")
			expect(result.applied).toEqual(["ROUND_NUMERIC_CAST"])
			expect(result.changed).toBe(true)
		})

		it("should handle arithmetic arguments", () => {
			const result = applyDialectRewrites("SELECT ROUND(price * 1.1, 2) FROM items")
			expect(result.sql).toBe("SELECT ROUND(CAST(price * 1.1 AS numeric), 2) FROM items")
		})

		it("should rewrite nested ROUND calls inside out", () => {
			const result = applyDialectRewrites("SELECT ROUND(SUM(ROUND(a, 1)), 2) FROM t")
			expect(result.sql).toBe("SELECT ROUND(CAST(SUM(ROUND(CAST(a AS numeric), 1)) AS numeric), 2) FROM t")
			expect(result.applied).toEqual(["ROUND_NUMERIC_CAST"])
		})

		it("should leave single-argument and already-cast calls alone", () => {
			expect(applyDialectRewrites("SELECT ROUND(total) FROM invoices").changed).toBe(false)
			expect(applyDialectRewrites("SELECT ROUND(total::numeric, 2) FROM invoices").changed).toBe(false)
			expect(applyDialectRewrites("SELECT ROUND(CAST(total AS numeric), 2) FROM invoices").changed).toBe(false)
		})

		it("should not touch ROUND inside a string literal", () => {
			const sql = "SELECT 'ROUND(a, 2)' AS label FROM t"
			expect(applyDialectRewrites(sql).sql).toBe(sql)
		})

		it("should be idempotent", () => {
			const once = applyDialectRewrites("SELECT ROUND(AVG(total_amount), 2) FROM invoices").sql
			const twice = applyDialectRewrites(once)
			expect(twice.sql).toBe(once)
			expect(twice.changed).toBe(false)
		})
	})

	describe("vector rewrites", () => {
		it("should rewrite to_vector and cast description_embedding", () => {
			const result = applyDialectRewrites(
				"SELECT * FROM items ORDER BY l2_distance(description_embedding, to_vector(:query_embedding)) LIMIT 5",
			)
			expect(result.sql).toBe(
				"SELECT * FROM items ORDER BY l2_distance(description_embedding::vector, '[:query_embedding]'::vector) LIMIT 5",
			)
			expect(result.applied).toEqual(["TO_VECTOR_LITERAL", "EMBEDDING_VECTOR_CAST"])
			expect(applyDialectRewrites(result.sql).changed).toBe(false)
		})

		it("should cast a bare embedding column only when invoice_embeddings is queried", () => {
			const result = applyDialectRewrites(
				"SELECT invoice_id FROM invoice_embeddings ORDER BY embedding <-> '[:query_embedding]'::vector",
			)
			expect(result.sql).toBe(
				"SELECT invoice_id FROM invoice_embeddings ORDER BY embedding::vector <-> '[:query_embedding]'::vector",
			)
			expect(applyDialectRewrites("SELECT embedding FROM items").changed).toBe(false)
		})
	})

	describe("MySQL-isms", () => {
		it("should transform IFNULL and NVL to COALESCE", () => {
			const result = applyDialectRewrites("SELECT IFNULL(amount, 0), nvl(tax, 0) FROM invoices")
			expect(result.sql).toBe("SELECT COALESCE(amount, 0), COALESCE(tax, 0) FROM invoices")
			expect(result.applied).toEqual(["IFNULL_TO_COALESCE", "NVL_TO_COALESCE"])
		})

		it("should transform LIMIT offset, count", () => {
			const result = applyDialectRewrites("SELECT * FROM invoices LIMIT 10, 20")
			expect(result.sql).toBe("SELECT * FROM invoices LIMIT 20 OFFSET 10")
			expect(result.applied).toEqual(["MYSQL_LIMIT_OFFSET"])
		})

		it("should remove backticks outside literals", () => {
			const result = applyDialectRewrites("SELECT `vendor` FROM `invoices` WHERE note = '`x`'")
			expect(result.sql).toBe("SELECT vendor FROM invoices WHERE note = '`x`'")
			expect(result.applied).toEqual(["REMOVE_BACKTICKS"])
		})
	})

	describe("passthrough", () => {
		it("should return valid PostgreSQL unchanged", () => {
			const sql = "SELECT vendor, SUM(total_amount) FROM invoices GROUP BY vendor"
			expect(applyDialectRewrites(sql)).toEqual({ sql, applied: [], changed: false })
		})

		it("should handle empty input", () => {
			expect(applyDialectRewrites("")).toEqual({ sql: "", applied: [], changed: false })
		})
	})
})
