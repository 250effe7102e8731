import { describe, expect, it } from "vitest";
import { splitStatements } from "./migrations.js";

describe("splitStatements", () => {
	it("splits on semicolons and drops comment lines", () => {
		const sql = "-- header; with a semicolon\nCREATE TABLE a (id INT);\n\n-- note\nCREATE INDEX i ON a (id);\n";
		expect(splitStatements(sql)).toEqual(["CREATE TABLE a (id INT)", "CREATE INDEX i ON a (id)"]);
	});

	it("returns nothing for an empty file", () => {
		expect(splitStatements("\n-- only a comment\n")).toEqual([]);
	});
});
