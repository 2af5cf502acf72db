/**
 * Unit tests for the migration runner's pure helpers and the bundled journal.
 */

import * as fs from "node:fs";
import * as path from "node:path";

import { describe, it, expect } from "vitest";
import {
  computeHash,
  DEFAULT_MIGRATIONS_DIR,
  parseJournal,
  splitStatements,
} from "../../scripts/run-migrations";

describe("splitStatements", () => {
  it("splits on statement breakpoints and drops blanks", () => {
    expect(splitStatements("CREATE A;--> statement-breakpoint\n  CREATE B;\n--> statement-breakpoint\n")).toEqual([
      "CREATE A;",
      "CREATE B;",
    ]);
  });
});

describe("computeHash", () => {
  it("is a stable hex digest", () => {
    expect(computeHash("SELECT 1")).toMatch(/^[0-9a-f]{64}$/);
    expect(computeHash("SELECT 1")).toBe(computeHash("SELECT 1"));
    expect(computeHash("SELECT 1")).not.toBe(computeHash("SELECT 2"));
  });
});

describe("parseJournal", () => {
  it("rejects a journal without entries", () => {
    expect(() => parseJournal('{"version":"7","dialect":"postgresql"}')).toThrow();
  });

  it("lists a SQL file for every bundled migration", () => {
    const journal = parseJournal(
      fs.readFileSync(path.join(DEFAULT_MIGRATIONS_DIR, "meta", "_journal.json"), "utf-8")
    );

    expect(journal.entries.map((entry) => entry.tag)).toEqual(["0000_initial"]);
    for (const entry of journal.entries) {
      const sql = fs.readFileSync(path.join(DEFAULT_MIGRATIONS_DIR, `${entry.tag}.sql`), "utf-8");
      expect(splitStatements(sql).length).toBeGreaterThan(0);
    }
  });
});
