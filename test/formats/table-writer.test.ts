/**
 * Tests for result table formatting
 */

import { readFileSync } from "node:fs";
import { join } from "node:path";
import { gunzipSync } from "fflate";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ValidationError } from "../../src/errors";
import { ResultTableWriter } from "../../src/formats/table";
import type { ResultMatrix } from "../../src/operations/aggregator";
import { makeTempDir } from "../helpers";

const matrix: ResultMatrix = {
  rowHeader: "ALG",
  rows: ["A1", "B1"],
  columns: ["s1.tsv", "s2.tsv"],
  values: [
    [0.25, undefined],
    [1 / 3, 0],
  ],
};

describe("ResultTableWriter", () => {
  describe("formatMatrix", () => {
    test("full precision with NA for missing cells", () => {
      expect(new ResultTableWriter().formatMatrix(matrix)).toBe(
        "ALG\ts1.tsv\ts2.tsv\nA1\t0.25\tNA\nB1\t0.3333333333333333\t0\n"
      );
    });

    test("fixed decimal places", () => {
      expect(new ResultTableWriter({ precision: 3 }).formatMatrix(matrix)).toBe(
        "ALG\ts1.tsv\ts2.tsv\nA1\t0.250\tNA\nB1\t0.333\t0.000\n"
      );
    });

    test("custom missing marker and line ending", () => {
      const writer = new ResultTableWriter({ missing: "-", lineEnding: "\r\n" });
      expect(writer.formatMatrix(matrix)).toBe(
        "ALG\ts1.tsv\ts2.tsv\r\nA1\t0.25\t-\r\nB1\t0.3333333333333333\t0\r\n"
      );
    });

    test("an empty matrix is a header line", () => {
      const empty: ResultMatrix = { rowHeader: "species", rows: [], columns: ["Ri"], values: [] };
      expect(new ResultTableWriter().formatMatrix(empty)).toBe("species\tRi\n");
    });

    test("rejects labels that would break the layout", () => {
      const bad: ResultMatrix = { ...matrix, columns: ["s1.tsv", "s\t2"] };
      expect(() => new ResultTableWriter().formatMatrix(bad)).toThrow(ValidationError);
    });
  });

  describe("options", () => {
    test("rejects a numeric missing marker", () => {
      expect(() => new ResultTableWriter({ missing: "0" })).toThrow(ValidationError);
    });

    test("rejects fractional or out of range precision", () => {
      expect(() => new ResultTableWriter({ precision: 1.5 })).toThrow(ValidationError);
      expect(() => new ResultTableWriter({ precision: -1 })).toThrow(ValidationError);
      expect(() => new ResultTableWriter({ precision: 18 })).toThrow(ValidationError);
    });
  });

  describe("writeFile", () => {
    let dir: string;
    let cleanup: () => void;

    beforeEach(() => {
      ({ dir, cleanup } = makeTempDir("table-writer"));
    });

    afterEach(() => {
      cleanup();
    });

    test("writes plain TSV", async () => {
      const path = join(dir, "out", "table.tsv");
      await new ResultTableWriter().writeFile(path, matrix);
      expect(readFileSync(path, "utf8")).toBe(
        "ALG\ts1.tsv\ts2.tsv\nA1\t0.25\tNA\nB1\t0.3333333333333333\t0\n"
      );
    });

    test("gzips when the path ends in .gz", async () => {
      const path = join(dir, "table.tsv.gz");
      await new ResultTableWriter({ precision: 2 }).writeFile(path, matrix);

      const bytes = new Uint8Array(readFileSync(path));
      expect(bytes[0]).toBe(0x1f);
      expect(bytes[1]).toBe(0x8b);
      expect(new TextDecoder().decode(gunzipSync(bytes))).toBe(
        "ALG\ts1.tsv\ts2.tsv\nA1\t0.25\tNA\nB1\t0.33\t0.00\n"
      );
    });
  });
});
