/**
 * Tests for the coordinates table parser
 */

import { describe, expect, test } from "vitest";
import { MalformedInputError, ValidationError } from "../../src/errors";
import {
  CoordinatesParser,
  COORDINATES_EXTENSIONS,
  isCoordinatesFile,
  speciesLabel,
} from "../../src/formats/coordinates";

function parse(data: string, parser = new CoordinatesParser()) {
  return Array.from(parser.parseString(data, "genome.tsv"));
}

function malformed(data: string, parser = new CoordinatesParser()): MalformedInputError {
  try {
    parse(data, parser);
  } catch (error) {
    if (error instanceof MalformedInputError) return error;
    throw error;
  }
  throw new Error("expected MalformedInputError");
}

describe("CoordinatesParser", () => {
  describe("rows", () => {
    test("parses the six columns", () => {
      const genes = parse("g1\tComplete\tchr1\t100\t250\tA1\ng2\tFragmented\tchr2\t300\t420\tB1\n");

      expect(genes).toEqual([
        {
          geneId: "g1",
          status: "Complete",
          chromosome: "chr1",
          start: 100,
          end: 250,
          alg: "A1",
          lineNumber: 1,
        },
        {
          geneId: "g2",
          status: "Fragmented",
          chromosome: "chr2",
          start: 300,
          end: 420,
          alg: "B1",
          lineNumber: 2,
        },
      ]);
    });

    test("ignores fields past the sixth", () => {
      const [gene] = parse("g1\tComplete\tchr1\t1\t2\tC1\textra\tmore\n");
      expect(gene?.alg).toBe("C1");
    });

    test("keeps duplicate gene ids as separate genes", () => {
      expect(parse("g1\tC\tchr1\t1\t2\tA1\ng1\tC\tchr1\t3\t4\tA1\n")).toHaveLength(2);
    });

    test("accepts a missing final newline, CRLF and a byte order mark", () => {
      const genes = parse("\uFEFFg1\tC\tchr1\t1\t2\tA1\r\ng2\tC\tchr2\t3\t4\tB1");
      expect(genes.map((g) => g.geneId)).toEqual(["g1", "g2"]);
      expect(genes[1]?.alg).toBe("B1");
    });

    test("skips blank and comment lines but keeps physical line numbers", () => {
      const genes = parse("# header comment\n\n   \ng1\tC\tchr1\t1\t2\tA1\n");
      expect(genes).toHaveLength(1);
      expect(genes[0]?.lineNumber).toBe(4);
    });

    test("an empty file yields no genes", () => {
      expect(parse("")).toEqual([]);
    });
  });

  describe("ALG sub-groups", () => {
    const data = ["A1a", "A1b", "Ea", "Eb", "Qa", "Qd", "B2"]
      .map((alg, i) => `g${i}\tC\tchr1\t${i}\t${i + 1}\t${alg}\n`)
      .join("");

    test("merges sub-groups by default", () => {
      expect(parse(data).map((g) => g.alg)).toEqual(["A1", "A1", "E", "E", "Q", "Q", "B2"]);
    });

    test("keeps labels as given when merging is off", () => {
      const parser = new CoordinatesParser({ algAliases: false });
      expect(parse(data, parser).map((g) => g.alg)).toEqual([
        "A1a",
        "A1b",
        "Ea",
        "Eb",
        "Qa",
        "Qd",
        "B2",
      ]);
    });

    test("uses a custom merge table", () => {
      const parser = new CoordinatesParser({ algAliases: { B2: "B" } });
      expect(parser.normalizeAlg("B2")).toBe("B");
      expect(parser.normalizeAlg("A1a")).toBe("A1a");
      expect(parser.normalizeAlg("toString")).toBe("toString");
    });
  });

  describe("malformed rows", () => {
    test("too few fields", () => {
      const error = malformed("g1\tC\tchr1\t1\t2\tA1\ng2\tC\tchr1\t5\n");
      expect(error.file).toBe("genome.tsv");
      expect(error.lineNumber).toBe(2);
      expect(error.line).toBe("g2\tC\tchr1\t5");
      expect(error.message).toBe("genome.tsv: Expected at least 6 tab-separated fields, found 4");
    });

    test("empty required field", () => {
      const error = malformed("g1\tC\tchr1\t1\t2\t \n");
      expect(error.lineNumber).toBe(1);
      expect(error.message).toBe('genome.tsv: Required field "alg" is empty');
    });

    test("empty chromosome", () => {
      expect(malformed("g1\tC\t\t1\t2\tA1\n").message).toBe(
        'genome.tsv: Required field "chromosome" is empty'
      );
    });

    test("negative or non-numeric coordinates", () => {
      expect(malformed("g1\tC\tchr1\t-5\t2\tA1\n").message).toBe(
        'genome.tsv: Field "start" must be a non-negative number, got "-5"'
      );
      expect(malformed("g1\tC\tchr1\t1\tend\tA1\n").message).toBe(
        'genome.tsv: Field "end" must be a non-negative number, got "end"'
      );
    });

    test("blank lines are errors when not skipped", () => {
      const parser = new CoordinatesParser({ skipEmptyLines: false });
      const error = malformed("g1\tC\tchr1\t1\t2\tA1\n\n", parser);
      expect(error.lineNumber).toBe(2);
    });

    test("toString names the line and shows it", () => {
      const error = malformed("g1\tC\tchr1\n");
      expect(error.toString()).toBe(
        'MalformedInputError: genome.tsv: Expected at least 6 tab-separated fields, found 3 (line 1)\nContext: "g1\\tC\\tchr1"'
      );
    });
  });

  describe("options", () => {
    test("accepts another delimiter", () => {
      const parser = new CoordinatesParser({ delimiter: "," });
      expect(parse("g1,C,chr1,1,2,A1\n", parser)[0]?.chromosome).toBe("chr1");
    });

    test("rejects a multi-character delimiter", () => {
      expect(() => new CoordinatesParser({ delimiter: "::" })).toThrow(ValidationError);
    });

    test("rejects an empty comment prefix", () => {
      expect(() => new CoordinatesParser({ commentPrefix: "" })).toThrow(ValidationError);
    });
  });
});

describe("file names", () => {
  test("species label is the base name", () => {
    expect(speciesLabel("genomes/run1/Hydra_vulgaris.tsv")).toBe("Hydra_vulgaris.tsv");
    expect(speciesLabel("plain.tsv.gz")).toBe("plain.tsv.gz");
  });

  test("recognizes coordinates tables", () => {
    expect(isCoordinatesFile("a.tsv", COORDINATES_EXTENSIONS)).toBe(true);
    expect(isCoordinatesFile("a.tsv.gz", COORDINATES_EXTENSIONS)).toBe(true);
    expect(isCoordinatesFile("a.csv", COORDINATES_EXTENSIONS)).toBe(false);
    expect(isCoordinatesFile("a.tsv.bak", COORDINATES_EXTENSIONS)).toBe(false);
  });
});
