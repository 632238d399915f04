import { describe, test, expect } from "vitest";
import {
  INITIAL_VERSION,
  parseVersion,
  isExactVersion,
  formatVersion,
  bumpVersion,
  compareVersions,
  isGreaterThan,
} from "./version";
import { InvalidVersionFormatError } from "#/errors";

describe("version", () => {
  describe("parseVersion", () => {
    test("parses v-prefixed tags", () => {
      expect(parseVersion("v1.2.3")).toEqual({ major: 1, minor: 2, patch: 3 });
    });

    test("parses tags without prefix", () => {
      expect(parseVersion("10.20.30")).toEqual({ major: 10, minor: 20, patch: 30 });
    });

    test("ignores pre-release and trailing text", () => {
      expect(parseVersion("1.2.3-rc1")).toEqual({ major: 1, minor: 2, patch: 3 });
      expect(parseVersion("v4.5.6+build.7")).toEqual({ major: 4, minor: 5, patch: 6 });
      expect(parseVersion("v0.0.1garbage")).toEqual({ major: 0, minor: 0, patch: 1 });
    });

    test("reads each component as base 10", () => {
      expect(parseVersion("v01.002.0003")).toEqual({ major: 1, minor: 2, patch: 3 });
    });

    test("rejects empty string", () => {
      expect(() => parseVersion("")).toThrow(InvalidVersionFormatError);
    });

    test("rejects non-numeric text", () => {
      expect(() => parseVersion("abc")).toThrow(InvalidVersionFormatError);
      expect(() => parseVersion("vlatest")).toThrow(InvalidVersionFormatError);
    });

    test("rejects incomplete versions", () => {
      expect(() => parseVersion("v1.2")).toThrow(InvalidVersionFormatError);
      expect(() => parseVersion("1")).toThrow(InvalidVersionFormatError);
    });

    test("only strips a single lowercase v", () => {
      expect(() => parseVersion("V1.2.3")).toThrow(InvalidVersionFormatError);
      expect(() => parseVersion("vv1.2.3")).toThrow(InvalidVersionFormatError);
    });

    test("rejects components beyond the safe integer range", () => {
      expect(parseVersion("v9007199254740991.0.0")).toEqual({ major: 9007199254740991, minor: 0, patch: 0 });
      expect(() => parseVersion("v9007199254740993.0.0")).toThrow(InvalidVersionFormatError);
      expect(() => parseVersion("1.2.99999999999999999999")).toThrow(
        'Invalid version format: "1.2.99999999999999999999" (expected major.minor.patch)'
      );
    });

    test("error carries the offending text", () => {
      try {
        parseVersion("release-1");
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidVersionFormatError);
        if (err instanceof InvalidVersionFormatError) {
          expect(err.input).toBe("release-1");
          expect(err.code).toBe("invalid_version_format");
        }
      }
    });
  });

  describe("isExactVersion", () => {
    test("accepts plain and v-prefixed versions", () => {
      expect(isExactVersion("1.2.3")).toBe(true);
      expect(isExactVersion("v1.2.3")).toBe(true);
    });

    test("rejects trailing text", () => {
      expect(isExactVersion("v1.2.3-rc1")).toBe(false);
      expect(isExactVersion("1.2")).toBe(false);
    });
  });

  describe("formatVersion", () => {
    test("formats as v-prefixed tag", () => {
      expect(formatVersion({ major: 1, minor: 2, patch: 3 })).toBe("v1.2.3");
    });

    test("formats the initial version", () => {
      expect(formatVersion(INITIAL_VERSION)).toBe("v0.0.0");
    });

    test("round-trips through parseVersion", () => {
      const version = { major: 3, minor: 14, patch: 159 };
      expect(parseVersion(formatVersion(version))).toEqual(version);
    });
  });

  describe("bumpVersion", () => {
    const base = { major: 1, minor: 4, patch: 7 };

    test("major resets minor and patch", () => {
      expect(bumpVersion(base, "major")).toEqual({ major: 2, minor: 0, patch: 0 });
    });

    test("minor resets patch", () => {
      expect(bumpVersion(base, "minor")).toEqual({ major: 1, minor: 5, patch: 0 });
    });

    test("patch increments patch only", () => {
      expect(bumpVersion(base, "patch")).toEqual({ major: 1, minor: 4, patch: 8 });
    });

    test("bumps from the initial version", () => {
      expect(bumpVersion(INITIAL_VERSION, "minor")).toEqual({ major: 0, minor: 1, patch: 0 });
    });
  });

  describe("compareVersions", () => {
    test("returns -1 when a < b", () => {
      expect(compareVersions({ major: 1, minor: 0, patch: 0 }, { major: 2, minor: 0, patch: 0 })).toBe(-1);
      expect(compareVersions({ major: 1, minor: 0, patch: 9 }, { major: 1, minor: 1, patch: 0 })).toBe(-1);
    });

    test("returns 0 when equal", () => {
      expect(compareVersions({ major: 2, minor: 5, patch: 3 }, { major: 2, minor: 5, patch: 3 })).toBe(0);
    });

    test("compares numerically, not lexically", () => {
      expect(compareVersions({ major: 10, minor: 0, patch: 0 }, { major: 9, minor: 0, patch: 0 })).toBe(1);
    });
  });

  describe("isGreaterThan", () => {
    test("returns true when a > b", () => {
      expect(isGreaterThan({ major: 1, minor: 0, patch: 1 }, { major: 1, minor: 0, patch: 0 })).toBe(true);
    });

    test("returns false when a <= b", () => {
      expect(isGreaterThan({ major: 1, minor: 0, patch: 0 }, { major: 1, minor: 0, patch: 0 })).toBe(false);
      expect(isGreaterThan({ major: 0, minor: 9, patch: 0 }, { major: 1, minor: 0, patch: 0 })).toBe(false);
    });
  });
});
