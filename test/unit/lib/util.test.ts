import { describe, expect, it } from "@effect/vitest";
import { Option } from "effect";
import {
  buildPdfFileName,
  extractFilenamePrefix,
  formatDateStamp,
  sourceFromPath,
} from "../../../src/lib/util.js";

describe("Lib Util Tests", () => {
  describe("extractFilenamePrefix", () => {
    it("should keep a single word as is", () => {
      expect(extractFilenamePrefix("Invoice")).toBe("Invoice");
    });

    it("should join the first three words with underscores", () => {
      expect(extractFilenamePrefix("Quarterly Report Draft Final v2")).toBe(
        "Quarterly_Report_Draft",
      );
    });

    it("should split on any run of whitespace", () => {
      expect(extractFilenamePrefix("  Test \t Email  ")).toBe("Test_Email");
    });

    it("should strip punctuation after joining", () => {
      expect(extractFilenamePrefix("Re: Lunch (Friday)!")).toBe(
        "Re_Lunch_Friday",
      );
    });

    it("should keep letters and digits outside ASCII", () => {
      expect(extractFilenamePrefix("Café Über 2024")).toBe("Café_Über_2024");
    });

    it("should fall back to NoName for blank names", () => {
      expect(extractFilenamePrefix("")).toBe("NoName");
      expect(extractFilenamePrefix("   ")).toBe("NoName");
    });

    it("should fall back to NoName when nothing survives sanitizing", () => {
      expect(extractFilenamePrefix("!!!")).toBe("NoName");
    });

    it("should only ever produce word characters", () => {
      const inputs = ["a-b c.d e/f g", "x y", "Hello, World", "__init__"];
      for (const input of inputs) {
        expect(extractFilenamePrefix(input)).toMatch(/^[\p{L}\p{N}_]+$/u);
      }
    });
  });

  describe("formatDateStamp", () => {
    it("should format a UTC date", () => {
      expect(
        formatDateStamp({
          instant: new Date(Date.UTC(2024, 0, 15, 10, 30)),
          offsetMinutes: 0,
        }),
      ).toBe("2024-01-15");
    });

    it("should use the calendar day of the header offset", () => {
      // 23:30 -0500 on the 15th is 04:30 UTC on the 16th
      expect(
        formatDateStamp({
          instant: new Date(Date.UTC(2024, 0, 16, 4, 30)),
          offsetMinutes: -300,
        }),
      ).toBe("2024-01-15");
    });

    it("should zero-pad month and day", () => {
      expect(
        formatDateStamp({
          instant: new Date(Date.UTC(2023, 2, 5)),
          offsetMinutes: 0,
        }),
      ).toBe("2023-03-05");
    });
  });

  describe("buildPdfFileName", () => {
    it("should omit the counter for the first name", () => {
      expect(buildPdfFileName("2024-01-15", "Test_Email")).toBe(
        "2024-01-15_Email_Test_Email.pdf",
      );
    });

    it("should append the counter before the extension", () => {
      expect(buildPdfFileName("2024-01-15", "Test_Email", 2)).toBe(
        "2024-01-15_Email_Test_Email_2.pdf",
      );
    });
  });

  describe("sourceFromPath", () => {
    it("should recognize .eml and .msg files", () => {
      const eml = sourceFromPath("/mail/a.eml");
      const msg = sourceFromPath("/mail/b.msg");

      expect(Option.map(eml, (source) => source._tag)).toEqual(
        Option.some("EmlSource"),
      );
      expect(Option.map(msg, (source) => source._tag)).toEqual(
        Option.some("MsgSource"),
      );
    });

    it("should match extensions case-insensitively", () => {
      expect(
        Option.map(sourceFromPath("/mail/Upper.EML"), (source) => source.path),
      ).toEqual(Option.some("/mail/Upper.EML"));
    });

    it("should ignore other files", () => {
      expect(Option.isNone(sourceFromPath("/mail/notes.txt"))).toBe(true);
      expect(Option.isNone(sourceFromPath("/mail/eml"))).toBe(true);
    });
  });
});
