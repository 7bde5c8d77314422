import { describe, it, expect } from "vitest";

import { formatDiagnostic, lineColumn } from "../src/diagnostics";
import { TemplateParseError } from "../src/errors";

describe("lineColumn", () => {
  it("is 1-based", () => {
    expect(lineColumn("abc", 0)).toEqual({ line: 1, column: 1 });
  });

  it("counts lines", () => {
    expect(lineColumn("ab\ncd", 4)).toEqual({ line: 2, column: 2 });
    expect(lineColumn("ab\ncd", 3)).toEqual({ line: 2, column: 1 });
  });

  it("counts characters outside the BMP once", () => {
    expect(lineColumn('"\u{1F600}" nope', 5)).toEqual({ line: 1, column: 5 });
  });

  it("end of input", () => {
    expect(lineColumn("ab", 2)).toEqual({ line: 1, column: 3 });
  });
});

describe("formatDiagnostic", () => {
  it("underlines the span", () => {
    const error = TemplateParseError.noSuchKeyword("foo", { from: 4, to: 7 });
    expect(formatDiagnostic(error, "abc foo")).toBe(
      ['line 1, column 5: Keyword "foo" doesn\'t exist', "1 | abc foo", "  |     ^^^"].join("\n")
    );
  });

  it("zero-width spans get one caret", () => {
    const error = TemplateParseError.syntaxError({ from: 7, to: 7 });
    expect(formatDiagnostic(error, "abc foo")).toBe(
      ["line 1, column 8: Syntax error", "1 | abc foo", "  |        ^"].join("\n")
    );
  });

  it("shows the line the span starts on", () => {
    const error = TemplateParseError.noSuchFunction("bar", { from: 2, to: 5 });
    expect(formatDiagnostic(error, "a\nbar()")).toBe(
      ['line 2, column 1: Function "bar" doesn\'t exist', "2 | bar()", "  | ^^^"].join("\n")
    );
  });

  it("stops the underline at the end of the line", () => {
    const error = TemplateParseError.invalidArgumentCountExact(2, { from: 0, to: 10 });
    expect(formatDiagnostic(error, "ab\ncdefgh")).toBe(
      ["line 1, column 1: Expected 2 arguments", "1 | ab", "  | ^^"].join("\n")
    );
  });

  it("columns and carets count characters, not code units", () => {
    const source = '"\u{1F600}" nope';
    const error = TemplateParseError.noSuchKeyword("nope", { from: 5, to: 9 });
    expect(formatDiagnostic(error, source)).toBe(
      ['line 1, column 5: Keyword "nope" doesn\'t exist', `1 | ${source}`, "  |     ^^^^"].join("\n")
    );
  });

  it("spans over wide characters get one caret per character", () => {
    const source = 'x "\u{1F600}"';
    const error = TemplateParseError.invalidArgumentType("Integer", { from: 2, to: 6 });
    expect(formatDiagnostic(error, source)).toBe(
      ['line 1, column 3: Expected argument of type "Integer"', `1 | ${source}`, "  |   ^^^"].join("\n")
    );
  });
});
