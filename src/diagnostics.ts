/**
 * Caret-style rendering of template errors.
 */

import type { SourceSpan } from "./ast/template-ast";
import type { TemplateParseError } from "./errors";

export type LineColumn = {
  line: number; // 1-based
  column: number; // 1-based
};

/**
 * Line and column of a string offset. Columns count code points, so a
 * character outside the BMP occupies one column.
 */
export function lineColumn(source: string, offset: number): LineColumn {
  const clamped = Math.max(0, Math.min(offset, source.length));
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < clamped; i++) {
    if (source[i] === "\n") {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: codePointLength(source.slice(lineStart, clamped)) + 1 };
}

function codePointLength(text: string): number {
  return [...text].length;
}

/**
 * Format an error as
 *
 *   line 1, column 5: Keyword "foo" doesn't exist
 *   1 | abc foo
 *     |     ^^^
 *
 * Spans reaching past the end of their first line are underlined to the end
 * of that line.
 */
export function formatDiagnostic(error: TemplateParseError, source: string): string {
  const { line, column } = lineColumn(source, error.span.from);
  const header = `line ${line}, column ${column}: ${error.message}`;
  return [header, ...sourceExcerpt(source, error.span, line, column)].join("\n");
}

function sourceExcerpt(source: string, span: SourceSpan, line: number, column: number): string[] {
  const lineText = source.split("\n")[line - 1] ?? "";
  const gutter = String(line);
  const pad = " ".repeat(gutter.length);

  const start = column - 1;
  const width = codePointLength(source.slice(span.from, span.to));
  const end = Math.min(start + Math.max(width, 1), Math.max(codePointLength(lineText), start + 1));
  const carets = " ".repeat(start) + "^".repeat(end - start);

  return [`${gutter} | ${lineText}`, `${pad} | ${carets}`];
}
