/**
 * Build-time errors.
 *
 * Every error raised while parsing or building a template is a
 * TemplateParseError carrying the span of the offending source text.
 * Building is fail-fast: the first error aborts the whole compilation.
 */

import type { SourceSpan } from "./ast/template-ast";

export type TemplateParseErrorKind =
  | { type: "SyntaxError" }
  | { type: "ParseIntError"; reason: string }
  | { type: "NoSuchKeyword"; name: string }
  | { type: "NoSuchFunction"; name: string }
  | { type: "NoSuchMethod"; typeName: string; name: string }
  | { type: "InvalidArgumentCountExact"; count: number }
  | { type: "InvalidArgumentCountRange"; min: number; max: number }
  | { type: "InvalidArgumentCountRangeFrom"; min: number }
  | { type: "InvalidArgumentType"; expectedType: string };

export function describeErrorKind(kind: TemplateParseErrorKind): string {
  switch (kind.type) {
    case "SyntaxError":
      return "Syntax error";
    case "ParseIntError":
      return `Invalid integer literal: ${kind.reason}`;
    case "NoSuchKeyword":
      return `Keyword "${kind.name}" doesn't exist`;
    case "NoSuchFunction":
      return `Function "${kind.name}" doesn't exist`;
    case "NoSuchMethod":
      return `Method "${kind.name}" doesn't exist for type "${kind.typeName}"`;
    case "InvalidArgumentCountExact":
      return `Expected ${kind.count} arguments`;
    case "InvalidArgumentCountRange":
      return `Expected ${kind.min} to ${kind.max} arguments`;
    case "InvalidArgumentCountRangeFrom":
      return `Expected at least ${kind.min} arguments`;
    case "InvalidArgumentType":
      return `Expected argument of type "${kind.expectedType}"`;
  }
}

export class TemplateParseError extends Error {
  readonly kind: TemplateParseErrorKind;
  readonly span: SourceSpan;

  constructor(kind: TemplateParseErrorKind, span: SourceSpan, options?: { cause?: unknown }) {
    super(describeErrorKind(kind), options);
    this.name = "TemplateParseError";
    this.kind = kind;
    this.span = span;
  }

  static syntaxError(span: SourceSpan, cause?: unknown): TemplateParseError {
    return new TemplateParseError({ type: "SyntaxError" }, span, { cause });
  }

  static noSuchKeyword(name: string, span: SourceSpan): TemplateParseError {
    return new TemplateParseError({ type: "NoSuchKeyword", name }, span);
  }

  static noSuchFunction(name: string, span: SourceSpan): TemplateParseError {
    return new TemplateParseError({ type: "NoSuchFunction", name }, span);
  }

  static noSuchMethod(typeName: string, name: string, span: SourceSpan): TemplateParseError {
    return new TemplateParseError({ type: "NoSuchMethod", typeName, name }, span);
  }

  static invalidArgumentCountExact(count: number, span: SourceSpan): TemplateParseError {
    return new TemplateParseError({ type: "InvalidArgumentCountExact", count }, span);
  }

  static invalidArgumentCountRange(min: number, max: number, span: SourceSpan): TemplateParseError {
    return new TemplateParseError({ type: "InvalidArgumentCountRange", min, max }, span);
  }

  static invalidArgumentCountRangeFrom(min: number, span: SourceSpan): TemplateParseError {
    return new TemplateParseError({ type: "InvalidArgumentCountRangeFrom", min }, span);
  }

  static invalidArgumentType(expectedType: string, span: SourceSpan): TemplateParseError {
    return new TemplateParseError({ type: "InvalidArgumentType", expectedType }, span);
  }
}
