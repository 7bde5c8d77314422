import { describe, test, expect } from "vitest";
import { normalizeTree, type ExpressionNode } from "../src/ast/template-ast";
import { TemplateParseError } from "../src/errors";
import { parseTemplate } from "../src/parser";

function parseNormalized(source: string): ExpressionNode {
  return normalizeTree(parseTemplate(source));
}

function parseError(source: string): TemplateParseError {
  try {
    parseTemplate(source);
  } catch (err) {
    if (err instanceof TemplateParseError) return err;
    throw err;
  }
  throw new Error(`expected ${source} to fail`);
}

describe("Template Parser", () => {
  describe("tree shape", () => {
    test("whitespace and grouping do not change the tree", () => {
      expect(parseNormalized(" commit_id.short(1 )  description")).toEqual(
        parseNormalized("commit_id.short( 1 ) (description)")
      );
    });

    test("one string differs from two juxtaposed strings", () => {
      expect(parseNormalized('"ab"')).not.toEqual(parseNormalized('"a" "b"'));
    });

    test("string literal differs from integer literal", () => {
      expect(parseNormalized('"foo" "0"')).not.toEqual(parseNormalized('"foo" 0'));
    });

    test("single term collapses", () => {
      expect(parseTemplate("description")).toEqual({
        kind: "identifier",
        name: "description",
        span: { from: 0, to: 11 },
      });
    });

    test("juxtaposed terms form a list", () => {
      expect(parseTemplate("a b")).toEqual({
        kind: "list",
        items: [
          { kind: "identifier", name: "a", span: { from: 0, to: 1 } },
          { kind: "identifier", name: "b", span: { from: 2, to: 3 } },
        ],
        span: { from: 0, to: 3 },
      });
    });

    test("groups are transparent", () => {
      const a = { kind: "identifier", name: "a", span: { from: 0, to: 0 } };
      const b = { kind: "identifier", name: "b", span: { from: 0, to: 0 } };
      const c = { kind: "identifier", name: "c", span: { from: 0, to: 0 } };
      expect(parseNormalized("(a b) c")).toEqual({
        kind: "list",
        items: [{ kind: "list", items: [a, b], span: { from: 0, to: 0 } }, c],
        span: { from: 0, to: 0 },
      });
      expect(parseNormalized("((a))")).toEqual(a);
    });

    test("empty program", () => {
      expect(parseTemplate("")).toEqual({ kind: "list", items: [], span: { from: 0, to: 0 } });
      expect(parseTemplate("  ")).toEqual({ kind: "list", items: [], span: { from: 2, to: 2 } });
    });
  });

  describe("function call syntax", () => {
    test.each([
      '"".first_line()',
      '"".contains("")',
      '"".contains("",)',
      '"".contains("" ,  )',
      'label("","")',
      'label("","",)',
    ])("accepts %s", (source) => {
      expect(() => parseTemplate(source)).not.toThrow();
    });

    test.each([
      '"".first_line(,)',
      '"".contains(,"")',
      '"".contains("",,)',
      '"".contains("" , , )',
      'label("",,"")',
    ])("rejects %s", (source) => {
      expect(parseError(source).kind).toEqual({ type: "SyntaxError" });
    });

    test("trailing comma adds no argument", () => {
      const node = parseTemplate('label("a", b,)');
      expect(node.kind).toBe("functionCall");
      if (node.kind !== "functionCall") return;
      expect(node.call.args).toHaveLength(2);
    });

    test("call spans", () => {
      const node = parseTemplate('label("a", b)');
      expect(node.span).toEqual({ from: 0, to: 13 });
      if (node.kind !== "functionCall") throw new Error("expected a function call");
      expect(node.call.name).toBe("label");
      expect(node.call.nameSpan).toEqual({ from: 0, to: 5 });
      expect(node.call.argsSpan).toEqual({ from: 6, to: 12 });
    });

    test("empty argument list span", () => {
      const node = parseTemplate("f()");
      if (node.kind !== "functionCall") throw new Error("expected a function call");
      expect(node.call.args).toEqual([]);
      expect(node.call.argsSpan).toEqual({ from: 2, to: 2 });
    });
  });

  describe("method calls", () => {
    test("method span covers the call after the dot", () => {
      const node = parseTemplate("x.f(y, z)");
      expect(node.span).toEqual({ from: 1, to: 9 });
      if (node.kind !== "methodCall") throw new Error("expected a method call");
      expect(node.method.object).toEqual({ kind: "identifier", name: "x", span: { from: 0, to: 1 } });
      expect(node.method.call.nameSpan).toEqual({ from: 2, to: 3 });
      expect(node.method.call.argsSpan).toEqual({ from: 4, to: 8 });
      expect(node.method.call.args).toEqual([
        { kind: "identifier", name: "y", span: { from: 4, to: 5 } },
        { kind: "identifier", name: "z", span: { from: 7, to: 8 } },
      ]);
    });

    test("chains fold left", () => {
      const node = parseTemplate("x.f().g()");
      if (node.kind !== "methodCall") throw new Error("expected a method call");
      expect(node.span).toEqual({ from: 5, to: 9 });
      expect(node.method.call.name).toBe("g");
      const inner = node.method.object;
      if (inner.kind !== "methodCall") throw new Error("expected a method call");
      expect(inner.span).toEqual({ from: 1, to: 5 });
      expect(inner.method.call.name).toBe("f");
    });

    test("method on a group applies to the whole group", () => {
      const node = parseNormalized("(a b).f()");
      if (node.kind !== "methodCall") throw new Error("expected a method call");
      expect(node.method.object.kind).toBe("list");
    });

    test("property access without call is rejected", () => {
      expect(parseError("author.name").kind).toEqual({ type: "SyntaxError" });
    });
  });

  describe("integer literals", () => {
    test("zero", () => {
      expect(parseTemplate("0")).toEqual({ kind: "integer", value: 0n, span: { from: 0, to: 1 } });
    });

    test("parenthesized", () => {
      expect(parseTemplate("(42)")).toEqual({ kind: "integer", value: 42n, span: { from: 1, to: 3 } });
    });

    test("leading zero is rejected", () => {
      const error = parseError("00");
      expect(error.kind).toEqual({ type: "SyntaxError" });
      expect(error.span).toEqual({ from: 0, to: 2 });
    });

    test("largest signed 64-bit value", () => {
      const node = parseTemplate("9223372036854775807");
      expect(node).toMatchObject({ kind: "integer", value: 9223372036854775807n });
    });

    test("out of range", () => {
      const error = parseError("9223372036854775808");
      expect(error.kind).toEqual({ type: "ParseIntError", reason: "number too large to fit in target type" });
      expect(error.message).toBe("Invalid integer literal: number too large to fit in target type");
      expect(error.span).toEqual({ from: 0, to: 19 });
    });
  });

  describe("string literals", () => {
    test("escapes are decoded", () => {
      expect(parseTemplate('"a\\"b\\\\c\\nd"')).toMatchObject({ kind: "string", value: 'a"b\\c\nd' });
    });

    test("raw newline is kept", () => {
      expect(parseTemplate('"a\nb"')).toMatchObject({ kind: "string", value: "a\nb" });
    });

    test("unknown escape is a syntax error", () => {
      expect(parseError('"\\t"').message).toBe("Syntax error");
    });

    test("unterminated string is a syntax error", () => {
      expect(parseError('"abc').kind).toEqual({ type: "SyntaxError" });
    });
  });
});
