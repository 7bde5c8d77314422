/**
 * Argument count checks for function and method calls.
 *
 * Each shape reports its own error kind at the call's argument span.
 */

import type { ExpressionNode, FunctionCallNode } from "../ast/template-ast";
import { TemplateParseError } from "../errors";

export function expectNoArguments(call: FunctionCallNode): void {
  if (call.args.length !== 0) {
    throw TemplateParseError.invalidArgumentCountExact(0, call.argsSpan);
  }
}

/**
 * Exactly `count` arguments.
 */
export function expectExactArguments(call: FunctionCallNode, count: number): readonly ExpressionNode[] {
  if (call.args.length !== count) {
    throw TemplateParseError.invalidArgumentCountExact(count, call.argsSpan);
  }
  return call.args;
}

/**
 * At least `count` arguments, split into the required ones and the rest.
 */
export function expectSomeArguments(
  call: FunctionCallNode,
  count: number
): { required: readonly ExpressionNode[]; rest: readonly ExpressionNode[] } {
  if (call.args.length < count) {
    throw TemplateParseError.invalidArgumentCountRangeFrom(count, call.argsSpan);
  }
  return { required: call.args.slice(0, count), rest: call.args.slice(count) };
}

/**
 * `required` arguments followed by up to `optional` more. Missing optional
 * arguments come back as undefined.
 */
export function expectArguments(
  call: FunctionCallNode,
  required: number,
  optional: number
): { required: readonly ExpressionNode[]; optional: readonly (ExpressionNode | undefined)[] } {
  const max = required + optional;
  if (call.args.length < required || call.args.length > max) {
    throw TemplateParseError.invalidArgumentCountRange(required, max, call.argsSpan);
  }
  return {
    required: call.args.slice(0, required),
    optional: Array.from({ length: optional }, (_, i) => call.args[required + i]),
  };
}
