/**
 * Method tables for each value kind.
 *
 * A method builder checks its arguments at build time and returns a new
 * property computing the method's result from the receiver.
 */

import type { FunctionCallNode } from "../ast/template-ast";
import { TemplateParseError } from "../errors";
import type { ShortestIdPrefix } from "../values/ids";
import {
  mapProperty,
  property,
  type Property,
  type PropertyKind,
  type PropertyOf,
  type TemplateProperty,
} from "../values/property";
import { emailUsername, formatTimestampRelativeToNow } from "../values/time";
import { expectArguments, expectExactArguments, expectNoArguments } from "./arguments";
import { intoPlainText, tryIntoInteger, type BuildContext } from "./expression";

export type MethodBuilder<K extends PropertyKind> = <C>(
  self: PropertyOf<C, K>,
  call: FunctionCallNode,
  builder: BuildContext<C>
) => Property<C>;

export type MethodTable<K extends PropertyKind> = ReadonlyMap<string, MethodBuilder<K>>;

// ============================================================================
// String
// ============================================================================

function stringContains<C>(
  self: PropertyOf<C, "String">,
  call: FunctionCallNode,
  builder: BuildContext<C>
): Property<C> {
  const [needleNode] = expectExactArguments(call, 1);
  const needle = intoPlainText(builder.build(needleNode));
  const haystack = self.extract;
  return property("Boolean", (context: C) => haystack(context).includes(needle(context)));
}

function stringFirstLine<C>(self: PropertyOf<C, "String">, call: FunctionCallNode): Property<C> {
  expectNoArguments(call);
  return property("String", mapProperty(self.extract, firstLine));
}

function firstLine(text: string): string {
  const end = text.indexOf("\n");
  const line = end === -1 ? text : text.slice(0, end);
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

export const stringMethods: MethodTable<"String"> = new Map<string, MethodBuilder<"String">>([
  ["contains", stringContains],
  ["first_line", stringFirstLine],
]);

// ============================================================================
// Boolean / Integer
// ============================================================================

export const booleanMethods: MethodTable<"Boolean"> = new Map();

export const integerMethods: MethodTable<"Integer"> = new Map();

// ============================================================================
// CommitOrChangeId
// ============================================================================

function optionalLength<C>(
  call: FunctionCallNode,
  builder: BuildContext<C>
): TemplateProperty<C, bigint> | undefined {
  const {
    optional: [lengthNode],
  } = expectArguments(call, 0, 1);
  if (!lengthNode) return undefined;
  const length = tryIntoInteger(builder.build(lengthNode));
  if (!length) {
    throw TemplateParseError.invalidArgumentType("Integer", lengthNode.span);
  }
  return length;
}

// Lengths that don't fit a non-negative count fall back to the default.
function lengthOr<C>(length: TemplateProperty<C, bigint> | undefined, fallback: number, context: C): number {
  const value = length?.(context);
  if (value === undefined || value < 0n) return fallback;
  return value > BigInt(Number.MAX_SAFE_INTEGER) ? Number.MAX_SAFE_INTEGER : Number(value);
}

function idShort<C>(
  self: PropertyOf<C, "CommitOrChangeId">,
  call: FunctionCallNode,
  builder: BuildContext<C>
): Property<C> {
  const length = optionalLength(call, builder);
  const id = self.extract;
  return property("String", (context: C) => id(context).short(lengthOr(length, 12, context)));
}

function idShortest<C>(
  self: PropertyOf<C, "CommitOrChangeId">,
  call: FunctionCallNode,
  builder: BuildContext<C>
): Property<C> {
  const length = optionalLength(call, builder);
  const id = self.extract;
  return property("ShortestIdPrefix", (context: C) => id(context).shortest(lengthOr(length, 0, context)));
}

export const commitOrChangeIdMethods: MethodTable<"CommitOrChangeId"> = new Map<
  string,
  MethodBuilder<"CommitOrChangeId">
>([
  ["short", idShort],
  ["shortest", idShortest],
]);

// ============================================================================
// ShortestIdPrefix
// ============================================================================

function prefixWithBrackets<C>(self: PropertyOf<C, "ShortestIdPrefix">, call: FunctionCallNode): Property<C> {
  expectNoArguments(call);
  return property("String", mapProperty(self.extract, (id: ShortestIdPrefix) => id.withBrackets()));
}

export const shortestIdPrefixMethods: MethodTable<"ShortestIdPrefix"> = new Map<
  string,
  MethodBuilder<"ShortestIdPrefix">
>([["with_brackets", prefixWithBrackets]]);

// ============================================================================
// Signature
// ============================================================================

export const signatureMethods: MethodTable<"Signature"> = new Map<string, MethodBuilder<"Signature">>([
  [
    "name",
    (self, call) => {
      expectNoArguments(call);
      return property("String", mapProperty(self.extract, (signature) => signature.name));
    },
  ],
  [
    "email",
    (self, call) => {
      expectNoArguments(call);
      return property("String", mapProperty(self.extract, (signature) => signature.email));
    },
  ],
  [
    "username",
    (self, call) => {
      expectNoArguments(call);
      return property("String", mapProperty(self.extract, (signature) => emailUsername(signature.email)));
    },
  ],
  [
    "timestamp",
    (self, call) => {
      expectNoArguments(call);
      return property("Timestamp", mapProperty(self.extract, (signature) => signature.timestamp));
    },
  ],
]);

// ============================================================================
// Timestamp
// ============================================================================

export const timestampMethods: MethodTable<"Timestamp"> = new Map<string, MethodBuilder<"Timestamp">>([
  [
    "ago",
    (self, call) => {
      expectNoArguments(call);
      return property("String", mapProperty(self.extract, formatTimestampRelativeToNow));
    },
  ],
]);

// ============================================================================
// Dispatch
// ============================================================================

function callMethod<C, K extends PropertyKind>(
  table: MethodTable<K>,
  self: PropertyOf<C, K>,
  call: FunctionCallNode,
  builder: BuildContext<C>
): Property<C> {
  const method = table.get(call.name);
  if (!method) {
    throw TemplateParseError.noSuchMethod(self.tag, call.name, call.nameSpan);
  }
  return method(self, call, builder);
}

/**
 * Look up and build a method on a property, by the property's kind.
 */
export function buildPropertyMethod<C>(
  self: Property<C>,
  call: FunctionCallNode,
  builder: BuildContext<C>
): Property<C> {
  switch (self.tag) {
    case "String":
      return callMethod(stringMethods, self, call, builder);
    case "Boolean":
      return callMethod(booleanMethods, self, call, builder);
    case "Integer":
      return callMethod(integerMethods, self, call, builder);
    case "CommitOrChangeId":
      return callMethod(commitOrChangeIdMethods, self, call, builder);
    case "ShortestIdPrefix":
      return callMethod(shortestIdPrefixMethods, self, call, builder);
    case "Signature":
      return callMethod(signatureMethods, self, call, builder);
    case "Timestamp":
      return callMethod(timestampMethods, self, call, builder);
  }
}
