/**
 * Properties - typed computations from a context (e.g. a commit) to a value.
 *
 * There is a fixed set of value kinds. Each property is tagged with its kind
 * so method lookup and coercions can dispatch without inspecting values.
 */

import type { CommitOrChangeId, ShortestIdPrefix } from "./ids";
import type { Signature, Timestamp } from "./time";

export interface PropertyTypes {
  String: string;
  Boolean: boolean;
  Integer: bigint;
  CommitOrChangeId: CommitOrChangeId;
  ShortestIdPrefix: ShortestIdPrefix;
  Signature: Signature;
  Timestamp: Timestamp;
}

export type PropertyKind = keyof PropertyTypes;

export type TemplateProperty<C, O> = (context: C) => O;

export type PropertyOf<C, K extends PropertyKind> = {
  readonly tag: K;
  readonly extract: TemplateProperty<C, PropertyTypes[K]>;
};

export type Property<C> =
  | PropertyOf<C, "String">
  | PropertyOf<C, "Boolean">
  | PropertyOf<C, "Integer">
  | PropertyOf<C, "CommitOrChangeId">
  | PropertyOf<C, "ShortestIdPrefix">
  | PropertyOf<C, "Signature">
  | PropertyOf<C, "Timestamp">;

export function property<C, K extends PropertyKind>(
  tag: K,
  extract: TemplateProperty<C, PropertyTypes[K]>
): PropertyOf<C, K> {
  return { tag, extract };
}

export function constant<T>(value: T): TemplateProperty<unknown, T> {
  return () => value;
}

/**
 * Feed a property's output through a pure function.
 */
export function mapProperty<C, I, O>(
  source: TemplateProperty<C, I>,
  fn: (value: I) => O
): TemplateProperty<C, O> {
  return (context) => fn(source(context));
}
