/**
 * Syntax highlighting props for editor integration.
 */

import { styleTags, tags as t } from "@lezer/highlight";

export const highlighting = styleTags({
  Identifier: t.variableName,
  FunctionName: t.function(t.variableName),
  String: t.string,
  Integer: t.integer,
  "( )": t.paren,
  ",": t.separator,
  ".": t.derefOperator,
});
