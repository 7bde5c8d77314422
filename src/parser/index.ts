/**
 * Template parser
 */

// Lezer tree + conversion to the template AST
export { parseTemplate, parseTree } from "./convert";

// Lezer parser (for editor integration)
export { parser as lezerParser } from "./parser";
export { highlighting } from "./highlight";
