/**
 * Commit template language: parse, build and render templates.
 */

// Parsing
export { parseTemplate, parseTree, lezerParser, highlighting } from "./parser";
export type {
  ExpressionNode,
  ExpressionKind,
  FunctionCallNode,
  MethodCallNode,
  SourceSpan,
  Spanned,
} from "./ast/template-ast";
export { normalizeTree } from "./ast/template-ast";

// Errors
export { TemplateParseError, describeErrorKind, type TemplateParseErrorKind } from "./errors";
export { formatDiagnostic, lineColumn, type LineColumn } from "./diagnostics";

// Values
export {
  property,
  constant,
  mapProperty,
  type Property,
  type PropertyKind,
  type PropertyOf,
  type PropertyTypes,
  type TemplateProperty,
} from "./values/property";
export { CommitOrChangeId, ShortestIdPrefix, HexIdIndex, type IdIndex } from "./values/ids";
export {
  emailUsername,
  formatTimestamp,
  formatTimestampRelativeTo,
  formatTimestampRelativeToNow,
  type Signature,
  type Timestamp,
} from "./values/time";

// Building
export { buildExpression, type BuildOptions } from "./builder/build";
export { builtinFunctions, type FunctionBuilder } from "./builder/builtins";
export {
  intoPlainText,
  intoTemplate,
  propertyExpression,
  templateExpression,
  type BuildContext,
  type Expression,
  type KeywordResolver,
  type LabeledProperty,
} from "./builder/expression";
export { compileTemplate } from "./compile";

// Rendering
export {
  ConditionalTemplate,
  FormattablePropertyTemplate,
  LabelTemplate,
  ListTemplate,
  LiteralTemplate,
  SeparateTemplate,
  renderLabeled,
  renderToString,
  type Template,
} from "./render/template";
export {
  FormatRecorder,
  LabeledTextFormatter,
  PlainTextFormatter,
  type Formatter,
  type LabeledSegment,
} from "./render/formatter";

// Commit binding
export { buildCommitKeyword, commitKeywordResolver, parseCommitTemplate } from "./commit/keywords";
export {
  EMPTY_TREE_ID,
  MemoryRepo,
  RepoFormatError,
  readRepoDocument,
  type BranchTarget,
  type CommitRecord,
  type RepoDocument,
  type RepoView,
} from "./commit/repo";
