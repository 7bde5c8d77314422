#!/usr/bin/env -S npx tsx
/**
 * Render the commits of a repository snapshot through a commit template.
 *
 * Usage:
 *   templater [-T <template>] <repo.json> [options]
 *   templater --help
 *
 * Options:
 *   -T, --template <text>    Template to render each commit with
 *   --workspace <id>         Workspace whose working copy is current (default: "default")
 *   --labels                 Show the labels each piece of text was written under
 *   -h, --help               Show help
 */

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import { parseCommitTemplate } from "./commit/keywords";
import { MemoryRepo, readRepoDocument, RepoFormatError } from "./commit/repo";
import { formatDiagnostic } from "./diagnostics";
import { TemplateParseError } from "./errors";
import type { LabeledSegment } from "./render/formatter";
import { renderLabeled, renderToString } from "./render/template";

export const DEFAULT_TEMPLATE =
  'commit_id.short() " " change_id.short() " " ' +
  'if(description, description.first_line(), "(no description set)")';

export interface CliOptions {
  template: string;
  repoFile: string;
  workspace: string;
  labels: boolean;
}

export type ParsedArgs =
  | { kind: "run"; options: CliOptions }
  | { kind: "help" }
  | { kind: "error"; message: string };

/** Where the CLI reads and writes; swapped out by tests. */
export interface CliIO {
  readFile(filePath: string): string;
  stdout(text: string): void;
  stderr(text: string): void;
}

export const HELP = `
commit-templater

Usage:
  templater [-T <template>] <repo.json> [options]

Options:
  -T, --template <text>    Template to render each commit with
  --workspace <id>         Workspace whose working copy is current (default: "default")
  --labels                 Show the labels each piece of text was written under
  -h, --help               Show this help

Examples:
  templater repo.json
  templater -T 'commit_id.shortest(8) " " author.email()' repo.json
  templater -T 'label("header", description.first_line())' repo.json --labels
`;

export function parseArgs(args: readonly string[]): ParsedArgs {
  const options: CliOptions = {
    template: DEFAULT_TEMPLATE,
    repoFile: "",
    workspace: "default",
    labels: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      return { kind: "help" };
    } else if (arg === "-T" || arg === "--template") {
      i++;
      if (i >= args.length) {
        return { kind: "error", message: `${arg} requires a template` };
      }
      options.template = args[i];
    } else if (arg === "--workspace") {
      i++;
      if (i >= args.length) {
        return { kind: "error", message: "--workspace requires a workspace id" };
      }
      options.workspace = args[i];
    } else if (arg === "--labels") {
      options.labels = true;
    } else if (arg.startsWith("-")) {
      return { kind: "error", message: `Unknown option: ${arg}` };
    } else {
      if (options.repoFile) {
        return { kind: "error", message: "Multiple repository files not supported" };
      }
      options.repoFile = arg;
    }
    i++;
  }

  if (!options.repoFile) {
    return { kind: "error", message: "No repository file specified" };
  }

  return { kind: "run", options };
}

/**
 * `[label ...]text` per segment; unlabelled text is written bare.
 */
export function formatSegments(segments: readonly LabeledSegment[]): string {
  return segments
    .map((segment) => (segment.labels.length > 0 ? `[${segment.labels.join(" ")}]${segment.text}` : segment.text))
    .join("");
}

function formatError(error: unknown, options: CliOptions): string {
  if (error instanceof TemplateParseError) {
    return `Failed to parse template: ${formatDiagnostic(error, options.template)}`;
  }

  if (error instanceof RepoFormatError) {
    return `${options.repoFile}: Invalid repository: ${error.message}`;
  }

  if (error instanceof SyntaxError) {
    return `${options.repoFile}: Invalid JSON: ${error.message}`;
  }

  if (error instanceof Error) {
    return `${options.repoFile}: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

/**
 * Run the CLI and return its exit code.
 */
export function run(args: readonly string[], io: CliIO): number {
  const parsed = parseArgs(args);
  if (parsed.kind === "help") {
    io.stdout(HELP);
    return 0;
  }
  if (parsed.kind === "error") {
    io.stderr(`Error: ${parsed.message}`);
    io.stderr(HELP);
    return 1;
  }
  const { options } = parsed;

  let source: string;
  try {
    source = io.readFile(options.repoFile);
  } catch (err) {
    io.stderr(`Error reading file: ${options.repoFile}`);
    if (err instanceof Error) {
      io.stderr(err.message);
    }
    return 1;
  }

  try {
    const repo = new MemoryRepo(readRepoDocument(JSON.parse(source)));
    const template = parseCommitTemplate(repo, options.workspace, options.template);
    for (const commit of repo.commits) {
      const output = options.labels
        ? formatSegments(renderLabeled(template, commit))
        : renderToString(template, commit);
      io.stdout(output.endsWith("\n") ? output : `${output}\n`);
    }
  } catch (err) {
    io.stderr(formatError(err, options));
    return 1;
  }

  return 0;
}

const nodeIO: CliIO = {
  readFile: (filePath) => fs.readFileSync(path.resolve(filePath), "utf-8"),
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => console.error(text),
};

function isEntryModule(): boolean {
  const entry = process.argv[1];
  if (!entry || !fs.existsSync(entry)) return false;
  return fs.realpathSync(path.resolve(entry)) === fs.realpathSync(fileURLToPath(import.meta.url));
}

if (isEntryModule()) {
  process.exitCode = run(process.argv.slice(2), nodeIO);
}
