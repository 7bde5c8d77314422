/**
 * Repository view consulted by the commit keywords, plus an in-memory
 * implementation loaded from a JSON document.
 */

import { HexIdIndex, type IdIndex } from "../values/ids";
import type { Signature, Timestamp } from "../values/time";

/** Git's id for the tree with no entries; root commits are compared with it. */
export const EMPTY_TREE_ID = "4b825dc642cb6eb9a060e54bf8d69288fbee4904";

export type CommitRecord = {
  commitId: string;
  changeId: string;
  description: string;
  author: Signature;
  committer: Signature;
  parentIds: readonly string[];
  treeId: string;
  hasConflict: boolean;
};

export type BranchTarget = {
  /** Local target, absent when the branch was deleted locally */
  local: string | undefined;
  /** Commit id per remote name */
  remotes: ReadonlyMap<string, string>;
};

export interface RepoView {
  readonly commitIdIndex: IdIndex;
  readonly changeIdIndex: IdIndex;
  /** Number of visible commits carrying the change id */
  changeCommitCount(changeId: string): number;
  /** Working-copy commit id per workspace id */
  workingCopies(): ReadonlyMap<string, string>;
  branches(): ReadonlyMap<string, BranchTarget>;
  tags(): ReadonlyMap<string, string>;
  gitRefs(): ReadonlyMap<string, string>;
  gitHead(): string | undefined;
  /** Tree id of the commit's parents merged together, if known */
  mergedParentTreeId(commit: CommitRecord): string | undefined;
}

// ============================================================================
// JSON document
// ============================================================================

export type RepoDocument = {
  commits: CommitRecord[];
  branches: Map<string, BranchTarget>;
  tags: Map<string, string>;
  gitRefs: Map<string, string>;
  gitHead: string | undefined;
  workingCopies: Map<string, string>;
};

export class RepoFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RepoFormatError";
  }
}

type JsonObject = { [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, path: string): JsonObject {
  if (!isObject(value)) throw new RepoFormatError(`${path}: expected an object`);
  return value;
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== "string") throw new RepoFormatError(`${path}: expected a string`);
  return value;
}

function expectNumber(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new RepoFormatError(`${path}: expected a number`);
  }
  return value;
}

function expectBoolean(value: unknown, path: string): boolean {
  if (typeof value !== "boolean") throw new RepoFormatError(`${path}: expected a boolean`);
  return value;
}

function expectArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) throw new RepoFormatError(`${path}: expected an array`);
  return value;
}

function optionalStringMap(value: unknown, path: string): Map<string, string> {
  if (value === undefined) return new Map();
  const object = expectObject(value, path);
  return new Map(Object.entries(object).map(([key, entry]): [string, string] => [key, expectString(entry, `${path}.${key}`)]));
}

function readTimestamp(value: unknown, path: string): Timestamp {
  const object = expectObject(value, path);
  return {
    timestamp: expectNumber(object.timestamp, `${path}.timestamp`),
    tzOffset: object.tzOffset === undefined ? 0 : expectNumber(object.tzOffset, `${path}.tzOffset`),
  };
}

function readSignature(value: unknown, path: string): Signature {
  const object = expectObject(value, path);
  return {
    name: expectString(object.name, `${path}.name`),
    email: expectString(object.email, `${path}.email`),
    timestamp: readTimestamp(object.timestamp, `${path}.timestamp`),
  };
}

function readCommit(value: unknown, path: string): CommitRecord {
  const object = expectObject(value, path);
  const parentIds = object.parentIds === undefined ? [] : expectArray(object.parentIds, `${path}.parentIds`);
  return {
    commitId: expectString(object.commitId, `${path}.commitId`),
    changeId: expectString(object.changeId, `${path}.changeId`),
    description: object.description === undefined ? "" : expectString(object.description, `${path}.description`),
    author: readSignature(object.author, `${path}.author`),
    committer: readSignature(object.committer, `${path}.committer`),
    parentIds: parentIds.map((id, i) => expectString(id, `${path}.parentIds[${i}]`)),
    treeId: expectString(object.treeId, `${path}.treeId`),
    hasConflict: object.hasConflict === undefined ? false : expectBoolean(object.hasConflict, `${path}.hasConflict`),
  };
}

function readBranches(value: unknown, path: string): Map<string, BranchTarget> {
  if (value === undefined) return new Map();
  const object = expectObject(value, path);
  return new Map(
    Object.entries(object).map(([name, entry]): [string, BranchTarget] => {
      const target = expectObject(entry, `${path}.${name}`);
      return [
        name,
        {
          local: target.local === undefined ? undefined : expectString(target.local, `${path}.${name}.local`),
          remotes: optionalStringMap(target.remotes, `${path}.${name}.remotes`),
        },
      ];
    })
  );
}

/**
 * Validate a parsed JSON value as a repository document.
 */
export function readRepoDocument(value: unknown): RepoDocument {
  const object = expectObject(value, "repo");
  return {
    commits: expectArray(object.commits, "repo.commits").map((commit, i) => readCommit(commit, `repo.commits[${i}]`)),
    branches: readBranches(object.branches, "repo.branches"),
    tags: optionalStringMap(object.tags, "repo.tags"),
    gitRefs: optionalStringMap(object.gitRefs, "repo.gitRefs"),
    gitHead: object.gitHead === undefined ? undefined : expectString(object.gitHead, "repo.gitHead"),
    workingCopies: optionalStringMap(object.workingCopies, "repo.workingCopies"),
  };
}

// ============================================================================
// In-memory repository
// ============================================================================

export class MemoryRepo implements RepoView {
  readonly commitIdIndex: IdIndex;
  readonly changeIdIndex: IdIndex;
  private readonly document: RepoDocument;
  private readonly commitsById: ReadonlyMap<string, CommitRecord>;

  constructor(document: RepoDocument) {
    this.document = document;
    this.commitsById = new Map(document.commits.map((commit): [string, CommitRecord] => [commit.commitId, commit]));
    this.commitIdIndex = new HexIdIndex(document.commits.map((commit) => commit.commitId));
    this.changeIdIndex = new HexIdIndex(document.commits.map((commit) => commit.changeId));
  }

  get commits(): readonly CommitRecord[] {
    return this.document.commits;
  }

  changeCommitCount(changeId: string): number {
    return this.document.commits.filter((commit) => commit.changeId === changeId).length;
  }

  workingCopies(): ReadonlyMap<string, string> {
    return this.document.workingCopies;
  }

  branches(): ReadonlyMap<string, BranchTarget> {
    return this.document.branches;
  }

  tags(): ReadonlyMap<string, string> {
    return this.document.tags;
  }

  gitRefs(): ReadonlyMap<string, string> {
    return this.document.gitRefs;
  }

  gitHead(): string | undefined {
    return this.document.gitHead;
  }

  // Merges are only resolved when every parent has the same tree.
  mergedParentTreeId(commit: CommitRecord): string | undefined {
    if (commit.parentIds.length === 0) return EMPTY_TREE_ID;
    const treeIds = new Set(commit.parentIds.map((id) => this.commitsById.get(id)?.treeId));
    if (treeIds.size !== 1) return undefined;
    const [treeId] = treeIds;
    return treeId;
  }
}
