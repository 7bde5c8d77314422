/**
 * Commit keywords: the identifiers a commit template can use, each bound to
 * a property of the commit being rendered.
 */

import type { BuildOptions } from "../builder/build";
import type { KeywordResolver, LabeledProperty } from "../builder/expression";
import { compileTemplate } from "../compile";
import type { Template } from "../render/template";
import { CommitOrChangeId } from "../values/ids";
import { property, type Property } from "../values/property";
import type { CommitRecord, RepoView } from "./repo";

function completeNewline(text: string): string {
  return text !== "" && !text.endsWith("\n") ? `${text}\n` : text;
}

function workingCopies(repo: RepoView, commit: CommitRecord): string {
  const names: string[] = [];
  for (const [workspaceId, commitId] of repo.workingCopies()) {
    if (commitId === commit.commitId) names.push(`${workspaceId}@`);
  }
  return names.join(" ");
}

/**
 * Local branches pointing here, marked `*` when a remote disagrees, plus
 * `name@remote` for remote targets that differ from the local one.
 */
function branchNames(repo: RepoView, commit: CommitRecord): string {
  const names: string[] = [];
  for (const [name, target] of repo.branches()) {
    if (target.local === commit.commitId) {
      const diverged = [...target.remotes.values()].some((remote) => remote !== target.local);
      names.push(diverged ? `${name}*` : name);
    }
    for (const [remoteName, remote] of target.remotes) {
      if (remote !== target.local && remote === commit.commitId) {
        names.push(`${name}@${remoteName}`);
      }
    }
  }
  return names.join(" ");
}

function refNames(refs: ReadonlyMap<string, string>, commit: CommitRecord): string {
  const names: string[] = [];
  for (const [name, target] of refs) {
    if (target === commit.commitId) names.push(name);
  }
  return names.join(" ");
}

function commitProperty(
  repo: RepoView,
  workspaceId: string,
  name: string
): Property<CommitRecord> | undefined {
  switch (name) {
    case "description":
      return property("String", (commit: CommitRecord) => completeNewline(commit.description));
    case "change_id":
      return property(
        "CommitOrChangeId",
        (commit: CommitRecord) => new CommitOrChangeId(commit.changeId, repo.changeIdIndex)
      );
    case "commit_id":
      return property(
        "CommitOrChangeId",
        (commit: CommitRecord) => new CommitOrChangeId(commit.commitId, repo.commitIdIndex)
      );
    case "author":
      return property("Signature", (commit: CommitRecord) => commit.author);
    case "committer":
      return property("Signature", (commit: CommitRecord) => commit.committer);
    case "working_copies":
      return property("String", (commit: CommitRecord) => workingCopies(repo, commit));
    case "current_working_copy":
      return property(
        "Boolean",
        (commit: CommitRecord) => repo.workingCopies().get(workspaceId) === commit.commitId
      );
    case "branches":
      return property("String", (commit: CommitRecord) => branchNames(repo, commit));
    case "tags":
      return property("String", (commit: CommitRecord) => refNames(repo.tags(), commit));
    case "git_refs":
      return property("String", (commit: CommitRecord) => refNames(repo.gitRefs(), commit));
    case "git_head":
      return property("String", (commit: CommitRecord) =>
        repo.gitHead() === commit.commitId ? "HEAD@git" : ""
      );
    case "divergent":
      return property("Boolean", (commit: CommitRecord) => repo.changeCommitCount(commit.changeId) > 1);
    case "conflict":
      return property("Boolean", (commit: CommitRecord) => commit.hasConflict);
    case "empty":
      return property("Boolean", (commit: CommitRecord) => commit.treeId === repo.mergedParentTreeId(commit));
    default:
      return undefined;
  }
}

/**
 * Resolve a commit keyword. The property is labelled with the keyword's name.
 */
export function buildCommitKeyword(
  repo: RepoView,
  workspaceId: string,
  name: string
): LabeledProperty<CommitRecord> | undefined {
  const resolved = commitProperty(repo, workspaceId, name);
  return resolved ? { property: resolved, labels: [name] } : undefined;
}

export function commitKeywordResolver(repo: RepoView, workspaceId: string): KeywordResolver<CommitRecord> {
  return (name) => buildCommitKeyword(repo, workspaceId, name);
}

/**
 * Compile a template rendering commits of `repo`, as seen from `workspaceId`.
 */
export function parseCommitTemplate(
  repo: RepoView,
  workspaceId: string,
  source: string,
  options?: BuildOptions
): Template<CommitRecord> {
  return compileTemplate(source, commitKeywordResolver(repo, workspaceId), options);
}
