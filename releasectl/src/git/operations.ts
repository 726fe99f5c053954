import { simpleGit, type SimpleGit } from "simple-git";
import { VcsError, errorMessage, type VcsErrorCode } from "../errors.js";

/**
 * Version-control operations the pipelines consume. Implemented over git by
 * GitOperations; tests supply an in-memory repository.
 */
export interface VersionControl {
  getCurrentBranch(): Promise<string>;
  /** True when no tracked file has staged or unstaged modifications. Untracked files are ignored. */
  isClean(): Promise<boolean>;
  fetch(remote: string, branch: string): Promise<void>;
  revParse(ref: string): Promise<string>;
  getShortHead(): Promise<string>;
  listTags(pattern: string): Promise<string[]>;
  createAnnotatedTag(name: string, message: string): Promise<void>;
  push(remote: string, ref: string): Promise<void>;
  /** Stage `files` and commit them. Returns the full SHA of the new commit. */
  commit(message: string, files: string[], opts?: { allowEmpty?: boolean }): Promise<string>;
  /** Commit subjects in `from..to`, most recent first. */
  logSubjects(from: string, to: string, max: number): Promise<string[]>;
}

/**
 * simple-git backed VersionControl.
 */
export class GitOperations implements VersionControl {
  private git: SimpleGit;

  constructor(repoPath: string, git?: SimpleGit) {
    this.git = git ?? simpleGit(repoPath);
  }

  /** Get current branch name. */
  async getCurrentBranch(): Promise<string> {
    const result = await this.wrap("GIT_FAILED", "read current branch", () => this.git.revparse(["--abbrev-ref", "HEAD"]));
    return result.trim();
  }

  async isClean(): Promise<boolean> {
    const status = await this.wrap("GIT_FAILED", "read working tree status", () => this.git.status());
    return status.files.every((f) => f.index === "?" && f.working_dir === "?");
  }

  async fetch(remote: string, branch: string): Promise<void> {
    await this.wrap("FETCH_FAILED", `fetch ${remote}/${branch}`, () => this.git.fetch(remote, branch));
  }

  /** Resolve a ref to its full SHA. */
  async revParse(ref: string): Promise<string> {
    const result = await this.wrap("GIT_FAILED", `resolve ${ref}`, () => this.git.revparse([ref]));
    return result.trim();
  }

  async getShortHead(): Promise<string> {
    const result = await this.wrap("GIT_FAILED", "resolve HEAD", () => this.git.revparse(["--short", "HEAD"]));
    return result.trim();
  }

  async listTags(pattern: string): Promise<string[]> {
    const raw = await this.wrap("GIT_FAILED", "list tags", () => this.git.raw(["tag", "--list", pattern]));
    return splitLines(raw);
  }

  /** Create an annotated tag. */
  async createAnnotatedTag(name: string, message: string): Promise<void> {
    await this.wrap("GIT_FAILED", `create tag ${name}`, () => this.git.tag(["-a", name, "-m", message]));
  }

  async push(remote: string, ref: string): Promise<void> {
    await this.wrap("GIT_FAILED", `push ${ref} to ${remote}`, () => this.git.push(remote, ref));
  }

  async commit(message: string, files: string[], opts?: { allowEmpty?: boolean }): Promise<string> {
    if (files.length > 0) {
      await this.wrap("COMMIT_FAILED", "stage release files", () => this.git.add(files));
    }
    const options: Record<string, null> = opts?.allowEmpty ? { "--allow-empty": null } : {};
    await this.wrap("COMMIT_FAILED", "create release commit", () => this.git.commit(message, undefined, options));
    return this.revParse("HEAD");
  }

  async logSubjects(from: string, to: string, max: number): Promise<string[]> {
    const raw = await this.wrap("GIT_FAILED", `read log ${from}..${to}`, () =>
      this.git.raw(["log", "--pretty=format:%s", "-n", String(max), `${from}..${to}`]),
    );
    return splitLines(raw);
  }

  private async wrap<T>(code: VcsErrorCode, action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      throw new VcsError(code, `git: failed to ${action}: ${errorMessage(e)}`);
    }
  }
}

function splitLines(raw: string): string[] {
  return raw
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
