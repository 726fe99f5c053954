import fs from "node:fs";
import path from "node:path";
import { ArtifactUpdateError, errorMessage } from "../errors.js";
import type { ArtifactFile, ArtifactRule } from "../types/config.js";
import type { RepositoryContext } from "../types/repository.js";
import type { Version } from "../types/version.js";
import type { Logger } from "../logging/logger.js";

export type ArtifactUpdateResult = {
  updated: string[];
  unchanged: string[];
  skipped: string[];
};

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Build the find pattern for a rule, scoped to one image repository. */
export function rulePattern(rule: ArtifactRule, repository: string): RegExp {
  const repo = escapeRegExp(repository);
  switch (rule) {
    case "image-line":
      return new RegExp(`image: ${repo}:.*`, "g");
    case "versioned-reference":
      return new RegExp(`${repo}:v\\d*\\.\\d*\\.\\d*(?:-[0-9A-Za-z.-]+)?`, "g");
  }
}

/** Apply a rule to file content. Pure; used by the updater and its tests. */
export function rewriteContent(content: string, rule: ArtifactRule, repository: string, version: Version): string {
  const replacement = rule === "image-line" ? `image: ${repository}:${version.raw}` : `${repository}:${version.raw}`;
  return content.replace(rulePattern(rule, repository), () => replacement);
}

/**
 * Rewrites image references in tracked files.
 * Each file is written to a temporary sibling and renamed over the original,
 * so a failed write leaves the original untouched. Missing files are skipped.
 */
export class ReleaseArtifactUpdater {
  constructor(
    private readonly context: RepositoryContext,
    private readonly repository: string,
    private readonly logger: Logger,
  ) {}

  apply(version: Version, files: readonly ArtifactFile[]): ArtifactUpdateResult {
    const result: ArtifactUpdateResult = { updated: [], unchanged: [], skipped: [] };

    this.logger.info("Updating version in project files...");

    for (const file of files) {
      const fullPath = path.resolve(this.context.root, file.path);
      if (!fs.existsSync(fullPath)) {
        result.skipped.push(file.path);
        continue;
      }

      const original = this.read(fullPath, file.path);
      const next = rewriteContent(original, file.rule, this.repository, version);
      if (next === original) {
        result.unchanged.push(file.path);
        continue;
      }

      this.replaceAtomically(fullPath, next, file.path);
      result.updated.push(file.path);
      this.logger.info(`Updated ${file.path}`);
    }

    this.logger.info("Version files updated");
    return result;
  }

  private read(fullPath: string, displayPath: string): string {
    try {
      return fs.readFileSync(fullPath, "utf8");
    } catch (e) {
      throw new ArtifactUpdateError("READ_FAILED", `Failed to read ${displayPath}: ${errorMessage(e)}`, {
        path: displayPath,
      });
    }
  }

  private replaceAtomically(fullPath: string, content: string, displayPath: string): void {
    const tmpPath = path.join(path.dirname(fullPath), `.${path.basename(fullPath)}.${process.pid}.tmp`);
    const occupied = fs.existsSync(tmpPath);
    try {
      const mode = fs.statSync(fullPath).mode;
      fs.writeFileSync(tmpPath, content, { encoding: "utf8", mode });
      fs.renameSync(tmpPath, fullPath);
    } catch (e) {
      // Whatever was at tmpPath before this call is left alone.
      if (!occupied) this.removeTemp(tmpPath);
      throw new ArtifactUpdateError("WRITE_FAILED", `Failed to update ${displayPath}: ${errorMessage(e)}`, {
        path: displayPath,
      });
    }
  }

  private removeTemp(tmpPath: string): void {
    try {
      fs.rmSync(tmpPath, { force: true });
    } catch (e) {
      this.logger.warn(`Could not remove ${tmpPath}: ${errorMessage(e)}`);
    }
  }
}
