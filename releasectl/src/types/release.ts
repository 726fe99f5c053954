import type { Version } from "./version.js";

/** Created once the release commit exists; handed to the tag publisher. */
export type ReleaseRecord = {
  version: Version;
  previousVersion: Version;
  changelog: string;
  commitSha: string;
};
