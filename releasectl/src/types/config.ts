/** Shape of the merged, validated configuration. */
export type ValidationMode = "fail-fast" | "aggregate";

export type ArtifactRule = "image-line" | "versioned-reference";

export type ArtifactFile = {
  path: string;
  rule: ArtifactRule;
};

export type ImageConfig = {
  repository: string;
  platforms: string[];
  builder: string;
  driver: string;
  context: string;
  dockerfile?: string;
  floating_tag: string;
};

export type ReleaseConfig = {
  schema_version: string;
  release_branch: string;
  remote: string;
  tag_pattern: string;
  baseline_version: string;
  validation: { mode: ValidationMode };
  image: ImageConfig;
  build?: { version_base?: string };
  artifacts: ArtifactFile[];
  changelog: { max_commits: number };
};
