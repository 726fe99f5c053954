/** Image build request. `tags` are registry tags, not repository-qualified references. */
export type BuildTarget = {
  repository: string;
  platforms: ReadonlySet<string>;
  tags: ReadonlySet<string>;
};

/** One platform observed in a pushed multi-architecture manifest. */
export type ManifestEntry = {
  platform: string;
  digest: string;
};
