/** Version identifier. Numeric components are null when `raw` is not a semantic version. */
export type Version = {
  readonly raw: string;
  readonly major: number | null;
  readonly minor: number | null;
  readonly patch: number | null;
};

export const BUMP_KINDS = ["major", "minor", "patch"] as const;

export type BumpKind = (typeof BUMP_KINDS)[number];
