/**
 * Owner-path normalization
 *
 * Front ends render scopes that must never reach a schema namespace as
 * marker segments. A normalizer removes them before the owner path is used
 * as the default namespace.
 */

export type OwnerPathNormalizer = (ownerPath: string) => string;

/**
 * `.<local NAME>` segments, emitted for declarations inside function
 * bodies and blocks.
 */
export const LOCAL_SCOPE_PATTERN = /\.<local .*?>/g;

export const PACKAGE_SUFFIX = ".package";

export type OwnerPathNormalizerOptions = {
  readonly localScopePattern?: RegExp;
  /** Only the first matching suffix is stripped, once */
  readonly strippedSuffixes?: readonly string[];
};

const toGlobalPattern = (pattern: RegExp): RegExp =>
  pattern.global ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);

export const createOwnerPathNormalizer = (
  options: OwnerPathNormalizerOptions
): OwnerPathNormalizer => {
  const localScopePattern =
    options.localScopePattern !== undefined
      ? toGlobalPattern(options.localScopePattern)
      : undefined;
  const strippedSuffixes = options.strippedSuffixes ?? [];

  // Matched against `.` + path: the pattern alone needs a leading dot and
  // would keep a marker in the first segment, which is stripped here too
  const stripLocals = (ownerPath: string): string => {
    if (localScopePattern === undefined) {
      return ownerPath;
    }
    const stripped = `.${ownerPath}`.replace(localScopePattern, "");
    return stripped.startsWith(".") ? stripped.slice(1) : stripped;
  };

  return (ownerPath) => {
    const withoutLocals = stripLocals(ownerPath);

    const suffix = strippedSuffixes.find((s) => withoutLocals.endsWith(s));
    return suffix !== undefined
      ? withoutLocals.slice(0, withoutLocals.length - suffix.length)
      : withoutLocals;
  };
};

export const defaultOwnerPathNormalizer: OwnerPathNormalizer =
  createOwnerPathNormalizer({
    localScopePattern: LOCAL_SCOPE_PATTERN,
    strippedSuffixes: [PACKAGE_SUFFIX],
  });

export const identityOwnerPathNormalizer: OwnerPathNormalizer = (ownerPath) =>
  ownerPath;

/**
 * Render the marker segment for a local scope, e.g. `<local build>`.
 */
export const localScopeSegment = (scopeName: string): string =>
  `<local ${scopeName}>`;
