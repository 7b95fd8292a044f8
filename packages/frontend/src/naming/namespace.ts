import { dirname, isAbsolute, relative } from "node:path";

const normalizePathFragment = (fragment: string): string =>
  fragment.replace(/-/g, "");

/**
 * Compute the namespace of a file from its path relative to the source root.
 *
 * Rules:
 * - Namespace = rootNamespace + directory components (excluding "src")
 * - Path normalized with "/" separators after the relative() call
 * - Dashes are dropped from directory names
 * - An empty root namespace contributes nothing
 * - A file outside the source root gets the root namespace alone
 *
 * Examples:
 * - /project/src/models/user.ts → com.acme.models
 * - /project/src/index.ts → com.acme
 * - /project/src/user-events/click.ts → com.acme.userevents
 * - /project/lib/a.ts → com.acme
 */
export const getNamespaceFromPath = (
  filePath: string,
  sourceRoot: string,
  rootNamespace: string
): string => {
  const fileDir = dirname(filePath);

  // IMPORTANT: Normalize AFTER relative() call, not before (cross-platform)
  const relativePath = relative(sourceRoot, fileDir).replace(/\\/g, "/");

  if (
    relativePath === ".." ||
    relativePath.startsWith("../") ||
    isAbsolute(relativePath)
  ) {
    return rootNamespace;
  }

  const parts = relativePath
    .split("/")
    .filter((p) => p !== "" && p !== "." && p !== "src")
    .map(normalizePathFragment)
    .filter((p) => p !== "");

  return [rootNamespace, ...parts].filter((p) => p !== "").join(".");
};
