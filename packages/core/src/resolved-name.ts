/**
 * Resolved record names
 */

export type ResolvedName = {
  readonly namespace: string;
  readonly name: string;
  readonly fullName: string;
};

/**
 * Join a namespace and a name. A namespace that is empty after trimming
 * counts as absent and the name is returned alone.
 */
export const formatFullName = (namespace: string, name: string): string =>
  namespace.trim() === "" ? name : `${namespace}.${name}`;

/**
 * Split a full name on its last dot.
 */
export const splitFullName = (
  fullName: string
): { readonly namespace: string; readonly name: string } => {
  const index = fullName.lastIndexOf(".");
  return index < 0
    ? { namespace: "", name: fullName }
    : { namespace: fullName.slice(0, index), name: fullName.slice(index + 1) };
};

export const resolvedNamesEqual = (a: ResolvedName, b: ResolvedName): boolean =>
  a.namespace === b.namespace && a.name === b.name && a.fullName === b.fullName;
