/**
 * Record name resolution
 *
 * Turns a type descriptor and the user's overrides into the namespace,
 * name and full name embedded in a generated schema. Both front ends call
 * into this one implementation so their names cannot drift apart.
 */

import type { TypeDescriptor } from "./descriptor.js";
import type { OverrideSet } from "./overrides.js";
import { ResolvedName, formatFullName } from "./resolved-name.js";
import {
  OwnerPathNormalizer,
  defaultOwnerPathNormalizer,
} from "./owner-path.js";

export type ResolveOptions = {
  /** Applied to the owner path before it becomes the default namespace */
  readonly normalizeOwnerPath?: OwnerPathNormalizer;
};

/**
 * Separates the base name from the encoded type arguments.
 */
export const TYPE_ARGUMENTS_SEPARATOR = "__";

/**
 * Separates one encoded type argument from the next.
 */
export const TYPE_ARGUMENT_DELIMITER = "_";

export const deriveDefaultNamespace = (
  descriptor: TypeDescriptor,
  normalizeOwnerPath: OwnerPathNormalizer = defaultOwnerPathNormalizer
): string => normalizeOwnerPath(descriptor.ownerPath);

/**
 * Encode the type arguments into the name.
 *
 * `List<number>` becomes `List__number`, `Pair<A, B>` becomes `Pair__A_B`.
 * Only the arguments' short names are used: `Box<List<number>>` is
 * `Box__List`.
 */
export const encodeGenericName = (descriptor: TypeDescriptor): string => {
  if (descriptor.typeArguments.length === 0) {
    return descriptor.shortName;
  }

  const args = descriptor.typeArguments
    .map((arg) => arg.shortName)
    .join(TYPE_ARGUMENT_DELIMITER);
  return `${descriptor.shortName}${TYPE_ARGUMENTS_SEPARATOR}${args}`;
};

/**
 * Resolve the record name for a type.
 *
 * - An explicit name wins; otherwise the erased flag picks the bare short
 *   name over the generic encoding.
 * - An explicit namespace is used verbatim; otherwise the normalized owner
 *   path is.
 */
export const resolveName = (
  descriptor: TypeDescriptor,
  overrides: OverrideSet,
  options: ResolveOptions = {}
): ResolvedName => {
  const defaultNamespace = deriveDefaultNamespace(
    descriptor,
    options.normalizeOwnerPath
  );

  const erasedName = descriptor.shortName;
  const name =
    overrides.name ??
    (overrides.erased ? erasedName : encodeGenericName(descriptor));

  const namespace = overrides.namespace ?? defaultNamespace;

  return {
    namespace,
    name,
    fullName: formatFullName(namespace, name),
  };
};
