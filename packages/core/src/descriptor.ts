/**
 * Type descriptors
 *
 * A descriptor is the shape every front end reduces a type to before its
 * record name is resolved: a short name, the dotted path of the scope that
 * owns it, and the type arguments it was declared or instantiated with.
 */

import { Diagnostic, createDiagnostic } from "./types/diagnostic.js";
import { Result, ok, error } from "./types/result.js";

export type TypeDescriptor = {
  /** Bare name, without owner or type arguments (`List` for `List<number>`) */
  readonly shortName: string;
  /** Dotted owner path, empty for a type with no enclosing scope */
  readonly ownerPath: string;
  /** In declaration order */
  readonly typeArguments: readonly TypeDescriptor[];
};

export const createTypeDescriptor = (
  shortName: string,
  ownerPath = "",
  typeArguments: readonly TypeDescriptor[] = []
): TypeDescriptor => ({
  shortName,
  ownerPath,
  typeArguments,
});

/**
 * Reject descriptors the resolver would turn into a malformed identifier.
 * Type arguments are checked too, their short names end up in the name.
 */
export const validateTypeDescriptor = (
  descriptor: TypeDescriptor
): Result<TypeDescriptor, Diagnostic> => {
  if (descriptor.shortName.trim() === "") {
    const owner =
      descriptor.ownerPath === "" ? "" : ` owned by '${descriptor.ownerPath}'`;
    return error(
      createDiagnostic(
        "RN1001",
        "error",
        `Type descriptor${owner} has an empty short name`,
        undefined,
        "Anonymous classes and unnamed types cannot carry a record name"
      )
    );
  }

  for (const argument of descriptor.typeArguments) {
    const result = validateTypeDescriptor(argument);
    if (!result.ok) {
      return result;
    }
  }

  return ok(descriptor);
};

/**
 * Render a descriptor the way it would be written in source,
 * e.g. `app.models.Pair<number, string>`.
 */
export const formatTypeDescriptor = (descriptor: TypeDescriptor): string => {
  const qualified =
    descriptor.ownerPath === ""
      ? descriptor.shortName
      : `${descriptor.ownerPath}.${descriptor.shortName}`;

  if (descriptor.typeArguments.length === 0) {
    return qualified;
  }

  const args = descriptor.typeArguments.map(formatTypeDescriptor).join(", ");
  return `${qualified}<${args}>`;
};
