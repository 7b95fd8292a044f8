/**
 * recname name command
 *
 * Resolves a type described on the command line, without any source.
 */

import {
  ResolvedName,
  Result,
  TypeDescriptor,
  createOverrideSet,
  createTypeDescriptor,
  error,
  formatDiagnostic,
  ok,
  resolveName,
  splitFullName,
  validateTypeDescriptor,
} from "@recname/core";
import type { CliOptions } from "../types.js";

/**
 * `com.acme.Pair` → short name `Pair` owned by `com.acme`
 */
const parseQualifiedName = (qualified: string): TypeDescriptor => {
  const { namespace, name } = splitFullName(qualified);
  return createTypeDescriptor(name, namespace);
};

export const nameRecord = (
  typeName: string | undefined,
  options: CliOptions
): Result<ResolvedName, string> => {
  if (!typeName) {
    return error("Type name required");
  }

  const base =
    options.owner !== undefined
      ? createTypeDescriptor(typeName, options.owner)
      : parseQualifiedName(typeName);

  const descriptor = createTypeDescriptor(
    base.shortName,
    base.ownerPath,
    (options.typeArguments ?? []).map(parseQualifiedName)
  );

  const validated = validateTypeDescriptor(descriptor);
  if (!validated.ok) {
    return error(formatDiagnostic(validated.error));
  }

  const overrides = createOverrideSet({
    name: options.recordName,
    namespace: options.recordNamespace,
    erased: options.erased,
  });

  return ok(resolveName(validated.value, overrides));
};

export const nameCommand = (
  typeName: string | undefined,
  options: CliOptions
): Result<void, string> => {
  const result = nameRecord(typeName, options);
  if (!result.ok) {
    return result;
  }

  console.log(
    options.json ? JSON.stringify(result.value, null, 2) : result.value.fullName
  );
  return ok(undefined);
};
