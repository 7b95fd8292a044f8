/**
 * Runtime classes → type descriptors
 *
 * At runtime a generic class has lost its type arguments and its owning
 * module has no dotted name, so both are supplied by the caller.
 */

import {
  Diagnostic,
  OwnerPathNormalizer,
  ResolvedName,
  Result,
  TypeDescriptor,
  createTypeDescriptor,
  extractOverrides,
  flatMap,
  map,
  ok,
  resolveName,
  sequence,
  validateTypeDescriptor,
} from "@recname/core";
import { RecordClass, getAnnotations } from "./annotations.js";

export type PrimitiveTypeName =
  | "string"
  | "number"
  | "boolean"
  | "bigint"
  | "symbol"
  | "object"
  | "undefined"
  | "null"
  | "void"
  | "unknown"
  | "any"
  | "never";

/**
 * A class, an already built descriptor, or the name of a primitive
 */
export type RuntimeTypeArgument =
  | RecordClass
  | TypeDescriptor
  | PrimitiveTypeName;

export type DescribeClassOptions = {
  /** Dotted owner path, e.g. the namespace of the declaring module */
  readonly ownerPath?: string;
  readonly typeArguments?: readonly RuntimeTypeArgument[];
};

export type ResolveClassOptions = DescribeClassOptions & {
  readonly normalizeOwnerPath?: OwnerPathNormalizer;
};

const describeTypeArgument = (
  argument: RuntimeTypeArgument
): Result<TypeDescriptor, Diagnostic> => {
  if (typeof argument === "string") {
    return ok(createTypeDescriptor(argument));
  }
  if (typeof argument === "function") {
    return describeClass(argument);
  }
  return ok(argument);
};

/**
 * Describe a class. Anonymous classes are rejected.
 */
export const describeClass = (
  target: RecordClass,
  options: DescribeClassOptions = {}
): Result<TypeDescriptor, Diagnostic> =>
  flatMap(
    sequence((options.typeArguments ?? []).map(describeTypeArgument)),
    (typeArguments) =>
      validateTypeDescriptor(
        createTypeDescriptor(target.name, options.ownerPath ?? "", typeArguments)
      )
  );

/**
 * Resolve the record name of a class, taking its annotations into account.
 */
export const resolveClassName = (
  target: RecordClass,
  options: ResolveClassOptions = {}
): Result<ResolvedName, Diagnostic> =>
  map(describeClass(target, options), (descriptor) =>
    resolveName(descriptor, extractOverrides(getAnnotations(target)), {
      normalizeOwnerPath: options.normalizeOwnerPath,
    })
  );
