/**
 * TypeScript declarations and types → type descriptors
 */

import * as ts from "typescript";
import {
  Diagnostic,
  Result,
  SourceLocation,
  TypeDescriptor,
  createDiagnostic,
  createTypeDescriptor,
  error,
  flatMap,
  ok,
  sequence,
  validateTypeDescriptor,
} from "@recname/core";
import type { RecnameProgram } from "../program/types.js";
import { getNodeLocation } from "../program/diagnostics.js";
import { getOwnerPath } from "./owner-path.js";

/**
 * Declarations that can be turned into a record
 */
export type RecordDeclaration =
  | ts.ClassDeclaration
  | ts.InterfaceDeclaration
  | ts.TypeAliasDeclaration
  | ts.EnumDeclaration;

export const isRecordDeclaration = (node: ts.Node): node is RecordDeclaration =>
  ts.isClassDeclaration(node) ||
  ts.isInterfaceDeclaration(node) ||
  ts.isTypeAliasDeclaration(node) ||
  ts.isEnumDeclaration(node);

const withLocation = (
  result: Result<TypeDescriptor, Diagnostic>,
  location: SourceLocation | undefined
): Result<TypeDescriptor, Diagnostic> =>
  result.ok || location === undefined || result.error.location !== undefined
    ? result
    : error({ ...result.error, location });

/**
 * Describe a declaration with its own type parameters as type arguments.
 */
export const describeDeclaration = (
  declaration: RecordDeclaration,
  program: RecnameProgram
): Result<TypeDescriptor, Diagnostic> => {
  const typeParameters = ts.isEnumDeclaration(declaration)
    ? []
    : (declaration.typeParameters ?? []);

  const descriptor = createTypeDescriptor(
    declaration.name?.text ?? "",
    getOwnerPath(declaration, program),
    typeParameters.map((tp) => createTypeDescriptor(tp.name.text))
  );

  return withLocation(
    validateTypeDescriptor(descriptor),
    getNodeLocation(declaration)
  );
};

const PRIMITIVE_FLAGS =
  ts.TypeFlags.String |
  ts.TypeFlags.Number |
  ts.TypeFlags.BigInt |
  ts.TypeFlags.ESSymbol |
  ts.TypeFlags.Void |
  ts.TypeFlags.Undefined |
  ts.TypeFlags.Null |
  ts.TypeFlags.Any |
  ts.TypeFlags.Unknown |
  ts.TypeFlags.Never |
  ts.TypeFlags.NonPrimitive;

const NAMELESS_FLAGS =
  ts.TypeFlags.Union |
  ts.TypeFlags.Intersection |
  ts.TypeFlags.Literal |
  ts.TypeFlags.TemplateLiteral |
  ts.TypeFlags.UniqueESSymbol;

// Symbol names the checker gives to anonymous types
const INTERNAL_SYMBOL_NAMES: ReadonlySet<ts.__String> = new Set<ts.__String>([
  ts.InternalSymbolName.Type,
  ts.InternalSymbolName.Object,
  ts.InternalSymbolName.Function,
  ts.InternalSymbolName.Class,
  ts.InternalSymbolName.Missing,
]);

const isTypeReference = (type: ts.Type): type is ts.TypeReference =>
  (ts.getObjectFlags(type) & ts.ObjectFlags.Reference) !== 0;

/**
 * Type arguments of a reference, without the outer type parameters and
 * the trailing `this` argument the checker adds for classes.
 */
const referenceTypeArguments = (
  type: ts.Type,
  checker: ts.TypeChecker
): readonly ts.Type[] => {
  if (!isTypeReference(type)) {
    return [];
  }

  const all = checker.getTypeArguments(type);
  const outer = type.target.outerTypeParameters?.length ?? 0;
  const local = type.target.localTypeParameters?.length ?? all.length - outer;
  return all.slice(outer, outer + local);
};

const declaredName = (symbol: ts.Symbol): string => {
  // `export default class Foo` is bound as "default"
  const declaration = symbol.declarations?.[0];
  const name =
    declaration !== undefined ? ts.getNameOfDeclaration(declaration) : undefined;
  return name !== undefined && ts.isIdentifier(name) ? name.text : symbol.name;
};

const unsupportedType = (
  type: ts.Type,
  checker: ts.TypeChecker,
  location: SourceLocation | undefined
): Result<TypeDescriptor, Diagnostic> =>
  error(
    createDiagnostic(
      "RN1002",
      "error",
      `Type '${checker.typeToString(type)}' has no short name`,
      location,
      "Use a named class, interface, type alias, enum or primitive"
    )
  );

const describeNamed = (
  symbol: ts.Symbol,
  typeArguments: readonly ts.Type[],
  program: RecnameProgram,
  location: SourceLocation | undefined
): Result<TypeDescriptor, Diagnostic> => {
  const declaration = symbol.declarations?.[0];
  const ownerPath =
    declaration !== undefined ? getOwnerPath(declaration, program) : "";

  return flatMap(
    sequence(
      typeArguments.map((arg) => describeType(arg, program, location))
    ),
    (args) =>
      validateTypeDescriptor(
        createTypeDescriptor(declaredName(symbol), ownerPath, args)
      )
  );
};

/**
 * Describe a type as the checker sees it, e.g. an instantiation such as
 * `Pair<number, string>`.
 *
 * Unions, intersections, literals, tuples and anonymous object types have
 * no name to give a record and are rejected.
 */
export const describeType = (
  type: ts.Type,
  program: RecnameProgram,
  location?: SourceLocation
): Result<TypeDescriptor, Diagnostic> => {
  const { checker } = program;

  if (type.aliasSymbol !== undefined) {
    return describeNamed(
      type.aliasSymbol,
      type.aliasTypeArguments ?? [],
      program,
      location
    );
  }

  // boolean is the union true | false
  if (type.flags & ts.TypeFlags.Boolean) {
    return ok(createTypeDescriptor("boolean"));
  }

  const symbol = type.getSymbol();

  if (symbol !== undefined && symbol.flags & ts.SymbolFlags.Enum) {
    return describeNamed(symbol, [], program, location);
  }

  if (type.flags & NAMELESS_FLAGS) {
    return unsupportedType(type, checker, location);
  }

  if (type.flags & ts.TypeFlags.TypeParameter) {
    return ok(
      createTypeDescriptor(symbol?.name ?? checker.typeToString(type))
    );
  }

  if (type.flags & PRIMITIVE_FLAGS) {
    return ok(createTypeDescriptor(checker.typeToString(type)));
  }

  if (
    type.flags & ts.TypeFlags.Object &&
    symbol !== undefined &&
    !INTERNAL_SYMBOL_NAMES.has(symbol.escapedName)
  ) {
    return describeNamed(
      symbol,
      referenceTypeArguments(type, checker),
      program,
      location
    );
  }

  return unsupportedType(type, checker, location);
};

/**
 * Describe the type written at a type node, e.g. a property annotation.
 */
export const describeTypeNode = (
  node: ts.TypeNode,
  program: RecnameProgram
): Result<TypeDescriptor, Diagnostic> =>
  describeType(
    program.checker.getTypeFromTypeNode(node),
    program,
    getNodeLocation(node)
  );
