/**
 * Owner paths of TypeScript declarations
 *
 * The owner path of a declaration is the namespace of its file followed by
 * the scopes enclosing it. Function bodies and blocks are rendered as
 * `<local NAME>` segments; they are removed again by the normalizer
 * before the path is used as a namespace.
 */

import * as ts from "typescript";
import {
  LOCAL_SCOPE_PATTERN,
  OwnerPathNormalizer,
  createOwnerPathNormalizer,
  localScopeSegment,
} from "@recname/core";
import type { RecnameProgram } from "../program/types.js";
import { getNamespaceFromPath } from "./namespace.js";

/**
 * Removes the local scope markers emitted by this front end.
 */
export const typeScriptOwnerPathNormalizer: OwnerPathNormalizer =
  createOwnerPathNormalizer({ localScopePattern: LOCAL_SCOPE_PATTERN });

const ANONYMOUS_SCOPE = "anonymous";

const isFunctionWithBody = (
  node: ts.Node
): node is ts.FunctionLikeDeclaration =>
  ts.isFunctionDeclaration(node) ||
  ts.isMethodDeclaration(node) ||
  ts.isConstructorDeclaration(node) ||
  ts.isGetAccessorDeclaration(node) ||
  ts.isSetAccessorDeclaration(node) ||
  ts.isFunctionExpression(node) ||
  ts.isArrowFunction(node);

const functionScopeName = (node: ts.FunctionLikeDeclaration): string => {
  if (ts.isConstructorDeclaration(node)) {
    return "constructor";
  }

  if (node.name !== undefined) {
    return ts.isComputedPropertyName(node.name)
      ? node.name.getText()
      : node.name.text;
  }

  // const build = () => { ... }
  const parent = node.parent;
  if (
    (ts.isArrowFunction(node) || ts.isFunctionExpression(node)) &&
    ts.isVariableDeclaration(parent) &&
    ts.isIdentifier(parent.name)
  ) {
    return parent.name.text;
  }

  return ANONYMOUS_SCOPE;
};

/**
 * Segment contributed by one enclosing node, or undefined if it adds none.
 */
const scopeSegment = (node: ts.Node): string | undefined => {
  if (ts.isModuleDeclaration(node)) {
    // declare module "pkg" { ... } is not a namespace
    return ts.isIdentifier(node.name) ? node.name.text : undefined;
  }

  if (ts.isClassDeclaration(node) || ts.isClassExpression(node)) {
    return node.name?.text ?? localScopeSegment(ANONYMOUS_SCOPE);
  }

  if (isFunctionWithBody(node)) {
    return localScopeSegment(functionScopeName(node));
  }

  if (ts.isClassStaticBlockDeclaration(node)) {
    return localScopeSegment("static");
  }

  // Function and static block bodies are covered by their owner
  if (
    ts.isBlock(node) &&
    !isFunctionWithBody(node.parent) &&
    !ts.isClassStaticBlockDeclaration(node.parent)
  ) {
    return localScopeSegment("block");
  }

  return undefined;
};

const isProjectSourceFile = (
  sourceFile: ts.SourceFile,
  program: RecnameProgram
): boolean =>
  !sourceFile.isDeclarationFile &&
  !program.program.isSourceFileDefaultLibrary(sourceFile) &&
  !program.program.isSourceFileFromExternalLibrary(sourceFile);

/**
 * Compute the raw owner path of a declaration, markers included.
 *
 * Declarations outside the project (lib files, packages) get no file
 * namespace, only their enclosing namespaces.
 */
export const getOwnerPath = (
  declaration: ts.Node,
  program: RecnameProgram
): string => {
  const segments: string[] = [];

  let current = declaration.parent;
  while (current !== undefined && !ts.isSourceFile(current)) {
    const segment = scopeSegment(current);
    if (segment !== undefined) {
      segments.unshift(segment);
    }
    current = current.parent;
  }

  const sourceFile = declaration.getSourceFile();
  const fileNamespace = isProjectSourceFile(sourceFile, program)
    ? getNamespaceFromPath(
        sourceFile.fileName,
        program.options.sourceRoot,
        program.options.rootNamespace
      )
    : "";

  return [fileNamespace, ...segments].filter((s) => s !== "").join(".");
};
