/**
 * Record annotation scanning
 *
 * Reads the marker call chains of the runtime annotation API straight from
 * source, so both front ends see the same overrides:
 *
 *   record.on(Pair).name("Tuple").namespace("com.acme").erased();
 *
 * `record` may be imported under another name, or reached through a
 * namespace import (`rt.record.on(...)`). The target is a class or enum
 * reference (`Pair`, `Shapes.Circle`), or a type argument for declarations
 * without a value (`record.on<Point>()`, `record.on<Shapes.Area>()`).
 */

import * as ts from "typescript";
import {
  DiagnosticsCollector,
  RecordAnnotation,
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
} from "@recname/core";
import { getNodeLocation } from "../program/diagnostics.js";

export const ANNOTATIONS_IMPORT_SPECIFIER = "@recname/runtime";
export const ANNOTATIONS_EXPORT_NAME = "record";

export type AnnotationScan = {
  /** Keyed by the symbol of the annotated declaration */
  readonly annotations: ReadonlyMap<ts.Symbol, readonly RecordAnnotation[]>;
  readonly diagnostics: DiagnosticsCollector;
};

type ApiNames = {
  /** Local names bound to the `record` export */
  readonly direct: ReadonlySet<string>;
  /** Local names of namespace imports of the runtime package */
  readonly namespaces: ReadonlySet<string>;
};

type ChainStep = {
  readonly method: string;
  readonly call: ts.CallExpression;
};

type ParsedChain =
  | { readonly kind: "notMatch" }
  | {
      readonly kind: "match";
      readonly onCall: ts.CallExpression;
      readonly steps: readonly ChainStep[];
    };

type StepResult =
  | { readonly kind: "ok"; readonly annotation: RecordAnnotation }
  | { readonly kind: "error"; readonly message: string };

const collectApiNames = (sourceFile: ts.SourceFile): ApiNames => {
  const direct = new Set<string>();
  const namespaces = new Set<string>();

  for (const statement of sourceFile.statements) {
    if (
      !ts.isImportDeclaration(statement) ||
      !ts.isStringLiteral(statement.moduleSpecifier) ||
      statement.moduleSpecifier.text !== ANNOTATIONS_IMPORT_SPECIFIER
    ) {
      continue;
    }

    const bindings = statement.importClause?.namedBindings;
    if (bindings === undefined) continue;

    if (ts.isNamespaceImport(bindings)) {
      namespaces.add(bindings.name.text);
      continue;
    }

    for (const element of bindings.elements) {
      const imported = (element.propertyName ?? element.name).text;
      if (imported === ANNOTATIONS_EXPORT_NAME) {
        direct.add(element.name.text);
      }
    }
  }

  return { direct, namespaces };
};

const isApiReference = (expr: ts.Expression, api: ApiNames): boolean => {
  if (ts.isIdentifier(expr)) {
    return api.direct.has(expr.text);
  }
  return (
    ts.isPropertyAccessExpression(expr) &&
    expr.name.text === ANNOTATIONS_EXPORT_NAME &&
    ts.isIdentifier(expr.expression) &&
    api.namespaces.has(expr.expression.text)
  );
};

/**
 * Unwind `api.on(T).a(...).b(...)` from the outermost call inwards.
 */
const parseChain = (expr: ts.Expression, api: ApiNames): ParsedChain => {
  const steps: ChainStep[] = [];
  let current = expr;

  while (
    ts.isCallExpression(current) &&
    ts.isPropertyAccessExpression(current.expression)
  ) {
    const method = current.expression.name.text;
    const receiver = current.expression.expression;

    if (method === "on" && isApiReference(receiver, api)) {
      return { kind: "match", onCall: current, steps: steps.reverse() };
    }

    steps.push({ method, call: current });
    current = receiver;
  }

  return { kind: "notMatch" };
};

const stringArgument = (call: ts.CallExpression): string | undefined => {
  const [arg] = call.arguments;
  if (call.arguments.length !== 1 || arg === undefined) return undefined;
  return ts.isStringLiteral(arg) || ts.isNoSubstitutionTemplateLiteral(arg)
    ? arg.text
    : undefined;
};

const parseStep = (step: ChainStep): StepResult => {
  switch (step.method) {
    case "name":
    case "namespace": {
      const value = stringArgument(step.call);
      return value === undefined
        ? {
            kind: "error",
            message: `Invalid record annotation: .${step.method}(...) expects exactly 1 string literal argument`,
          }
        : {
            kind: "ok",
            annotation:
              step.method === "name"
                ? { kind: "name", value }
                : { kind: "namespace", value },
          };
    }
    case "erased":
      return step.call.arguments.length === 0
        ? { kind: "ok", annotation: { kind: "erased" } }
        : {
            kind: "error",
            message: `Invalid record annotation: .erased() takes no arguments`,
          };
    default:
      return {
        kind: "error",
        message: `Invalid record annotation: unknown method '.${step.method}(...)'. Expected name, namespace or erased`,
      };
  }
};

type AnnotationTarget = ts.Identifier | ts.PropertyAccessExpression | ts.QualifiedName;

const isValueReference = (
  expr: ts.Expression
): expr is ts.Identifier | ts.PropertyAccessExpression =>
  ts.isIdentifier(expr) ||
  (ts.isPropertyAccessExpression(expr) && isValueReference(expr.expression));

/**
 * `on(Target)` or `on<Target>()`, nothing else
 */
const getAnnotationTarget = (
  onCall: ts.CallExpression
): AnnotationTarget | undefined => {
  const typeArguments = onCall.typeArguments ?? [];
  const [valueTarget] = onCall.arguments;
  const [typeTarget] = typeArguments;

  if (typeArguments.length === 0 && onCall.arguments.length === 1) {
    return valueTarget !== undefined && isValueReference(valueTarget)
      ? valueTarget
      : undefined;
  }

  if (typeArguments.length === 1 && onCall.arguments.length === 0) {
    return typeTarget !== undefined && ts.isTypeReferenceNode(typeTarget)
      ? typeTarget.typeName
      : undefined;
  }

  return undefined;
};

const resolveTargetSymbol = (
  target: AnnotationTarget,
  checker: ts.TypeChecker
): ts.Symbol | undefined => {
  const nameNode = ts.isPropertyAccessExpression(target)
    ? target.name
    : ts.isQualifiedName(target)
      ? target.right
      : target;
  const symbol = checker.getSymbolAtLocation(nameNode);
  if (symbol === undefined) return undefined;
  return symbol.flags & ts.SymbolFlags.Alias
    ? checker.getAliasedSymbol(symbol)
    : symbol;
};

/**
 * Scan source files for record annotations.
 */
export const scanAnnotations = (
  sourceFiles: readonly ts.SourceFile[],
  checker: ts.TypeChecker
): AnnotationScan => {
  const annotations = new Map<ts.Symbol, RecordAnnotation[]>();
  let diagnostics = createDiagnosticsCollector();

  const report = (
    code: "RN3001" | "RN3002",
    message: string,
    node: ts.Node,
    hint?: string
  ) => {
    diagnostics = addDiagnostic(
      diagnostics,
      createDiagnostic(code, "error", message, getNodeLocation(node), hint)
    );
  };

  const visitChain = (expr: ts.Expression, api: ApiNames): void => {
    const chain = parseChain(expr, api);
    if (chain.kind === "notMatch") return;

    const target = getAnnotationTarget(chain.onCall);
    if (target === undefined) {
      report(
        "RN3002",
        "Invalid record annotation target: expected .on(Target) with a class or enum reference, or .on<Target>() with a type reference",
        chain.onCall
      );
      return;
    }

    const symbol = resolveTargetSymbol(target, checker);
    if (symbol === undefined) {
      report(
        "RN3002",
        `Invalid record annotation target: cannot resolve '${target.getText()}'`,
        target,
        ts.isQualifiedName(target)
          ? undefined
          : `Interfaces and type aliases have no value, annotate them with .on<${target.getText()}>()`
      );
      return;
    }

    const collected = annotations.get(symbol) ?? [];
    for (const step of chain.steps) {
      const result = parseStep(step);
      if (result.kind === "error") {
        report("RN3001", result.message, step.call);
        continue;
      }
      collected.push(result.annotation);
    }
    annotations.set(symbol, collected);
  };

  for (const sourceFile of sourceFiles) {
    const api = collectApiNames(sourceFile);
    if (api.direct.size === 0 && api.namespaces.size === 0) continue;

    const visit = (node: ts.Node): void => {
      if (ts.isExpressionStatement(node)) {
        visitChain(node.expression, api);
      }
      ts.forEachChild(node, visit);
    };
    visit(sourceFile);
  }

  return { annotations, diagnostics };
};

/**
 * Annotations attached to a declaration.
 */
export const getDeclarationAnnotations = (
  scan: AnnotationScan,
  declaration: ts.Declaration,
  checker: ts.TypeChecker
): readonly RecordAnnotation[] => {
  const name = ts.getNameOfDeclaration(declaration);
  const symbol =
    name !== undefined ? checker.getSymbolAtLocation(name) : undefined;
  return symbol !== undefined ? (scan.annotations.get(symbol) ?? []) : [];
};
