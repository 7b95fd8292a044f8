/**
 * Record annotations
 *
 * Marker calls attach record name overrides to a class:
 *
 *   record.on(Pair).name("Tuple").namespace("com.acme").erased();
 *
 * The calls run once at module load. The compile-time front end reads the
 * same chains from source, so a class is named alike by both.
 *
 * Interfaces and type aliases have no runtime value; they are annotated
 * through a type argument, which only the compile-time front end sees:
 *
 *   record.on<Point>().name("Coordinate");
 */

import type { RecordAnnotation } from "@recname/core";

/**
 * Any class, abstract ones included
 */
export type RecordClass = abstract new (...args: never[]) => unknown;

export type RecordAnnotationBuilder = {
  /** Replace the derived record name */
  readonly name: (value: string) => RecordAnnotationBuilder;
  /** Replace the derived namespace, used verbatim */
  readonly namespace: (value: string) => RecordAnnotationBuilder;
  /** Leave type arguments out of the derived name */
  readonly erased: () => RecordAnnotationBuilder;
};

const annotationStore = new WeakMap<RecordClass, RecordAnnotation[]>();

const annotate = (target: RecordClass, annotation: RecordAnnotation): void => {
  const existing = annotationStore.get(target);
  if (existing) {
    existing.push(annotation);
  } else {
    annotationStore.set(target, [annotation]);
  }
};

const createBuilder = (
  add: (annotation: RecordAnnotation) => void
): RecordAnnotationBuilder => {
  const builder: RecordAnnotationBuilder = {
    name: (value) => {
      add({ kind: "name", value });
      return builder;
    },
    namespace: (value) => {
      add({ kind: "namespace", value });
      return builder;
    },
    erased: () => {
      add({ kind: "erased" });
      return builder;
    },
  };
  return builder;
};

// Type-only targets keep nothing at runtime
const typeOnlyBuilder = createBuilder(() => undefined);

export type RecordAnnotationApi = {
  /** Annotate a class */
  on(target: RecordClass): RecordAnnotationBuilder;
  /** Annotate an interface or type alias, read from source only */
  on<T>(): RecordAnnotationBuilder;
};

export const record: RecordAnnotationApi = {
  on: (target?: RecordClass): RecordAnnotationBuilder =>
    target === undefined
      ? typeOnlyBuilder
      : createBuilder((annotation) => annotate(target, annotation)),
};

/**
 * Annotations attached to a class, in the order they were made.
 * Annotations on a base class are not inherited.
 */
export const getAnnotations = (
  target: RecordClass
): readonly RecordAnnotation[] => annotationStore.get(target) ?? [];
