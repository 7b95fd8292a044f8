/**
 * User overrides for a record name, and the annotations they come from
 */

export type OverrideSet = {
  /** Replaces the derived name outright */
  readonly name?: string;
  /** Replaces the derived namespace outright, used verbatim */
  readonly namespace?: string;
  /** Drop type arguments from the derived name */
  readonly erased: boolean;
};

export const noOverrides: OverrideSet = { erased: false };

export const createOverrideSet = (
  overrides: Partial<OverrideSet> = {}
): OverrideSet => ({
  name: overrides.name,
  namespace: overrides.namespace,
  erased: overrides.erased ?? false,
});

export type RecordNameAnnotation = {
  readonly kind: "name";
  readonly value: string;
};

export type RecordNamespaceAnnotation = {
  readonly kind: "namespace";
  readonly value: string;
};

export type ErasedNameAnnotation = {
  readonly kind: "erased";
};

export type RecordAnnotation =
  | RecordNameAnnotation
  | RecordNamespaceAnnotation
  | ErasedNameAnnotation;

/**
 * Fold the annotations attached to a type into an override set.
 *
 * The first `name` and the first `namespace` annotation win; a single
 * `erased` annotation is enough to set the flag.
 */
export const extractOverrides = (
  annotations: readonly RecordAnnotation[]
): OverrideSet => {
  let name: string | undefined;
  let namespace: string | undefined;
  let erased = false;

  for (const annotation of annotations) {
    switch (annotation.kind) {
      case "name":
        name = name ?? annotation.value;
        break;
      case "namespace":
        namespace = namespace ?? annotation.value;
        break;
      case "erased":
        erased = true;
        break;
    }
  }

  return { name, namespace, erased };
};
