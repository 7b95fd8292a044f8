/**
 * recname runtime - record annotations and names for classes at runtime
 */

export {
  type RecordClass,
  type RecordAnnotationBuilder,
  type RecordAnnotationApi,
  record,
  getAnnotations,
} from "./annotations.js";
export {
  type PrimitiveTypeName,
  type RuntimeTypeArgument,
  type DescribeClassOptions,
  type ResolveClassOptions,
  describeClass,
  resolveClassName,
} from "./describe.js";
