export {
  DiagnosticReporter,
  DiagnosticSeverity,
  formatDiagnostic,
} from "./common/diagnostics.js";
export type { Diagnostic, DiagnosticReporterOptions } from "./common/diagnostics.js";

export {
  AttributeNotFoundError,
  ERROR_CATALOG,
  ErrorCode,
  InvariantViolation,
  NotCallableError,
  ObjectModelError,
  isFatal,
} from "./runtime/errors.js";
export { DEFAULT_OPTIONS, resolveOptions } from "./runtime/config.js";
export type {
  HookNames,
  ResolvedRuntimeOptions,
  RuntimeOptions,
} from "./runtime/config.js";
export { Runtime } from "./runtime/runtime.js";
export type { FieldTable, InstanceSnapshot } from "./runtime/runtime.js";

export { Layout, LayoutCache } from "./object/layout.js";
export { ClassObject, InstanceObject } from "./object/model.js";
export {
  ancestors,
  classLookup,
  classOf,
  isInstance,
  isSubclass,
} from "./object/ancestry.js";
export { newInstance, rawRead, rawWrite } from "./object/storage.js";
export { callMethod, readAttribute, writeAttribute } from "./object/protocol.js";
export { bootstrapKernel, defaultWriteHook } from "./object/bootstrap.js";
export type { Kernel } from "./object/bootstrap.js";
export { formatValue } from "./object/format.js";
export {
  ABSENT,
  bindValue,
  callable,
  descriptor,
  invoke,
  isClassObject,
  isRuntimeObject,
  isTagged,
  property,
} from "./object/values.js";
export type {
  Absent,
  BindHook,
  BoundCallable,
  Descriptor,
  Invocable,
  NativeFunction,
  Primitive,
  RuntimeObject,
  TaggedValue,
  Value,
} from "./object/values.js";
