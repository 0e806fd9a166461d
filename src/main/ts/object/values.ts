import type { ClassObject, InstanceObject } from "./model.js";
import { formatValue } from "./format.js";
import { ErrorCode, throwError } from "../runtime/errors.js";

// Returned by the raw storage primitives and class lookup on a miss.
// Never stored, so it cannot be confused with a value.
export const ABSENT: unique symbol = Symbol("absent");
export type Absent = typeof ABSENT;

export type Primitive = string | number | boolean | bigint | null;

export type RuntimeObject = ClassObject | InstanceObject;

export type NativeFunction = (...args: Value[]) => Value;

export interface Invocable {
  readonly kind: "invocable";
  readonly name: string;
  readonly fn: NativeFunction;
}

export type BindHook = (
  self: Descriptor,
  obj: RuntimeObject,
  cls: ClassObject
) => Value;

export interface Descriptor {
  readonly kind: "descriptor";
  readonly name: string;
  readonly bind: BindHook;
}

export interface BoundCallable {
  readonly kind: "bound";
  readonly callable: Invocable;
  readonly receiver: RuntimeObject;
}

export type Value =
  | Primitive
  | ClassObject
  | InstanceObject
  | Invocable
  | Descriptor
  | BoundCallable;

export type TaggedValue = Exclude<Value, Primitive>;

export function callable(name: string, fn: NativeFunction): Invocable {
  return { kind: "invocable", name, fn };
}

export function descriptor(name: string, bind: BindHook): Descriptor {
  return { kind: "descriptor", name, bind };
}

/**
 * A computed attribute: reading it through an object runs `getter` with
 * that object instead of returning the stored value.
 */
export function property(
  name: string,
  getter: (obj: RuntimeObject) => Value
): Descriptor {
  return descriptor(name, (_self, obj) => getter(obj));
}

export function isTagged(value: Value): value is TaggedValue {
  return typeof value === "object" && value !== null;
}

export function isRuntimeObject(value: Value): value is RuntimeObject {
  return isTagged(value) && (value.kind === "class" || value.kind === "instance");
}

export function isClassObject(value: Value): value is ClassObject {
  return isTagged(value) && value.kind === "class";
}

/**
 * Applies the bind capability of a value read off `obj` through its class:
 * invocables become bound callables, descriptors run their bind hook, and
 * everything else passes through.
 */
export function bindValue(value: Value, obj: RuntimeObject): Value {
  if (!isTagged(value)) return value;

  switch (value.kind) {
    case "invocable":
      return { kind: "bound", callable: value, receiver: obj };
    case "descriptor":
      return value.bind(value, obj, obj.cls);
    default:
      return value;
  }
}

export function invoke(callee: Value, args: readonly Value[]): Value {
  if (isTagged(callee)) {
    if (callee.kind === "invocable") return callee.fn(...args);
    if (callee.kind === "bound") {
      return callee.callable.fn(callee.receiver, ...args);
    }
  }
  return throwError(ErrorCode.NOT_CALLABLE, { value: formatValue(callee) });
}
