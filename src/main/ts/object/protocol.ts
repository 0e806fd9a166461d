import type { HookNames } from "../runtime/config.js";
import { ErrorCode, throwError } from "../runtime/errors.js";
import { classLookup } from "./ancestry.js";
import { rawRead } from "./storage.js";
import {
  ABSENT,
  bindValue,
  invoke,
  type RuntimeObject,
  type Value,
} from "./values.js";

/**
 * Attribute read:
 *  1. the object's own storage, returned as stored;
 *  2. class-side lookup along the ancestor sequence, passed through the
 *     value's bind capability (invocables bind the receiver, descriptors run
 *     their bind hook);
 *  3. the class-side miss hook, called as `(obj, name)`;
 *  4. otherwise AttributeNotFound.
 *
 * The miss hook is found with `classLookup`, never with `readAttribute`
 * itself, so a missing hook cannot recurse.
 */
export function readAttribute(
  hooks: HookNames,
  obj: RuntimeObject,
  name: string
): Value {
  const direct = rawRead(obj, name);
  if (direct !== ABSENT) return direct;

  const inherited = classLookup(obj.cls, name);
  if (inherited !== ABSENT) return bindValue(inherited, obj);

  const missHook = classLookup(obj.cls, hooks.missHook);
  if (missHook !== ABSENT) return invoke(missHook, [obj, name]);

  return throwError(ErrorCode.ATTRIBUTE_NOT_FOUND, { name });
}

// Every write goes through the class-side write hook; the base class always
// supplies one.
export function writeAttribute(
  hooks: HookNames,
  obj: RuntimeObject,
  name: string,
  value: Value
): void {
  const hook = classLookup(obj.cls, hooks.writeHook);
  if (hook === ABSENT) {
    throwError(ErrorCode.MISSING_WRITE_HOOK, {
      hook: hooks.writeHook,
      className: obj.cls.name,
    });
  }
  invoke(hook, [obj, name, value]);
}

export function callMethod(
  hooks: HookNames,
  obj: RuntimeObject,
  name: string,
  ...args: Value[]
): Value {
  return invoke(readAttribute(hooks, obj, name), args);
}
