import type { ResolvedRuntimeOptions } from "../runtime/config.js";
import { ErrorCode, throwError } from "../runtime/errors.js";
import type { LayoutCache } from "./layout.js";
import { ClassObject } from "./model.js";
import { rawWrite } from "./storage.js";
import { callable, isRuntimeObject, type Invocable } from "./values.js";

export interface Kernel {
  // Universal base class: no base, instance of the default metaclass.
  objectClass: ClassObject;
  // Default metaclass: subclass of the base class, instance of itself.
  typeClass: ClassObject;
}

// `(obj, name, value)` straight to storage. User write hooks delegate here.
export function defaultWriteHook(
  layouts: LayoutCache,
  hookName: string
): Invocable {
  return callable(hookName, (...args) => {
    const [obj, name, value] = args;
    if (args.length !== 3 || !isRuntimeObject(obj) || typeof name !== "string") {
      throwError(ErrorCode.INVALID_HOOK_ARGUMENTS, { hook: hookName });
    }
    rawWrite(layouts, obj, name, value);
    return null;
  });
}

/**
 * Builds the two root classes. They refer to each other, so both start
 * without a metaclass and are patched once the default metaclass exists.
 */
export function bootstrapKernel(
  layouts: LayoutCache,
  options: ResolvedRuntimeOptions
): Kernel {
  const objectClass = new ClassObject(
    options.baseClassName,
    undefined,
    new Map(),
    undefined
  );
  const typeClass = new ClassObject(
    options.metaclassName,
    objectClass,
    new Map(),
    undefined
  );

  typeClass.bindMetaclass(typeClass);
  objectClass.bindMetaclass(typeClass);

  objectClass.fields.set(
    options.writeHook,
    defaultWriteHook(layouts, options.writeHook)
  );

  return { objectClass, typeClass };
}
