import type { LayoutCache } from "./layout.js";
import { ClassObject, InstanceObject } from "./model.js";
import { formatValue } from "./format.js";
import {
  ABSENT,
  isClassObject,
  type Absent,
  type RuntimeObject,
  type Value,
} from "./values.js";
import { ErrorCode, throwError } from "../runtime/errors.js";

export function newInstance(layouts: LayoutCache, cls: Value): InstanceObject {
  if (!isClassObject(cls)) {
    throwError(ErrorCode.NOT_A_CLASS, {
      role: "new instance",
      value: formatValue(cls),
    });
  }
  return new InstanceObject(cls, layouts.root);
}

// Storage-level read: no class lookup, no hooks.
export function rawRead(obj: RuntimeObject, name: string): Value | Absent {
  if (obj instanceof ClassObject) {
    const value = obj.fields.get(name);
    return value === undefined ? ABSENT : value;
  }

  const slot = obj.layout.slotOf(name);
  if (slot === undefined) return ABSENT;
  return obj.storage[slot];
}

// Storage-level write: overwrite an occupied slot or move the instance to the
// successor layout and append.
export function rawWrite(
  layouts: LayoutCache,
  obj: RuntimeObject,
  name: string,
  value: Value
): void {
  if (obj instanceof ClassObject) {
    obj.fields.set(name, value);
    return;
  }

  const slot = obj.layout.slotOf(name);
  if (slot !== undefined) {
    obj.store(slot, value);
    return;
  }
  obj.advance(layouts.extend(obj.layout, name), value);
}
