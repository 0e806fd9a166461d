import type { ClassObject } from "./model.js";
import { ABSENT, type Absent, type RuntimeObject, type Value } from "./values.js";

// Single inheritance: the class itself, then each base class in turn.
export function ancestors(cls: ClassObject): ClassObject[] {
  const chain: ClassObject[] = [];
  for (let c: ClassObject | undefined = cls; c; c = c.baseClass) {
    chain.push(c);
  }
  return chain;
}

export function isSubclass(a: ClassObject, b: ClassObject): boolean {
  return ancestors(a).includes(b);
}

export function classOf(obj: RuntimeObject): ClassObject {
  return obj.cls;
}

export function isInstance(obj: RuntimeObject, cls: ClassObject): boolean {
  return isSubclass(obj.cls, cls);
}

/**
 * First class in `ancestors(cls)` whose own fields hold `name` wins, so a
 * subclass entry shadows any ancestor entry of the same name.
 */
export function classLookup(cls: ClassObject, name: string): Value | Absent {
  for (const c of ancestors(cls)) {
    const value = c.fields.get(name);
    if (value !== undefined) return value;
  }
  return ABSENT;
}
