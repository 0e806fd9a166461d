import type { Layout } from "./layout.js";
import type { Value } from "./values.js";
import { ErrorCode, throwError } from "../runtime/errors.js";

/**
 * A class: table-backed, single inheritance. `baseClass` is undefined only
 * for the universal base class.
 */
export class ClassObject {
  readonly kind = "class" as const;
  readonly name: string;
  readonly baseClass: ClassObject | undefined;
  readonly fields: Map<string, Value>;
  private metaclass: ClassObject | undefined;

  constructor(
    name: string,
    baseClass: ClassObject | undefined,
    fields: Map<string, Value>,
    metaclass: ClassObject | undefined
  ) {
    this.name = name;
    this.baseClass = baseClass;
    this.fields = fields;
    this.metaclass = metaclass;
  }

  get cls(): ClassObject {
    if (!this.metaclass) {
      throwError(ErrorCode.METACLASS_UNBOUND, { className: this.name });
    }
    return this.metaclass;
  }

  get hasMetaclass(): boolean {
    return this.metaclass !== undefined;
  }

  // Only the kernel's two-phase bootstrap creates classes without a metaclass.
  bindMetaclass(metaclass: ClassObject): void {
    if (this.metaclass) {
      throwError(ErrorCode.METACLASS_REBOUND, { className: this.name });
    }
    this.metaclass = metaclass;
  }
}

/**
 * An instance: no field table, just a shared Layout and storage aligned
 * with it slot by slot.
 */
export class InstanceObject {
  readonly kind = "instance" as const;
  readonly cls: ClassObject;
  private currentLayout: Layout;
  private readonly values: Value[] = [];

  constructor(cls: ClassObject, layout: Layout) {
    this.cls = cls;
    this.currentLayout = layout;
  }

  get layout(): Layout {
    return this.currentLayout;
  }

  get storage(): readonly Value[] {
    return this.values;
  }

  store(slot: number, value: Value): void {
    if (!Number.isInteger(slot) || slot < 0 || slot >= this.currentLayout.size) {
      throwError(ErrorCode.SLOT_OUT_OF_RANGE, {
        slot,
        layout: String(this.currentLayout),
      });
    }
    this.values[slot] = value;
  }

  // `next` must be a one-attribute successor of the current layout.
  advance(next: Layout, value: Value): void {
    if (next.parent !== this.currentLayout) {
      throwError(ErrorCode.LAYOUT_MISMATCH, {
        layout: String(next),
        current: String(this.currentLayout),
      });
    }
    this.currentLayout = next;
    this.values.push(value);
  }
}
