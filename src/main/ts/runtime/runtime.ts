import type { DiagnosticReporter } from "../common/diagnostics.js";
import { DiagnosticSeverity } from "../common/diagnostics.js";
import { ancestors, classLookup, isInstance, isSubclass } from "../object/ancestry.js";
import { bootstrapKernel } from "../object/bootstrap.js";
import { formatValue } from "../object/format.js";
import { LayoutCache } from "../object/layout.js";
import { ClassObject, type InstanceObject } from "../object/model.js";
import { callMethod, readAttribute, writeAttribute } from "../object/protocol.js";
import { newInstance, rawRead, rawWrite } from "../object/storage.js";
import {
  invoke,
  isClassObject,
  type Absent,
  type RuntimeObject,
  type Value,
} from "../object/values.js";
import {
  resolveOptions,
  type ResolvedRuntimeOptions,
  type RuntimeOptions,
} from "./config.js";
import { ErrorCode, throwError } from "./errors.js";

export type FieldTable = Map<string, Value> | Record<string, Value>;

export interface InstanceSnapshot {
  className: string;
  layout: Record<string, number>;
  storage: Value[];
}

/**
 * One independent object space: its own kernel classes and its own layout
 * transition tree. Front ends translate surface operations into calls here.
 */
export class Runtime {
  readonly options: ResolvedRuntimeOptions;
  readonly layouts: LayoutCache;
  readonly objectClass: ClassObject;
  readonly typeClass: ClassObject;
  private readonly reporter?: DiagnosticReporter;

  constructor(options: RuntimeOptions = {}) {
    this.options = resolveOptions(options);
    this.reporter = this.options.reporter;
    this.layouts = new LayoutCache(this.reporter);

    const kernel = bootstrapKernel(this.layouts, this.options);
    this.objectClass = kernel.objectClass;
    this.typeClass = kernel.typeClass;
    this.reporter?.report({
      severity: DiagnosticSeverity.Info,
      message: `kernel ready (${this.objectClass.name}, ${this.typeClass.name})`,
      subject: "runtime",
    });
  }

  makeClass(
    name: string,
    baseClass: Value = this.objectClass,
    fields: FieldTable = {},
    metaclass: Value = this.typeClass
  ): ClassObject {
    if (!isClassObject(baseClass)) {
      throwError(ErrorCode.NOT_A_CLASS, {
        role: `base class of ${name}`,
        value: formatValue(baseClass),
      });
    }
    if (!isClassObject(metaclass)) {
      throwError(ErrorCode.NOT_A_CLASS, {
        role: `metaclass of ${name}`,
        value: formatValue(metaclass),
      });
    }
    if (!isSubclass(metaclass, this.typeClass)) {
      throwError(ErrorCode.INVALID_METACLASS, {
        className: name,
        metaclass: metaclass.name,
      });
    }

    const table =
      fields instanceof Map ? new Map(fields) : new Map(Object.entries(fields));
    const cls = new ClassObject(name, baseClass, table, metaclass);

    this.reporter?.report({
      severity: DiagnosticSeverity.Info,
      message: `class ${name}(${baseClass.name}) with ${table.size} field(s)`,
      subject: name,
    });
    return cls;
  }

  newInstance(cls: Value): InstanceObject {
    return newInstance(this.layouts, cls);
  }

  read(obj: RuntimeObject, name: string): Value {
    return readAttribute(this.options, obj, name);
  }

  write(obj: RuntimeObject, name: string, value: Value): void {
    writeAttribute(this.options, obj, name, value);
  }

  callMethod(obj: RuntimeObject, name: string, ...args: Value[]): Value {
    return callMethod(this.options, obj, name, ...args);
  }

  invoke(callee: Value, ...args: Value[]): Value {
    return invoke(callee, args);
  }

  rawRead(obj: RuntimeObject, name: string): Value | Absent {
    return rawRead(obj, name);
  }

  rawWrite(obj: RuntimeObject, name: string, value: Value): void {
    rawWrite(this.layouts, obj, name, value);
  }

  classLookup(cls: ClassObject, name: string): Value | Absent {
    return classLookup(cls, name);
  }

  ancestors(cls: ClassObject): ClassObject[] {
    return ancestors(cls);
  }

  isSubclass(a: ClassObject, b: ClassObject): boolean {
    return isSubclass(a, b);
  }

  isInstance(obj: RuntimeObject, cls: ClassObject): boolean {
    return isInstance(obj, cls);
  }

  // Diagnostic view, not a stable contract.
  inspect(instance: InstanceObject): InstanceSnapshot {
    return {
      className: instance.cls.name,
      layout: instance.layout.toRecord(),
      storage: [...instance.storage],
    };
  }
}
