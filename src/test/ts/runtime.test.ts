import { describe, expect, it } from "vitest";

import {
  ClassObject,
  DiagnosticReporter,
  DiagnosticSeverity,
  ErrorCode,
  InvariantViolation,
  Runtime,
  callable,
  formatValue,
  isFatal,
} from "../../main/ts/index.js";
import { captureError } from "./runtime_helpers.js";

describe("Runtime", () => {
  describe("point scenario", () => {
    it("should share layouts between instances written in the same order", () => {
      const rt = new Runtime();
      const Point = rt.makeClass("Point");

      const p1 = rt.newInstance(Point);
      expect(p1.layout).toBe(rt.layouts.root);
      rt.write(p1, "x", 1);
      rt.write(p1, "y", 2);

      expect(rt.inspect(p1)).toEqual({
        className: "Point",
        layout: { x: 0, y: 1 },
        storage: [1, 2],
      });

      const p2 = rt.newInstance(Point);
      rt.write(p2, "x", 1);
      rt.write(p2, "y", 2);
      expect(p2.layout).toBe(p1.layout);

      rt.write(p2, "x", 5);
      expect(p2.storage).toEqual([5, 2]);
      expect(p1.storage).toEqual([1, 2]);

      const p3 = rt.newInstance(Point);
      rt.write(p3, "x", 1);
      rt.write(p3, "z", 3);
      expect(p3.layout).not.toBe(p1.layout);
      expect(p3.layout.toRecord()).toEqual({ x: 0, z: 1 });
      expect(p3.layout.parent).toBe(p1.layout.parent);
    });

    it("should give a different order a different layout", () => {
      const rt = new Runtime();
      const Point = rt.makeClass("Point");
      const a = rt.newInstance(Point);
      const b = rt.newInstance(Point);

      rt.write(a, "x", 1);
      rt.write(a, "y", 2);
      rt.write(b, "y", 2);
      rt.write(b, "x", 1);

      expect(a.layout).not.toBe(b.layout);
      expect(rt.inspect(b).layout).toEqual({ y: 0, x: 1 });
    });

    it("should share layouts across classes", () => {
      const rt = new Runtime();
      const a = rt.newInstance(rt.makeClass("A"));
      const b = rt.newInstance(rt.makeClass("B"));

      rt.write(a, "x", 1);
      rt.write(b, "x", "other");
      expect(a.layout).toBe(b.layout);
    });

    it("should keep independent runtimes apart", () => {
      const first = new Runtime();
      const second = new Runtime();
      const p = first.newInstance(first.makeClass("Point"));
      const q = second.newInstance(second.makeClass("Point"));

      first.write(p, "x", 1);
      second.write(q, "x", 1);

      expect(p.layout).not.toBe(q.layout);
      expect(first.layouts.layoutCount).toBe(2);
      expect(second.layouts.layoutCount).toBe(2);
    });

    it("should reject moving an instance to an unrelated layout", () => {
      const rt = new Runtime();
      const p = rt.newInstance(rt.makeClass("Point"));
      const far = rt.layouts.root.extend("q").extend("r");
      const error = captureError(() => p.advance(far, 1));

      expect(error).toMatchObject({ code: ErrorCode.LAYOUT_MISMATCH });
      expect(error).toHaveProperty(
        "message",
        "layout {q, r} does not extend the current layout {}"
      );
    });

    it("should refuse to store outside the current layout", () => {
      const rt = new Runtime();
      const p = rt.newInstance(rt.makeClass("Point"));
      rt.write(p, "x", 1);
      const error = captureError(() => p.store(3, 9));

      expect(error).toBeInstanceOf(InvariantViolation);
      expect(error).toMatchObject({ code: ErrorCode.SLOT_OUT_OF_RANGE });
      expect(error).toHaveProperty("message", "slot 3 is outside layout {x}");
      expect(() => p.store(-1, 9)).toThrow(InvariantViolation);

      rt.write(p, "y", 2);
      expect(p.storage).toEqual([1, 2]);
      expect(rt.read(p, "y")).toBe(2);
    });
  });

  describe("bootstrap kernel", () => {
    it("should close the class graph over the two roots", () => {
      const rt = new Runtime();
      const { objectClass, typeClass } = rt;

      expect(objectClass.baseClass).toBeUndefined();
      expect(typeClass.baseClass).toBe(objectClass);
      expect(typeClass.cls).toBe(typeClass);
      expect(objectClass.cls).toBe(typeClass);
      expect(objectClass.fields.has("__setattr__")).toBe(true);
      expect(typeClass.fields.size).toBe(0);
    });

    it("should make new classes instances of the default metaclass", () => {
      const rt = new Runtime();
      const A = rt.makeClass("A");

      expect(A.cls).toBe(rt.typeClass);
      expect(A.baseClass).toBe(rt.objectClass);
    });

    it("should support custom metaclasses", () => {
      const rt = new Runtime();
      const Meta = rt.makeClass("Meta", rt.typeClass, {
        describe: callable("describe", (cls) => `class ${formatValue(cls)}`),
      });
      const K = rt.makeClass("K", rt.objectClass, {}, Meta);

      expect(K.cls).toBe(Meta);
      expect(rt.isInstance(K, rt.typeClass)).toBe(true);
      expect(rt.callMethod(K, "describe")).toBe("class <class K>");
      expect(() => rt.callMethod(rt.newInstance(K), "describe")).toThrow(
        "attribute not found: describe"
      );
    });

    it("should refuse a metaclass outside the default metaclass hierarchy", () => {
      const rt = new Runtime();
      const A = rt.makeClass("A");
      const error = captureError(() => rt.makeClass("X", rt.objectClass, {}, A));

      expect(error).toBeInstanceOf(InvariantViolation);
      expect(error).toMatchObject({ code: ErrorCode.INVALID_METACLASS });
      expect(isFatal(error)).toBe(true);
    });

    it("should refuse a base class that is not a class", () => {
      const rt = new Runtime();
      const error = captureError(() => rt.makeClass("X", 5));

      expect(error).toMatchObject({ code: ErrorCode.NOT_A_CLASS });
      expect(error).toHaveProperty(
        "message",
        "expected a class for base class of X, got 5"
      );
    });

    it("should refuse to instantiate a non-class", () => {
      const rt = new Runtime();
      const a = rt.newInstance(rt.makeClass("A"));
      const error = captureError(() => rt.newInstance(a));

      expect(error).toBeInstanceOf(InvariantViolation);
      expect(error).toHaveProperty(
        "message",
        "expected a class for new instance, got <A instance>"
      );
    });

    it("should bind a metaclass exactly once", () => {
      const rt = new Runtime();
      const loose = new ClassObject("Loose", rt.objectClass, new Map(), undefined);

      expect(loose.hasMetaclass).toBe(false);
      expect(() => loose.cls).toThrow("class Loose has no metaclass yet");

      loose.bindMetaclass(rt.typeClass);
      expect(loose.cls).toBe(rt.typeClass);
      expect(() => loose.bindMetaclass(rt.typeClass)).toThrow(
        "metaclass of Loose is already bound"
      );
    });

    it("should copy the field table it is given", () => {
      const rt = new Runtime();
      const source = new Map([["f", 1]]);
      const A = rt.makeClass("A", rt.objectClass, source);
      source.set("f", 2);

      expect(rt.classLookup(A, "f")).toBe(1);
    });
  });

  describe("options", () => {
    it("should name the kernel classes and hooks from its options", () => {
      const rt = new Runtime({
        baseClassName: "Object",
        metaclassName: "Class",
        missHook: "missing",
        writeHook: "assign",
      });
      const A = rt.makeClass("A", rt.objectClass, {
        missing: callable("missing", (_obj, name) => `computed ${String(name)}`),
      });
      const a = rt.newInstance(A);
      rt.write(a, "x", 1);

      expect(rt.ancestors(A).map((c) => c.name)).toEqual(["A", "Object"]);
      expect(rt.typeClass.name).toBe("Class");
      expect(rt.objectClass.fields.has("assign")).toBe(true);
      expect(rt.objectClass.fields.has("__setattr__")).toBe(false);
      expect(rt.read(a, "x")).toBe(1);
      expect(rt.read(a, "y")).toBe("computed y");
    });
  });

  describe("diagnostics", () => {
    it("should report kernel, class and layout events", () => {
      const reporter = new DiagnosticReporter({ echo: false });
      const rt = new Runtime({ reporter });
      const a = rt.newInstance(rt.makeClass("A"));
      rt.write(a, "x", 1);
      rt.write(a, "x", 2);

      expect(reporter.getDiagnostics()).toEqual([
        {
          severity: DiagnosticSeverity.Info,
          message: "kernel ready (object, type)",
          subject: "runtime",
        },
        {
          severity: DiagnosticSeverity.Info,
          message: "class A(object) with 0 field(s)",
          subject: "A",
        },
        {
          severity: DiagnosticSeverity.Hint,
          message: "new layout {x} (slot 0 for 'x')",
          subject: "layout",
        },
      ]);
    });

    it("should not report failures", () => {
      const reporter = new DiagnosticReporter({ echo: false });
      const rt = new Runtime({ reporter });
      const a = rt.newInstance(rt.makeClass("A"));
      reporter.clear();

      expect(() => rt.read(a, "nope")).toThrow("attribute not found: nope");
      expect(reporter.getDiagnostics()).toEqual([]);
    });
  });
});
