import type { DiagnosticReporter } from "../common/diagnostics.js";
import { DiagnosticSeverity } from "../common/diagnostics.js";
import { ErrorCode, throwError } from "../runtime/errors.js";

/**
 * Shared description of which attribute names occupy which storage slots
 * (a "hidden class"). Slots are assigned in insertion order, so the same
 * names added in a different order produce a different Layout.
 *
 * A Layout never changes once created apart from its transition cache,
 * which only ever grows.
 */
export class Layout {
  private readonly slots: ReadonlyMap<string, number>;
  private readonly transitions = new Map<string, Layout>();
  private readonly tree: LayoutTree | undefined;

  private constructor(
    slots: ReadonlyMap<string, number>,
    readonly parent: Layout | undefined,
    tree: LayoutTree | undefined
  ) {
    this.slots = slots;
    this.tree = tree;
  }

  // `tree` is told about every transition created below this root.
  static empty(tree?: LayoutTree): Layout {
    return new Layout(new Map(), undefined, tree);
  }

  get size(): number {
    return this.slots.size;
  }

  slotOf(name: string): number | undefined {
    return this.slots.get(name);
  }

  has(name: string): boolean {
    return this.slots.has(name);
  }

  successor(name: string): Layout | undefined {
    return this.transitions.get(name);
  }

  /**
   * Returns the layout holding these attributes plus `name` at the next
   * free slot. The result is interned: the same `(layout, name)` pair always
   * yields the same object.
   */
  extend(name: string): Layout {
    const existing = this.slots.get(name);
    if (existing !== undefined) {
      throwError(ErrorCode.SLOT_ALREADY_PRESENT, { name, slot: existing });
    }

    const cached = this.transitions.get(name);
    if (cached) return cached;

    const slots = new Map(this.slots);
    slots.set(name, this.slots.size);
    const next = new Layout(slots, this, this.tree);
    this.transitions.set(name, next);
    this.tree?.transitionCreated(next, name);
    return next;
  }

  attributeNames(): string[] {
    return [...this.slots.keys()];
  }

  toRecord(): Record<string, number> {
    return Object.fromEntries(this.slots);
  }

  toString(): string {
    return `{${this.attributeNames().join(", ")}}`;
  }
}

export interface LayoutTree {
  transitionCreated(next: Layout, name: string): void;
}

/**
 * Owns the root of one runtime's layout transition tree. Each runtime gets
 * its own cache so independent runtimes never observe each other's layouts.
 */
export class LayoutCache implements LayoutTree {
  readonly root: Layout;
  private created = 1;
  private readonly reporter?: DiagnosticReporter;

  constructor(reporter?: DiagnosticReporter) {
    this.reporter = reporter;
    this.root = Layout.empty(this);
  }

  // Root included.
  get layoutCount(): number {
    return this.created;
  }

  extend(layout: Layout, name: string): Layout {
    return layout.extend(name);
  }

  transitionCreated(next: Layout, name: string): void {
    this.created++;
    this.reporter?.report({
      severity: DiagnosticSeverity.Hint,
      message: `new layout ${next} (slot ${next.size - 1} for '${name}')`,
      subject: "layout",
    });
  }
}
