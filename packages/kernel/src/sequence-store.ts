import type { SequenceIndex, SequenceKind, SequenceView } from "@tickweave/schemas";

export interface SequenceStoreOptions<T> {
  /** Deep-freeze elements on publish. Default: true */
  freeze?: boolean;
  /** Already-published elements to adopt, starting at index 0. */
  seed?: readonly T[];
}

/**
 * Append-only, index-addressable storage for one sequence of a session.
 * Only the owner publishes; everyone else reads through bounded views.
 */
export class SequenceStore<T> {
  readonly kind: SequenceKind;
  private readonly elements: T[] = [];
  private readonly freeze: boolean;

  constructor(kind: SequenceKind, options?: SequenceStoreOptions<T>) {
    this.kind = kind;
    this.freeze = options?.freeze ?? true;
    for (const value of options?.seed ?? []) {
      this.publish(this.elements.length, value);
    }
  }

  get length(): number {
    return this.elements.length;
  }

  get lastIndex(): SequenceIndex {
    return this.elements.length - 1;
  }

  at(index: SequenceIndex): T | undefined {
    return index >= 0 ? this.elements[index] : undefined;
  }

  latest(): T | undefined {
    return this.elements[this.elements.length - 1];
  }

  /**
   * Publishes the element for `index`, which must be the next free index.
   * Publishing is all-or-nothing: the element is frozen before it becomes visible.
   */
  publish(index: SequenceIndex, value: T): T {
    if (index !== this.elements.length) {
      throw new Error(
        `Cannot publish ${this.kind}[${index}]: next publishable index is ${this.elements.length}`,
      );
    }
    const published = this.freeze ? deepFreeze(value) : value;
    this.elements.push(published);
    return published;
  }

  /**
   * Read-only view ending at `end` (inclusive, default: newest). With `window`,
   * only the last `window` elements up to `end` are visible.
   */
  view(options?: { end?: SequenceIndex; window?: number }): SequenceView<T> {
    const end = Math.min(options?.end ?? this.lastIndex, this.lastIndex);
    const window = options?.window;
    const start = window !== undefined ? Math.max(0, end - window + 1) : 0;
    return new PrefixView(this.kind, this.elements, start, end);
  }

  toArray(): T[] {
    return [...this.elements];
  }
}

class PrefixView<T> implements SequenceView<T> {
  readonly kind: SequenceKind;
  readonly start: SequenceIndex;
  readonly lastIndex: SequenceIndex;
  private readonly source: readonly T[];

  constructor(kind: SequenceKind, source: readonly T[], start: SequenceIndex, end: SequenceIndex) {
    this.kind = kind;
    this.source = source;
    this.start = start;
    this.lastIndex = Math.max(end, start - 1);
  }

  get length(): number {
    return this.lastIndex - this.start + 1;
  }

  at(index: SequenceIndex): T | undefined {
    if (index < this.start || index > this.lastIndex) return undefined;
    return this.source[index];
  }

  latest(): T | undefined {
    return this.at(this.lastIndex);
  }

  toArray(): T[] {
    return this.source.slice(this.start, this.lastIndex + 1);
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = this.start; i <= this.lastIndex; i++) {
      const value = this.source[i];
      if (value !== undefined) yield value;
    }
  }
}

/** Typed arrays and DataViews cannot be frozen and are left as they are. */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== "object" || Object.isFrozen(value)) return value;
  if (ArrayBuffer.isView(value)) return value;
  Object.freeze(value);
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  return value;
}
