/**
 * Bounded, insertion-ordered row store backing the in-memory repositories.
 *
 * Lives for the life of the process; nothing is persisted. When `maxItems`
 * is reached the oldest row (by insertion) is evicted to make room, and
 * `onEvict` is told which one.
 *
 * Every method is synchronous, so a read-modify-write inside one call cannot
 * interleave with another caller.
 */

export interface StoredRow {
  id: string;
  created_at: string;
  updated_at: string;
}

export interface InMemoryStoreOptions<Row> {
  maxItems: number;
  onEvict?: (row: Row) => void;
}

export class InMemoryStore<Row extends StoredRow> {
  // Map iteration order is insertion order; re-setting a key keeps its slot.
  private readonly rows = new Map<string, Row>();
  private readonly maxItems: number;
  private readonly onEvict?: (row: Row) => void;

  constructor(options: InMemoryStoreOptions<Row>) {
    if (!Number.isInteger(options.maxItems) || options.maxItems < 1) {
      throw new RangeError(`maxItems must be a positive integer, got ${options.maxItems}`);
    }
    this.maxItems = options.maxItems;
    this.onEvict = options.onEvict;
  }

  insert(row: Row): Row {
    if (this.rows.has(row.id)) {
      throw new Error(`Row with id "${row.id}" already exists`);
    }

    while (this.rows.size >= this.maxItems) {
      const oldest = this.rows.values().next();
      if (oldest.done) break;
      this.rows.delete(oldest.value.id);
      this.onEvict?.(clone(oldest.value));
    }

    const stored = clone(row);
    this.rows.set(stored.id, stored);
    return clone(stored);
  }

  get(id: string): Row | null {
    const row = this.rows.get(id);
    return row ? clone(row) : null;
  }

  list(predicate: (row: Row) => boolean, limit: number, offset: number): Row[] {
    const matches: Row[] = [];
    let skipped = 0;
    for (const row of this.rows.values()) {
      if (!predicate(row)) continue;
      if (skipped < offset) {
        skipped++;
        continue;
      }
      if (matches.length >= limit) break;
      matches.push(clone(row));
    }
    return matches;
  }

  /**
   * Apply `patch` if `guard` accepts the current row.
   * Returns null when the row is missing or the guard rejects it.
   */
  update(
    id: string,
    patch: (current: Row) => Partial<Row>,
    guard: (current: Row) => boolean = () => true
  ): Row | null {
    const current = this.rows.get(id);
    if (!current || !guard(current)) return null;

    const updated: Row = {
      ...current,
      ...patch(current),
      id: current.id,
      created_at: current.created_at,
      updated_at: new Date().toISOString(),
    };
    this.rows.set(id, updated);
    return clone(updated);
  }

  delete(id: string): boolean {
    return this.rows.delete(id);
  }

  get size(): number {
    return this.rows.size;
  }
}

function clone<T>(value: T): T {
  return structuredClone(value);
}
