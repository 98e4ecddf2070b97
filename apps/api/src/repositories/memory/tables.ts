/**
 * In-memory tables with transactional drafts.
 *
 * A draft buffers writes over the committed table; reads inside the draft see
 * its own writes first. commit() applies the buffered writes, so nothing a
 * transaction writes is visible to others before it commits.
 */

const DELETED = Symbol('deleted');
type Pending<V> = V | typeof DELETED;

/** Read/write surface shared by a committed table and a draft over it. */
export interface KeyedRows<K, V> {
  get(key: K): V | undefined;
  set(key: K, value: V): void;
  delete(key: K): boolean;
  entries(): Array<[K, V]>;
}

/** Append-only surface shared by a committed log and a draft over it. */
export interface AppendRows<V> {
  append(value: V): void;
  all(): V[];
}

export interface Draft {
  /** Snapshot of the buffered writes, for savepoints. */
  mark(): () => void;
  commit(): void;
}

export class MemoryTable<K, V> implements KeyedRows<K, V> {
  private readonly rows = new Map<K, V>();

  get(key: K): V | undefined {
    return this.rows.get(key);
  }

  set(key: K, value: V): void {
    this.rows.set(key, value);
  }

  delete(key: K): boolean {
    return this.rows.delete(key);
  }

  entries(): Array<[K, V]> {
    return [...this.rows.entries()];
  }

  draft(): TableDraft<K, V> {
    return new TableDraft(this);
  }
}

export class TableDraft<K, V> implements KeyedRows<K, V>, Draft {
  private pending = new Map<K, Pending<V>>();

  constructor(private readonly table: MemoryTable<K, V>) {}

  get(key: K): V | undefined {
    const value = this.pending.get(key);
    if (value === DELETED) return undefined;
    return value ?? this.table.get(key);
  }

  set(key: K, value: V): void {
    this.pending.set(key, value);
  }

  delete(key: K): boolean {
    const existed = this.get(key) !== undefined;
    this.pending.set(key, DELETED);
    return existed;
  }

  entries(): Array<[K, V]> {
    const merged = new Map<K, V>(this.table.entries());
    for (const [key, value] of this.pending) {
      if (value === DELETED) merged.delete(key);
      else merged.set(key, value);
    }
    return [...merged.entries()];
  }

  mark(): () => void {
    const snapshot = new Map(this.pending);
    return () => {
      this.pending = new Map(snapshot);
    };
  }

  commit(): void {
    for (const [key, value] of this.pending) {
      if (value === DELETED) this.table.delete(key);
      else this.table.set(key, value);
    }
    this.pending.clear();
  }
}

export class MemoryLog<V> implements AppendRows<V> {
  private readonly rows: V[] = [];

  append(value: V): void {
    this.rows.push(value);
  }

  all(): V[] {
    return [...this.rows];
  }

  draft(): LogDraft<V> {
    return new LogDraft(this);
  }
}

export class LogDraft<V> implements AppendRows<V>, Draft {
  private pending: V[] = [];

  constructor(private readonly log: MemoryLog<V>) {}

  append(value: V): void {
    this.pending.push(value);
  }

  all(): V[] {
    return [...this.log.all(), ...this.pending];
  }

  mark(): () => void {
    const length = this.pending.length;
    return () => {
      this.pending = this.pending.slice(0, length);
    };
  }

  commit(): void {
    for (const value of this.pending) this.log.append(value);
    this.pending = [];
  }
}
