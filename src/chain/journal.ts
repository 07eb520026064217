/**
 * Undo journal and the journaled state containers contracts keep their storage in
 *
 * Every mutation pushes an undo entry. A call frame takes a checkpoint when it
 * starts and, if it throws, unwinds the journal back to that checkpoint.
 */

export class Journal {
  private readonly undoLog: Array<() => void> = [];

  record(undo: () => void): void {
    this.undoLog.push(undo);
  }

  checkpoint(): number {
    return this.undoLog.length;
  }

  revertTo(checkpoint: number): void {
    while (this.undoLog.length > checkpoint) {
      const undo = this.undoLog.pop();
      undo?.();
    }
  }

  /**
   * Drop every undo entry once nothing can roll them back
   */
  commit(): void {
    this.undoLog.length = 0;
  }
}

/**
 * Journaled key/value map; reads of missing keys fall back to a default
 */
export class StateMap<K, V> {
  private readonly entries = new Map<K, V>();

  constructor(
    private readonly journal: Journal,
    private readonly defaultValue: () => V
  ) {}

  get(key: K): V {
    return this.entries.has(key) ? (this.entries.get(key) ?? this.defaultValue()) : this.defaultValue();
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  set(key: K, value: V): void {
    const existed = this.entries.has(key);
    const previous = this.entries.get(key);
    this.entries.set(key, value);
    this.journal.record(() => {
      if (existed && previous !== undefined) {
        this.entries.set(key, previous);
      } else {
        this.entries.delete(key);
      }
    });
  }

  /**
   * Read-modify-write in one step
   */
  update(key: K, fn: (current: V) => V): V {
    const next = fn(this.get(key));
    this.set(key, next);
    return next;
  }

  delete(key: K): void {
    if (!this.entries.has(key)) return;
    const previous = this.entries.get(key);
    this.entries.delete(key);
    this.journal.record(() => {
      if (previous !== undefined) this.entries.set(key, previous);
    });
  }
}

/**
 * Journaled single value
 */
export class StateValue<T> {
  private current: T;

  constructor(
    private readonly journal: Journal,
    initial: T
  ) {
    this.current = initial;
  }

  get(): T {
    return this.current;
  }

  set(value: T): void {
    const previous = this.current;
    this.current = value;
    this.journal.record(() => {
      this.current = previous;
    });
  }
}
