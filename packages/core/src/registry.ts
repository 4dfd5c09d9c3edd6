import type { Unsubscribable } from "rxjs";

/**
 * In-flight calls issued through the callback and stream forms of one dispatcher.
 *
 * Entries are removed when their call completes or when `cancelAll` runs.
 * Cancelling an entry stops delivery of its outcome; whether the network
 * request is also aborted is up to the transport.
 */
export class PendingCallRegistry {
  private readonly entries = new Set<Unsubscribable>();

  get size(): number {
    return this.entries.size;
  }

  add(entry: Unsubscribable): void {
    this.entries.add(entry);
  }

  remove(entry: Unsubscribable): boolean {
    return this.entries.delete(entry);
  }

  has(entry: Unsubscribable): boolean {
    return this.entries.has(entry);
  }

  /** Cancels every tracked call and empties the registry. Returns how many were cancelled. */
  cancelAll(): number {
    const cancelled = [...this.entries];
    this.entries.clear();
    for (const entry of cancelled) {
      entry.unsubscribe();
    }
    return cancelled.length;
  }
}
