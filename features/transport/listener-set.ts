import type { Logger } from "@/features/logging";

/**
 * Set of subscribers. A throwing listener is logged and does not stop
 * delivery to the others.
 */
export class ListenerSet<T> {
  private listeners = new Set<(value: T) => void>();

  constructor(private readonly log?: Logger) {}

  add(listener: (value: T) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(value: T): void {
    this.listeners.forEach((fn) => {
      try {
        fn(value);
      } catch (e) {
        this.log?.error(`Event listener error: ${e instanceof Error ? e.message : String(e)}`);
      }
    });
  }

  get size(): number {
    return this.listeners.size;
  }

  clear(): void {
    this.listeners.clear();
  }
}
