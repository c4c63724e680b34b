/**
 * Lazily computed value derived from an object's backing node. Cleared by
 * the owner whenever the backing node is replaced by a different instance.
 */
export class CachedValue<T> {
  private state: { value: T } | null = null;

  constructor(private readonly compute: () => T) {}

  get value(): T {
    if (this.state === null) {
      this.state = { value: this.compute() };
    }
    return this.state.value;
  }

  get isCached(): boolean {
    return this.state !== null;
  }

  clear(): void {
    this.state = null;
  }
}
