// ─────────────────────────────────────────────
// AsyncQueue — unbounded FIFO whose get() waits for a put()
// ─────────────────────────────────────────────

export class AsyncQueue<T> {
  private items: T[] = [];
  private getters: Array<(item: T) => void> = [];

  put(item: T): void {
    const getter = this.getters.shift();
    if (getter) {
      getter(item);
    } else {
      this.items.push(item);
    }
  }

  get(): Promise<T> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.splice(0, 1)[0]);
    }
    return new Promise((resolve) => this.getters.push(resolve));
  }

  /** Items waiting to be taken. */
  size(): number {
    return this.items.length;
  }

  /** Consumers currently blocked in get(). */
  waiting(): number {
    return this.getters.length;
  }

  drain(): T[] {
    const rest = this.items;
    this.items = [];
    return rest;
  }
}
