interface RecencyNode {
  key: string;
  newer: RecencyNode | null;
  older: RecencyNode | null;
}

/**
 * Keys ordered by last use, most recent first.
 *
 * A doubly-linked list indexed by key, so touching or removing a key never scans the list.
 */
export class RecencyList {
  private readonly index = new Map<string, RecencyNode>();
  private head: RecencyNode | null = null;
  private tail: RecencyNode | null = null;

  get size(): number {
    return this.index.size;
  }

  has(key: string): boolean {
    return this.index.has(key);
  }

  /** Moves `key` to the front, inserting it if it is not listed yet. */
  touch(key: string): void {
    const existing = this.index.get(key);
    if (existing) {
      if (existing === this.head) {
        return;
      }
      this.unlink(existing);
      this.pushFront(existing);
      return;
    }

    const node: RecencyNode = { key, newer: null, older: null };
    this.index.set(key, node);
    this.pushFront(node);
  }

  remove(key: string): boolean {
    const node = this.index.get(key);
    if (!node) {
      return false;
    }

    this.unlink(node);
    this.index.delete(key);
    return true;
  }

  leastRecent(): string | undefined {
    return this.tail?.key;
  }

  clear(): void {
    this.index.clear();
    this.head = null;
    this.tail = null;
  }

  keys(): string[] {
    const ordered: string[] = [];
    for (let node = this.head; node; node = node.older) {
      ordered.push(node.key);
    }
    return ordered;
  }

  private pushFront(node: RecencyNode): void {
    node.newer = null;
    node.older = this.head;
    if (this.head) {
      this.head.newer = node;
    }
    this.head = node;
    if (!this.tail) {
      this.tail = node;
    }
  }

  private unlink(node: RecencyNode): void {
    if (node.newer) {
      node.newer.older = node.older;
    } else {
      this.head = node.older;
    }

    if (node.older) {
      node.older.newer = node.newer;
    } else {
      this.tail = node.newer;
    }

    node.newer = null;
    node.older = null;
  }
}
