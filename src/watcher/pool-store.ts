import { createPool, findNode, type NodePool } from "../proxy/node.js";

export interface InstallResult {
  previous: NodePool | null;
  carried: number;
  selectionDropped: boolean;
}

/**
 * Holds the current node pool and the cached backend selection.
 *
 * Readers take `current()` once and work on that snapshot; `install` replaces
 * it with a single reference assignment, so a reader never sees a mix of two
 * refreshes. Every mutation here is synchronous.
 */
export class PoolStore {
  private pool: NodePool | null = null;

  private selection: string | null = null;

  current(): NodePool | null {
    return this.pool;
  }

  /**
   * Nodes that survive a refresh keep the previous pool's health record
   * object, so a probe round still working on the old snapshot writes
   * results the new pool sees.
   */
  install(next: NodePool): InstallResult {
    const previous = this.pool;
    let carried = 0;
    let shared = false;
    const nodes = next.nodes.map((node) => {
      const old = findNode(previous, node.name);
      if (!old) return node;
      shared = true;
      if (old.health.checkedAt != null) carried += 1;
      return { ...node, health: old.health };
    });
    this.pool =
      !shared && Object.isFrozen(next) && Object.isFrozen(next.nodes)
        ? next
        : createPool(nodes, next.source, next.fetchedAt);
    const selectionDropped = this.selection != null && !findNode(this.pool, this.selection);
    if (selectionDropped) this.selection = null;
    return { previous, carried, selectionDropped };
  }

  active(): string | null {
    return this.selection;
  }

  /** Records what the backend reported; names outside the pool are cached as none. */
  setActive(name: string | null): void {
    this.selection = name && findNode(this.pool, name) ? name : null;
  }

  contains(name: string): boolean {
    return findNode(this.pool, name) !== undefined;
  }
}
