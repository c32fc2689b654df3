/**
 * Terrain mana: per-tile reserves of each mana type, drained by gathering
 * and refilled over time.
 */

export interface ManaPool {
  amount: number;
  readonly capacity: number;
}

/** A tile and mana type awaiting replenishment. */
export interface ManaTileRef {
  readonly x: number;
  readonly y: number;
  readonly type: string;
}

function tileKey(x: number, y: number): string {
  return `${x},${y}`;
}

function refKey(x: number, y: number, type: string): string {
  return `${x},${y},${type}`;
}

export class ManaField {
  private readonly tiles = new Map<string, Map<string, ManaPool>>();
  private readonly pending = new Map<string, ManaTileRef>();

  /** Create or replace the pool of `type` on tile (x, y). */
  setTile(x: number, y: number, type: string, amount: number, capacity: number): void {
    const key = tileKey(x, y);
    let pools = this.tiles.get(key);
    if (!pools) {
      pools = new Map();
      this.tiles.set(key, pools);
    }
    pools.set(type, { amount: Math.min(amount, capacity), capacity });
  }

  /** Pools of a tile, keyed by mana type. */
  tile(x: number, y: number): ReadonlyMap<string, ManaPool> | undefined {
    return this.tiles.get(tileKey(x, y));
  }

  markForReplenishment(x: number, y: number, type: string): void {
    this.pending.set(refKey(x, y, type), { x, y, type });
  }

  unmark(ref: ManaTileRef): void {
    this.pending.delete(refKey(ref.x, ref.y, ref.type));
  }

  /** Tiles marked for replenishment, in marking order. */
  pendingReplenishment(): ManaTileRef[] {
    return [...this.pending.values()];
  }

  clear(): void {
    this.tiles.clear();
    this.pending.clear();
  }
}
