// ingest/collection.ts — Id-keyed item collection with an explicit last-write-wins policy.

import type { Logger } from "../config/logger.js";
import type { Item, ItemRole } from "./item.js";

/**
 * Items keyed by id. Adding an item whose id is already present replaces the earlier
 * item in place (it keeps the original position) and logs a warning. This happens when an
 * `include` path yields the same id as the regular scan.
 */
export class ItemCollection {
  private readonly items = new Map<string, Item>();

  constructor(
    readonly role: ItemRole,
    private readonly log?: Logger,
  ) {}

  /** Insert an item. Returns the item it replaced, if any. */
  add(item: Item): Item | undefined {
    const previous = this.items.get(item.id);
    if (previous) {
      this.log?.warn({ id: item.id, role: this.role }, "Duplicate item id, replacing earlier item");
    }
    this.items.set(item.id, item);
    return previous;
  }

  get size(): number {
    return this.items.size;
  }

  /** Read-only view handed to the rendering stage. */
  toMap(): ReadonlyMap<string, Item> {
    return new Map(this.items);
  }
}
