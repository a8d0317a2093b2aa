import { itemInputSchema } from '../schemas/item';
import { ItemNotFoundError, ItemValidationError } from '../errors';
import type { ItemStorageBackend } from '../contracts/itemStorage';
import type { Item, ItemId, ItemInput } from '../types';

/**
 * Implements `ItemStorageBackend` on a process-local Map.
 *
 * Mutations go through a single-writer queue, so each create/update/delete runs
 * as one step after the previous one settles. Records are copied on the way out;
 * nothing outside the store holds a reference to them.
 */
export class MemoryItemStorage implements ItemStorageBackend {
  private readonly items = new Map<ItemId, Item>();
  private nextId: ItemId = 1;
  private writeQueue: Promise<unknown> = Promise.resolve();

  async list() {
    return Array.from(this.items.values(), (item) => ({ ...item }));
  }

  async get(id: ItemId) {
    return { ...this.require(id) };
  }

  async size() {
    return this.items.size;
  }

  create(payload: unknown): Promise<Item> {
    return this.enqueue(() => {
      const input = this.validate(payload);
      const item: Item = { id: this.nextId, ...input };
      this.nextId += 1;
      this.items.set(item.id, item);
      return { ...item };
    });
  }

  update(id: ItemId, payload: unknown): Promise<Item> {
    return this.enqueue(() => {
      this.require(id);
      const input = this.validate(payload);
      const updated: Item = { id, ...input };
      // Map.set on an existing key keeps its insertion position
      this.items.set(id, updated);
      return { ...updated };
    });
  }

  delete(id: ItemId): Promise<Item> {
    return this.enqueue(() => {
      const existing = this.require(id);
      this.items.delete(id);
      return { ...existing };
    });
  }

  private enqueue<T>(mutation: () => T): Promise<T> {
    const run = this.writeQueue.then(mutation);
    // the caller sees the rejection through `run`; the queue moves on
    this.writeQueue = run.catch(() => undefined);
    return run;
  }

  private require(id: ItemId): Item {
    const item = this.items.get(id);
    if (!item) throw new ItemNotFoundError(id);
    return item;
  }

  private validate(payload: unknown): ItemInput {
    const parsed = itemInputSchema.safeParse(payload);
    if (!parsed.success) throw new ItemValidationError(parsed.error.flatten());
    return parsed.data;
  }
}
