import type { Item, ItemId } from '../types';

/**
 * Storage backend the item routes rely on.
 *
 * Payloads are accepted as `unknown`: the backend owns validation, rejecting with
 * `ItemValidationError` before anything is mutated. Operations on a missing id
 * reject with `ItemNotFoundError`.
 */
export interface ItemStorageBackend {
  /** All live items in insertion order. */
  list(): Promise<Item[]>;
  get(id: ItemId): Promise<Item>;
  create(payload: unknown): Promise<Item>;
  /** Replaces every field except `id`; the item keeps its position. */
  update(id: ItemId, payload: unknown): Promise<Item>;
  /** Resolves with the removed item. */
  delete(id: ItemId): Promise<Item>;
  size(): Promise<number>;
}
