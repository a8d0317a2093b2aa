import type { ItemId } from './types';

/** Flattened zod issues, keyed by the offending payload field. */
export interface ValidationDetail {
  formErrors: string[];
  fieldErrors: Partial<Record<string, string[]>>;
}

export class ItemStoreError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'ItemStoreError';
  }
}

export class ItemNotFoundError extends ItemStoreError {
  public constructor(public readonly id: ItemId) {
    super(`item ${id} not found`);
    this.name = 'ItemNotFoundError';
  }
}

export class ItemValidationError extends ItemStoreError {
  public constructor(public readonly issues: ValidationDetail) {
    super('item payload failed validation');
    this.name = 'ItemValidationError';
  }
}
