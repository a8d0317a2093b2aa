export type ItemId = number;

export interface Item {
  id: ItemId;          // assigned by the store, never reused
  name: string;
  description: string | null;
  price: number;
  is_available: boolean;
}

// Write inputs never carry an id
export type ItemInput = Omit<Item, 'id'>;
