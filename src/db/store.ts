import type { DebitChange, NumericField, TableName, Tables } from "../types";

/**
 * Persistence port for the services.
 *
 * Every mutating operation is a single statement evaluated by the store
 * against the row's current value, never against a value the caller read
 * earlier. The update methods resolve to the number of rows they touched.
 */
export interface Store {
  /** Create the tables if they do not exist yet */
  migrate(): Promise<void>;

  /** Rejects with DuplicateRowError when the id is taken */
  insert<T extends TableName>(table: T, row: Tables[T]): Promise<void>;

  findById<T extends TableName>(
    table: T,
    id: number,
  ): Promise<Tables[T] | undefined>;

  /** `SET field = field + delta WHERE id = ?` */
  increment<T extends TableName>(
    table: T,
    id: number,
    field: NumericField<T>,
    delta: number,
  ): Promise<number>;

  /**
   * `SET balance = balance - cost, counter = counter + 1
   *  WHERE id = ? AND balance >= cost`
   */
  debit<T extends TableName>(
    table: T,
    id: number,
    change: DebitChange<T>,
  ): Promise<number>;

  ping(): Promise<void>;

  close(): Promise<void>;
}

// The fetch is a second round-trip: it may already include increments
// made by other callers after ours.
export async function incrementAndFetch<T extends TableName>(
  store: Store,
  table: T,
  id: number,
  field: NumericField<T>,
  delta: number = 1,
): Promise<Tables[T] | undefined> {
  const updated = await store.increment(table, id, field, delta);
  if (updated === 0) return undefined;

  return store.findById(table, id);
}
