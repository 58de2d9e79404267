import { DuplicateRowError } from "../errors";
import type { DebitChange, NumericField, TableName, Tables } from "../types";
import { parseRow } from "./schema";
import type { Store } from "./store";

type StoredRow = Record<string, string | number>;

/**
 * In-process Store used by the tests.
 *
 * Each call first yields to the event loop, standing in for the network
 * round-trip, and then applies its whole effect synchronously. A single
 * call therefore behaves like one SQL statement: nothing else can run
 * between its read of a value and its write.
 */
export class MemoryStore implements Store {
  private readonly tables: Record<TableName, Map<number, StoredRow>> = {
    posts: new Map(),
    players: new Map(),
  };

  private closed = false;

  async migrate(): Promise<void> {
    await this.roundTrip();
  }

  async insert<T extends TableName>(table: T, row: Tables[T]): Promise<void> {
    await this.roundTrip();
    const rows = this.tables[table];
    if (rows.has(row.id)) {
      throw new DuplicateRowError(table, row.id);
    }
    rows.set(row.id, { ...row });
  }

  /**
   * Unconditional write of a whole row, as an ORM `save()` would issue.
   * Used to set up fixtures and to reproduce lost updates.
   */
  async put<T extends TableName>(table: T, row: Tables[T]): Promise<void> {
    await this.roundTrip();
    this.tables[table].set(row.id, { ...row });
  }

  async findById<T extends TableName>(
    table: T,
    id: number,
  ): Promise<Tables[T] | undefined> {
    await this.roundTrip();
    const row = this.tables[table].get(id);
    return row ? parseRow(table, row) : undefined;
  }

  async increment<T extends TableName>(
    table: T,
    id: number,
    field: NumericField<T>,
    delta: number,
  ): Promise<number> {
    await this.roundTrip();
    const row = this.tables[table].get(id);
    if (!row) return 0;

    row[field] = readNumber(row, field) + delta;
    return 1;
  }

  async debit<T extends TableName>(
    table: T,
    id: number,
    change: DebitChange<T>,
  ): Promise<number> {
    await this.roundTrip();
    const row = this.tables[table].get(id);
    if (!row) return 0;

    const balance = readNumber(row, change.balance);
    if (balance < change.cost) return 0;

    row[change.balance] = balance - change.cost;
    row[change.counter] = readNumber(row, change.counter) + 1;
    return 1;
  }

  async ping(): Promise<void> {
    await this.roundTrip();
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private roundTrip(): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error("Store is closed"));
    }
    return new Promise((resolve) => setImmediate(resolve));
  }
}

function readNumber(row: StoredRow, field: string): number {
  const value = row[field];
  if (typeof value !== "number") {
    throw new TypeError(`Column ${field} is not numeric`);
  }
  return value;
}
