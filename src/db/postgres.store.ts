import postgres from "postgres";
import { DuplicateRowError } from "../errors";
import { logger } from "../utils/logger";
import type { DebitChange, NumericField, TableName, Tables } from "../types";
import { parseRow } from "./schema";
import type { Store } from "./store";

const UNIQUE_VIOLATION = "23505";

export class PostgresStore implements Store {
  constructor(private readonly sql: postgres.Sql) {}

  async migrate(): Promise<void> {
    await this.sql`
      CREATE TABLE IF NOT EXISTS posts (
        id INTEGER PRIMARY KEY,
        title VARCHAR(255) NOT NULL,
        content TEXT NOT NULL,
        views BIGINT NOT NULL DEFAULT 0
      )
    `;

    await this.sql`
      CREATE TABLE IF NOT EXISTS players (
        id INTEGER PRIMARY KEY,
        name VARCHAR(255) NOT NULL,
        money INTEGER NOT NULL DEFAULT 0,
        level INTEGER NOT NULL DEFAULT 1
      )
    `;

    logger.debug("Schema is up to date");
  }

  async insert<T extends TableName>(table: T, row: Tables[T]): Promise<void> {
    const name: string = table;
    const values: Record<string, string | number> = { ...row };

    try {
      await this.sql`INSERT INTO ${this.sql(name)} ${this.sql(values)}`;
    } catch (err) {
      if (
        err instanceof postgres.PostgresError &&
        err.code === UNIQUE_VIOLATION
      ) {
        throw new DuplicateRowError(table, row.id);
      }
      throw err;
    }
  }

  async findById<T extends TableName>(
    table: T,
    id: number,
  ): Promise<Tables[T] | undefined> {
    const name: string = table;
    const rows = await this.sql`
      SELECT * FROM ${this.sql(name)} WHERE id = ${id}
    `;

    const row = rows.at(0);
    return row ? parseRow(table, row) : undefined;
  }

  async increment<T extends TableName>(
    table: T,
    id: number,
    field: NumericField<T>,
    delta: number,
  ): Promise<number> {
    const name: string = table;
    const column: string = field;

    const result = await this.sql`
      UPDATE ${this.sql(name)}
      SET ${this.sql(column)} = ${this.sql(column)} + ${delta}
      WHERE id = ${id}
    `;

    return result.count;
  }

  async debit<T extends TableName>(
    table: T,
    id: number,
    change: DebitChange<T>,
  ): Promise<number> {
    const name: string = table;
    const balance: string = change.balance;
    const counter: string = change.counter;

    // The balance check lives in the WHERE clause of the same statement,
    // so no other debit can run between the check and the write.
    const result = await this.sql`
      UPDATE ${this.sql(name)}
      SET ${this.sql(balance)} = ${this.sql(balance)} - ${change.cost},
          ${this.sql(counter)} = ${this.sql(counter)} + 1
      WHERE id = ${id} AND ${this.sql(balance)} >= ${change.cost}
    `;

    return result.count;
  }

  async ping(): Promise<void> {
    await this.sql`SELECT 1`;
  }

  async close(): Promise<void> {
    await this.sql.end({ timeout: 5 });
  }
}
