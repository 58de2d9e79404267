import { DuplicateRowError } from "../errors";
import type { Player, Post, TableName, Tables } from "../types";
import { logger } from "../utils/logger";
import type { Store } from "./store";

export const seedPosts: Post[] = [
  {
    id: 1,
    title: "Example blog post",
    content: "Hello! This is a blog post",
    views: 0,
  },
];

export const seedPlayers: Player[] = [
  { id: 1, name: "Alice", money: 1000, level: 1 },
];

// Safe to run on every boot: rows that already exist are left untouched.
export async function seed(store: Store): Promise<void> {
  for (const post of seedPosts) {
    await createOnce(store, "posts", post);
  }
  for (const player of seedPlayers) {
    await createOnce(store, "players", player);
  }
}

async function createOnce<T extends TableName>(
  store: Store,
  table: T,
  row: Tables[T],
): Promise<void> {
  try {
    await store.insert(table, row);
    logger.info({ table, id: row.id }, "Seed row created");
  } catch (err) {
    if (err instanceof DuplicateRowError) {
      logger.info({ table, id: row.id }, "Seed row already exists");
      return;
    }
    throw err;
  }
}
