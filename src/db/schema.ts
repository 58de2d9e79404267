import { z } from "zod";
import type { TableName, Tables } from "../types";

// BIGINT columns come back from postgres as strings, hence the coercion.
// Counts past Number.MAX_SAFE_INTEGER fail to parse instead of rounding.
export const postSchema = z.object({
  id: z.coerce.number().int(),
  title: z.string().max(255),
  content: z.string().max(4096),
  views: z.coerce
    .number()
    .int()
    .nonnegative()
    .max(Number.MAX_SAFE_INTEGER),
});

export const playerSchema = z.object({
  id: z.coerce.number().int(),
  name: z.string().max(255),
  money: z.coerce.number().int(),
  level: z.coerce.number().int(),
});

export const rowSchemas: { [T in TableName]: z.ZodType<Tables[T]> } = {
  posts: postSchema,
  players: playerSchema,
};

export function parseRow<T extends TableName>(
  table: T,
  row: Record<string, unknown>,
): Tables[T] {
  return rowSchemas[table].parse(row);
}
