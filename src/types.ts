import type { z } from "zod";
import type { playerSchema, postSchema } from "./db/schema";

export type Post = z.infer<typeof postSchema>;

export type Player = z.infer<typeof playerSchema>;

export type Tables = {
  posts: Post;
  players: Player;
};

export type TableName = keyof Tables;

// Integer columns of a table that may be mutated in place (everything but the id)
export type NumericField<T extends TableName> = {
  [K in keyof Tables[T]]: K extends "id"
    ? never
    : Tables[T][K] extends number
      ? K
      : never;
}[keyof Tables[T]] &
  string;

export interface DebitChange<T extends TableName> {
  balance: NumericField<T>;
  cost: number;
  counter: NumericField<T>;
}
