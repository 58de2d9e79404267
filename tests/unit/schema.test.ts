import { describe, test, expect } from "vitest";
import { ZodError } from "zod";
import { parseRow } from "../../src/db/schema";

describe("parseRow()", () => {
  const post = {
    id: 1,
    title: "Test post",
    content: "Test content",
  };

  test("should read a BIGINT counter sent as a string", () => {
    expect(parseRow("posts", { ...post, views: "9007199254740991" })).toEqual({
      ...post,
      views: 9007199254740991,
    });
  });

  test("should refuse a counter that a number cannot hold exactly", () => {
    expect(() =>
      parseRow("posts", { ...post, views: "9007199254740993" }),
    ).toThrow(ZodError);
  });

  test("should drop columns it does not know", () => {
    expect(
      parseRow("players", {
        id: "2",
        name: "Bob",
        money: 10,
        level: 3,
        created_at: "2024-01-01",
      }),
    ).toEqual({ id: 2, name: "Bob", money: 10, level: 3 });
  });
});
