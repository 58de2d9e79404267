import { OpenAPIHono, z } from "@hono/zod-openapi";

export const IdParamsSchema = z.object({
  id: z.coerce
    .number()
    .int()
    .positive()
    .openapi({ param: { name: "id", in: "path" }, example: 1 }),
});

export const ErrorSchema = z
  .object({
    error: z.string(),
  })
  .openapi("Error");

// Validation failures answer with the same { error } shape as every other failure
export function createRouter() {
  return new OpenAPIHono({
    defaultHook: (result, c) => {
      if (!result.success) {
        const error = result.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; ");
        return c.json({ error }, 400);
      }
    },
  });
}
