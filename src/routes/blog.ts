import { createRoute, z } from "@hono/zod-openapi";
import type { PostService } from "../services/post.service";
import { createRouter, ErrorSchema, IdParamsSchema } from "./common";

const PostSchema = z
  .object({
    post_id: z.number().int(),
    title: z.string(),
    content: z.string(),
    views: z.number().int(),
  })
  .openapi("Post");

const ViewSchema = z
  .object({
    current_views: z.number().int(),
  })
  .openapi("View");

const getPostRoute = createRoute({
  method: "get",
  path: "/post/{id}",
  tags: ["blog"],
  request: {
    params: IdParamsSchema,
  },
  responses: {
    200: {
      content: {
        "application/json": {
          schema: PostSchema,
        },
      },
      description: "Current state of the post",
    },
    400: {
      content: {
        "application/json": {
          schema: ErrorSchema,
        },
      },
      description: "Invalid post id",
    },
    404: {
      content: {
        "application/json": {
          schema: ErrorSchema,
        },
      },
      description: "Post not found",
    },
  },
});

const viewPostRoute = createRoute({
  method: "post",
  path: "/view/{id}",
  tags: ["blog"],
  request: {
    params: IdParamsSchema,
  },
  responses: {
    200: {
      content: {
        "application/json": {
          schema: ViewSchema,
        },
      },
      description: "View counted",
    },
    400: {
      content: {
        "application/json": {
          schema: ErrorSchema,
        },
      },
      description: "Invalid post id",
    },
    404: {
      content: {
        "application/json": {
          schema: ErrorSchema,
        },
      },
      description: "Post not found",
    },
  },
});

export function createBlogRoutes(posts: PostService) {
  const blogRoutes = createRouter();

  blogRoutes.openapi(getPostRoute, async (c) => {
    const { id } = c.req.valid("param");
    const post = await posts.getPost(id);

    return c.json(
      {
        post_id: post.id,
        title: post.title,
        content: post.content,
        views: post.views,
      },
      200,
    );
  });

  blogRoutes.openapi(viewPostRoute, async (c) => {
    const { id } = c.req.valid("param");
    const currentViews = await posts.view(id);

    return c.json({ current_views: currentViews }, 200);
  });

  return blogRoutes;
}
