import { createRoute, z } from "@hono/zod-openapi";
import type { PlayerService } from "../services/player.service";
import { createRouter, ErrorSchema, IdParamsSchema } from "./common";

const PlayerSchema = z
  .object({
    name: z.string(),
    money: z.number().int(),
    level: z.number().int(),
  })
  .openapi("Player");

const UpgradeSchema = z
  .object({
    user_id: z.number().int(),
    money: z.number().int(),
    level: z.number().int(),
  })
  .openapi("Upgrade");

const getPlayerRoute = createRoute({
  method: "get",
  path: "/player/{id}",
  tags: ["shop"],
  request: {
    params: IdParamsSchema,
  },
  responses: {
    200: {
      content: {
        "application/json": {
          schema: PlayerSchema,
        },
      },
      description: "Current state of the player",
    },
    400: {
      content: {
        "application/json": {
          schema: ErrorSchema,
        },
      },
      description: "Invalid player id",
    },
    404: {
      content: {
        "application/json": {
          schema: ErrorSchema,
        },
      },
      description: "Player not found",
    },
  },
});

const upgradeRoute = createRoute({
  method: "post",
  path: "/upgrade/{id}",
  tags: ["shop"],
  request: {
    params: IdParamsSchema,
  },
  responses: {
    200: {
      content: {
        "application/json": {
          schema: z.union([UpgradeSchema, ErrorSchema]),
        },
      },
      description:
        "Level bought, or { error } when the player cannot afford it",
    },
    400: {
      content: {
        "application/json": {
          schema: ErrorSchema,
        },
      },
      description: "Invalid player id",
    },
    404: {
      content: {
        "application/json": {
          schema: ErrorSchema,
        },
      },
      description: "Player not found",
    },
  },
});

export function createShopRoutes(players: PlayerService) {
  const shopRoutes = createRouter();

  shopRoutes.openapi(getPlayerRoute, async (c) => {
    const { id } = c.req.valid("param");
    const player = await players.getPlayer(id);

    return c.json(
      { name: player.name, money: player.money, level: player.level },
      200,
    );
  });

  shopRoutes.openapi(upgradeRoute, async (c) => {
    const { id } = c.req.valid("param");
    const result = await players.upgrade(id);

    // A refused purchase is a normal answer, not a transport error
    if (result.status === "rejected") {
      return c.json({ error: result.reason }, 200);
    }

    const { player } = result;
    return c.json(
      { user_id: player.id, money: player.money, level: player.level },
      200,
    );
  });

  return shopRoutes;
}
