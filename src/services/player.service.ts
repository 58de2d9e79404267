import type { Store } from "../db/store";
import { NotFoundError } from "../errors";
import {
  metrics as defaultMetrics,
  trackUpgrade,
  type MetricsCollector,
} from "../monitoring/metrics";
import type { Player } from "../types";
import { logger } from "../utils/logger";

export const UPGRADE_COST = 150;

export const NOT_ENOUGH_MONEY = "Not enough money";

export type UpgradeResult =
  | { status: "upgraded"; player: Player }
  | { status: "rejected"; reason: typeof NOT_ENOUGH_MONEY };

export class PlayerService {
  constructor(
    private readonly store: Store,
    private readonly metrics: MetricsCollector = defaultMetrics,
  ) {}

  async getPlayer(id: number): Promise<Player> {
    const player = await this.store.findById("players", id);
    if (!player) throw new NotFoundError("Player", id);
    return player;
  }

  // Spend UPGRADE_COST for one level, in a single conditional statement
  async upgrade(id: number): Promise<UpgradeResult> {
    const updated = await this.store.debit("players", id, {
      balance: "money",
      cost: UPGRADE_COST,
      counter: "level",
    });

    if (updated === 0) {
      // Players are never deleted, so a lookup after the fact is enough to
      // tell an unknown id from an insufficient balance.
      const player = await this.store.findById("players", id);
      if (!player) throw new NotFoundError("Player", id);

      logger.warn(
        { playerId: id, money: player.money, cost: UPGRADE_COST },
        "Upgrade rejected",
      );
      trackUpgrade(this.metrics, "rejected");
      return { status: "rejected", reason: NOT_ENOUGH_MONEY };
    }

    const player = await this.getPlayer(id);
    trackUpgrade(this.metrics, "upgraded");
    logger.info(
      { playerId: id, money: player.money, level: player.level },
      "Player upgraded",
    );

    return { status: "upgraded", player };
  }
}
