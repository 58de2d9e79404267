import { incrementAndFetch, type Store } from "../db/store";
import { NotFoundError } from "../errors";
import {
  metrics as defaultMetrics,
  trackView,
  type MetricsCollector,
} from "../monitoring/metrics";
import type { Post } from "../types";
import { logger } from "../utils/logger";

export class PostService {
  constructor(
    private readonly store: Store,
    private readonly metrics: MetricsCollector = defaultMetrics,
  ) {}

  async getPost(id: number): Promise<Post> {
    const post = await this.store.findById("posts", id);
    if (!post) throw new NotFoundError("Post", id);
    return post;
  }

  // Count a view and report the counter as it stands afterwards
  async view(id: number): Promise<number> {
    const post = await incrementAndFetch(this.store, "posts", id, "views");
    if (!post) throw new NotFoundError("Post", id);

    trackView(this.metrics, id);
    logger.debug({ postId: id, views: post.views }, "Post viewed");

    return post.views;
  }
}
