import { describe, test, expect, beforeEach } from "vitest";
import { createApp } from "../../src/app";
import type { MemoryStore } from "../../src/db/memory.store";
import { seedPlayers, seedPosts } from "../../src/db/seed";
import { MetricsCollector } from "../../src/monitoring/metrics";
import { BrokenStore, storeWith } from "../fixtures/store";
import { MemoryRateLimitStore } from "../fixtures/rateLimit";

describe("Integration Tests - HTTP API", () => {
  let store: MemoryStore;
  let metrics: MetricsCollector;
  let app: ReturnType<typeof createApp>;

  beforeEach(async () => {
    store = await storeWith({ posts: seedPosts, players: seedPlayers });
    metrics = new MetricsCollector();
    app = createApp({ store, metrics });
  });

  const post = (path: string) => app.request(path, { method: "POST" });

  describe("GET /post/{id}", () => {
    test("should return the post", async () => {
      const res = await app.request("/post/1");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        post_id: 1,
        title: "Example blog post",
        content: "Hello! This is a blog post",
        views: 0,
      });
    });

    test("should return 404 for an unknown post", async () => {
      const res = await app.request("/post/999");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Post 999 not found" });
    });

    test("should return 400 for an id that is not a number", async () => {
      const res = await app.request("/post/abc");

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "id: Expected number, received nan",
      });
    });

    test("should return 400 for a non-positive id", async () => {
      const res = await app.request("/post/0");

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "id: Number must be greater than 0",
      });
    });
  });

  describe("POST /view/{id}", () => {
    test("should count the view and return the new total", async () => {
      const first = await post("/view/1");
      const second = await post("/view/1");

      expect(first.status).toBe(200);
      expect(await first.json()).toEqual({ current_views: 1 });
      expect(await second.json()).toEqual({ current_views: 2 });
    });

    test("should be reflected by GET /post/{id}", async () => {
      await post("/view/1");

      const res = await app.request("/post/1");
      expect(await res.json()).toMatchObject({ views: 1 });
    });

    test("should return 404 for an unknown post", async () => {
      const res = await post("/view/999");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Post 999 not found" });
    });

    test("should not accept GET", async () => {
      const res = await app.request("/view/1");

      expect(res.status).toBe(404);
    });
  });

  describe("GET /player/{id}", () => {
    test("should return the player", async () => {
      const res = await app.request("/player/1");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        name: "Alice",
        money: 1000,
        level: 1,
      });
    });

    test("should return 404 for an unknown player", async () => {
      const res = await app.request("/player/999");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Player 999 not found" });
    });
  });

  describe("POST /upgrade/{id}", () => {
    test("should buy a level", async () => {
      const res = await post("/upgrade/1");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ user_id: 1, money: 850, level: 2 });
    });

    test("should answer { error } once the money runs out", async () => {
      for (let i = 0; i < 6; i++) {
        await post("/upgrade/1");
      }

      const res = await post("/upgrade/1");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ error: "Not enough money" });

      const player = await app.request("/player/1");
      expect(await player.json()).toEqual({
        name: "Alice",
        money: 100,
        level: 7,
      });
    });

    test("should return 404 for an unknown player", async () => {
      const res = await post("/upgrade/999");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Player 999 not found" });
    });
  });

  describe("Error handling", () => {
    test("should turn store failures into a 500", async () => {
      const broken = createApp({
        store: new BrokenStore(),
        metrics: new MetricsCollector(),
      });

      const res = await broken.request("/post/1");

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: "Internal Server Error" });
    });
  });

  describe("Service endpoints", () => {
    test("GET / should describe the service", async () => {
      const res = await app.request("/");

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        service: "Race-safe counters",
        status: "running",
      });
    });

    test("GET /doc should list every route", async () => {
      const res = await app.request("/doc");
      const doc = await res.json();

      expect(res.status).toBe(200);
      expect(doc).toMatchObject({
        openapi: "3.0.0",
        paths: {
          "/post/{id}": { get: expect.any(Object) },
          "/view/{id}": { post: expect.any(Object) },
          "/player/{id}": { get: expect.any(Object) },
          "/upgrade/{id}": { post: expect.any(Object) },
        },
      });
    });

    test("GET /metrics should expose view counts", async () => {
      await post("/view/1");

      const res = await app.request("/metrics");
      const lines = (await res.text()).split("\n");

      expect(res.status).toBe(200);
      expect(lines).toContain('post_views_total{post_id="1"} 1');
    });

    test("should label request metrics by route, not by id", async () => {
      for (let id = 1000; id < 1050; id++) {
        await app.request(`/player/${id}`);
      }

      const { counters, histograms } = metrics.exportJSON();

      expect(Object.keys(counters)).toEqual([
        'http_requests_total{method="GET",path="/player/:id",status="404"}',
        'http_errors_total{method="GET",path="/player/:id",status="404"}',
      ]);
      expect(Object.keys(histograms)).toEqual([
        'http_request_duration_ms{method="GET",path="/player/:id"}',
      ]);
      expect(
        metrics.counterValue("http_requests_total", {
          method: "GET",
          path: "/player/:id",
          status: "404",
        }),
      ).toBe(50);
    });

    test("GET /metrics/ready should ping the store", async () => {
      const res = await app.request("/metrics/ready");

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: "ready" });
    });

    test("GET /metrics/ready should answer 503 when the store is down", async () => {
      const broken = createApp({
        store: new BrokenStore(),
        metrics: new MetricsCollector(),
      });

      const res = await broken.request("/metrics/ready");

      expect(res.status).toBe(503);
      expect(await res.json()).toMatchObject({ status: "unavailable" });
    });

    test("GET /metrics/live should answer", async () => {
      const res = await app.request("/metrics/live");

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: "alive" });
    });
  });

  describe("Rate limiting", () => {
    test("should answer 429 past the configured limit", async () => {
      const limited = createApp({
        store,
        metrics: new MetricsCollector(),
        rateLimit: { store: new MemoryRateLimitStore(), windowMs: 1000, max: 2 },
      });

      await limited.request("/post/1");
      await limited.request("/post/1");
      const res = await limited.request("/post/1");

      expect(res.status).toBe(429);
      expect(await res.json()).toEqual({ error: "Too many requests" });
    });
  });
});
