import express from "express";
import request from "supertest";
import { describe, expect, it } from "vitest";
import { createRateLimiter } from "../src/middleware/rateLimit";
import { MutableClock } from "./helpers";

function limitedApp(clock: MutableClock) {
  const limiter = createRateLimiter(60_000, 2, clock);
  const app = express();
  app.set("trust proxy", true);
  app.get("/limited", limiter, (_req, res) => {
    res.json({ ok: true });
  });
  return { app, limiter };
}

describe("rate limiter", () => {
  it("answers 429 with Retry-After once a client exhausts its window", async () => {
    const clock = new MutableClock();
    const { app } = limitedApp(clock);

    await request(app).get("/limited").set("X-Forwarded-For", "10.0.0.1").expect(200);
    await request(app).get("/limited").set("X-Forwarded-For", "10.0.0.1").expect(200);
    const res = await request(app).get("/limited").set("X-Forwarded-For", "10.0.0.1");

    expect(res.status).toBe(429);
    expect(res.headers["retry-after"]).toBe("60");
    expect(res.body.error.code).toBe("RateLimited");
  });

  it("opens a fresh window after the old one expires", async () => {
    const clock = new MutableClock();
    const { app } = limitedApp(clock);
    for (let i = 0; i < 2; i += 1) {
      await request(app).get("/limited").set("X-Forwarded-For", "10.0.0.1");
    }

    clock.advanceMinutes(1);
    await request(app).get("/limited").set("X-Forwarded-For", "10.0.0.1").expect(200);
  });

  it("drops windows of clients that have gone quiet", async () => {
    const clock = new MutableClock();
    const { app, limiter } = limitedApp(clock);

    await request(app).get("/limited").set("X-Forwarded-For", "10.0.0.1");
    await request(app).get("/limited").set("X-Forwarded-For", "10.0.0.2");
    expect(limiter.trackedClients()).toBe(2);

    clock.advanceMinutes(2);
    await request(app).get("/limited").set("X-Forwarded-For", "10.0.0.3");
    expect(limiter.trackedClients()).toBe(1);
  });
});
