import Fastify from "fastify";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { registerHealthRoutes } from "../src/health";

describe("health routes without a readiness check", () => {
  const app = Fastify();

  beforeAll(async () => {
    await registerHealthRoutes(app);
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  test("GET /health", async () => {
    const response = await app.inject({ method: "GET", url: "/health" });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: "ok" });
  });

  test("GET /ready", async () => {
    const response = await app.inject({ method: "GET", url: "/ready" });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: "ready" });
  });
});

test("GET /ready reports a failing dependency", async () => {
  const app = Fastify();
  await registerHealthRoutes(app, async () => {
    throw new Error("database unreachable");
  });

  const response = await app.inject({ method: "GET", url: "/ready" });

  expect(response.statusCode).toBe(503);
  expect(response.json()).toEqual({ status: "unavailable", message: "database unreachable" });
  await app.close();
});
