import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import type { ClumContext } from "../../src/services/clum.service.js";
import { AUTH, makeTestApp } from "../helpers/app.js";
import { wad } from "../helpers/clum.js";

describe("bucket routes", () => {
  let app: FastifyInstance;
  let ctx: ClumContext;

  beforeEach(async () => {
    ({ app, ctx } = await makeTestApp());
  });

  afterEach(async () => {
    await app.close();
  });

  it("GET /api/buckets lists the grid with tails", async () => {
    const res = await app.inject({ method: "GET", url: "/api/buckets" });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body).toMatchObject({
      centerPrice: "2000",
      bucketWidth: "100",
      numBuckets: 7,
      spotPrice: "2000",
      needsRebalance: false,
      rebalanceThreshold: "0.1",
      oracleFresh: true,
    });
    expect(body.buckets[0]).toEqual({ index: 0, lower: "0", upper: "1750", midpoint: "875" });
    expect(body.buckets[6]).toEqual({ index: 6, lower: "2250", upper: null, midpoint: "3125" });
  });

  it("GET /api/buckets/index resolves a price to its bucket", async () => {
    const res = await app.inject({ method: "GET", url: "/api/buckets/index?price=1750" });
    expect(res.json()).toEqual({ price: "1750", index: 1, lower: "1750", upper: "1850", midpoint: "1800" });
  });

  it("GET /api/buckets/index rejects negative prices", async () => {
    const res = await app.inject({ method: "GET", url: "/api/buckets/index?price=-1" });
    expect(res.statusCode).toBe(400);
  });

  describe("POST /api/buckets/recenter", () => {
    it("requires the position manager key", async () => {
      const res = await app.inject({ method: "POST", url: "/api/buckets/recenter", payload: { newCenter: "2100" } });
      expect(res.statusCode).toBe(403);
      expect(ctx.registry.getCenterPrice()).toBe(wad(2000));
    });

    it("recenters on an explicit price", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/api/buckets/recenter",
        headers: AUTH,
        payload: { newCenter: "2100" },
      });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ recentered: true, oldCenter: "2000", newCenter: "2100" });
      expect(ctx.registry.getCenterPrice()).toBe(wad(2100));
    });

    it("does nothing without drift when no center is given", async () => {
      const res = await app.inject({ method: "POST", url: "/api/buckets/recenter", headers: AUTH });
      expect(res.statusCode).toBe(200);
      expect(res.json().recentered).toBe(false);
      expect(res.json().oldCenter).toBeUndefined();
    });

    it("rebalances onto spot once it has drifted", async () => {
      ctx.spot.setSpotPrice(wad(2300));
      const res = await app.inject({ method: "POST", url: "/api/buckets/recenter", headers: AUTH, payload: {} });
      expect(res.json()).toMatchObject({ recentered: true, oldCenter: "2000", newCenter: "2300" });
    });

    it("maps invalid geometry to 400", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/api/buckets/recenter",
        headers: AUTH,
        payload: { newCenter: "100" },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().reason).toBe("INVALID_GEOMETRY");
    });
  });
});
