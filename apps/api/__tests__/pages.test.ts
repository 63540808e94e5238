/**
 * Page Routes E2E Tests
 *
 * /pages CRUD through app.inject() against a real MutationCoordinator.
 */

import { describe, it, expect, jest, beforeEach, afterEach } from "@jest/globals";
import { OTHER_ID, OWNER_ID, bearer, createTestApp, type TestContext } from "./helpers.js";

const OGP = {
  title: "Launch",
  image: "https://cdn.example.com/launch.png",
  description: "Our launch page",
};

describe("Page Routes", () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestApp();
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  async function createPage(payload: object, userId = OWNER_ID) {
    return ctx.app.inject({
      method: "POST",
      url: "/pages",
      headers: { authorization: bearer(userId) },
      payload,
    });
  }

  // ==========================================================================
  // POST /pages
  // ==========================================================================

  describe("POST /pages", () => {
    it("should create a page and cache its URL", async () => {
      const res = await createPage({ url: "https://example.com/a" });

      expect(res.statusCode).toBe(201);
      expect(res.json()).toEqual({
        success: true,
        data: {
          id: 1,
          slug: "abc234",
          shortUrl: "https://sp.test/abc234",
          url: "https://example.com/a",
          ownerId: OWNER_ID,
          createdAt: "2024-06-01T10:00:00.000Z",
          ogp: null,
        },
      });
      expect(await ctx.redis.get("sp:v1:url:abc234")).toBe("https://example.com/a");
      expect(await ctx.redis.get("sp:v1:ogp:abc234")).toBeNull();
    });

    it("should create a page with OGP", async () => {
      const res = await createPage({ url: "https://example.com/a", ogp: OGP });

      expect(res.statusCode).toBe(201);
      expect(res.json().data.ogp).toEqual(OGP);
      expect(await ctx.redis.get("sp:v1:ogp:abc234")).toBe("1");
    });

    it("should treat a null OGP as none", async () => {
      const res = await createPage({ url: "https://example.com/a", ogp: null });

      expect(res.statusCode).toBe(201);
      expect(res.json().data.ogp).toBeNull();
    });

    it("should reject a missing url", async () => {
      const res = await createPage({});

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ success: false, error: "url: Required", code: "BAD_REQUEST" });
    });

    it("should reject an incomplete OGP", async () => {
      const res = await createPage({ url: "https://example.com/a", ogp: { title: "Launch" } });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ success: false, error: "ogp.image: Required", code: "BAD_REQUEST" });
    });

    it("should reject a non-http destination", async () => {
      const res = await createPage({ url: "ftp://files.example.com/a" });

      expect(res.statusCode).toBe(422);
      expect(res.json()).toEqual({
        success: false,
        error: "url must use http or https",
        code: "VALIDATION",
      });
      expect(ctx.redis.keys()).toEqual([]);
    });

    it("should reject malformed JSON", async () => {
      const res = await ctx.app.inject({
        method: "POST",
        url: "/pages",
        headers: { authorization: bearer(OWNER_ID), "content-type": "application/json" },
        payload: "{not json",
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ success: false, code: "BAD_REQUEST" });
    });

    it("should hide store failures", async () => {
      jest.spyOn(ctx.store, "createPage").mockRejectedValue(new Error("connection refused"));

      const res = await createPage({ url: "https://example.com/a" });

      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({ success: false, error: "Internal server error", code: "STORE_FAILURE" });
    });
  });

  // ==========================================================================
  // GET /pages
  // ==========================================================================

  describe("GET /pages", () => {
    it("should list only the caller's pages, newest first", async () => {
      await createPage({ url: "https://example.com/first" });
      await createPage({ url: "https://example.com/other" }, OTHER_ID);
      await createPage({ url: "https://example.com/second" });

      const res = await ctx.app.inject({
        method: "GET",
        url: "/pages",
        headers: { authorization: bearer(OWNER_ID) },
      });

      expect(res.statusCode).toBe(200);
      const slugs = res.json().data.map((page: { slug: string }) => page.slug);
      expect(slugs).toEqual(["ghk892", "abc234"]);
    });
  });

  // ==========================================================================
  // GET /pages/:slug
  // ==========================================================================

  describe("GET /pages/:slug", () => {
    beforeEach(async () => {
      await createPage({ url: "https://example.com/a", ogp: OGP });
    });

    it("should return the owner's page", async () => {
      const res = await ctx.app.inject({
        method: "GET",
        url: "/pages/abc234",
        headers: { authorization: bearer(OWNER_ID) },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().data).toMatchObject({ slug: "abc234", url: "https://example.com/a", ogp: OGP });
    });

    it("should forbid other users", async () => {
      const res = await ctx.app.inject({
        method: "GET",
        url: "/pages/abc234",
        headers: { authorization: bearer(OTHER_ID) },
      });

      expect(res.statusCode).toBe(403);
      expect(res.json()).toEqual({
        success: false,
        error: 'page "abc234" belongs to another user',
        code: "FORBIDDEN",
      });
    });

    it("should answer 404 for an unknown slug", async () => {
      const res = await ctx.app.inject({
        method: "GET",
        url: "/pages/zzz999",
        headers: { authorization: bearer(OWNER_ID) },
      });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ success: false, error: 'page "zzz999" not found', code: "NOT_FOUND" });
    });
  });

  // ==========================================================================
  // PUT|PATCH /pages/:slug
  // ==========================================================================

  describe("PUT /pages/:slug", () => {
    beforeEach(async () => {
      await createPage({ url: "https://example.com/a" });
    });

    it("should replace the URL in store and cache", async () => {
      const res = await ctx.app.inject({
        method: "PUT",
        url: "/pages/abc234",
        headers: { authorization: bearer(OWNER_ID) },
        payload: { url: "https://example.com/b" },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().data).toMatchObject({ slug: "abc234", url: "https://example.com/b", ogp: null });
      expect((await ctx.store.findPageBySlug("abc234"))?.url).toBe("https://example.com/b");
      expect(await ctx.redis.get("sp:v1:url:abc234")).toBe("https://example.com/b");
    });

    it("should accept PATCH as well", async () => {
      const res = await ctx.app.inject({
        method: "PATCH",
        url: "/pages/abc234",
        headers: { authorization: bearer(OWNER_ID) },
        payload: { url: "https://example.com/c", ogp: OGP },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().data.ogp).toEqual(OGP);
      expect(await ctx.redis.get("sp:v1:ogp:abc234")).toBe("1");
    });

    it("should drop the OGP when it is withheld", async () => {
      const headers = { authorization: bearer(OWNER_ID) };
      await ctx.app.inject({
        method: "PUT",
        url: "/pages/abc234",
        headers,
        payload: { url: "https://example.com/a", ogp: OGP },
      });

      const res = await ctx.app.inject({
        method: "PUT",
        url: "/pages/abc234",
        headers,
        payload: { url: "https://example.com/a" },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().data.ogp).toBeNull();
      expect(await ctx.redis.get("sp:v1:ogp:abc234")).toBeNull();
      expect(await ctx.store.findOGPByID(1)).toBeNull();
    });

    it("should forbid other users and leave the page unchanged", async () => {
      const res = await ctx.app.inject({
        method: "PUT",
        url: "/pages/abc234",
        headers: { authorization: bearer(OTHER_ID) },
        payload: { url: "https://attacker.example.com" },
      });

      expect(res.statusCode).toBe(403);
      expect(res.json().code).toBe("FORBIDDEN");
      expect((await ctx.store.findPageBySlug("abc234"))?.url).toBe("https://example.com/a");
      expect(await ctx.redis.get("sp:v1:url:abc234")).toBe("https://example.com/a");
    });

    it("should answer 404 for an unknown slug", async () => {
      const res = await ctx.app.inject({
        method: "PUT",
        url: "/pages/zzz999",
        headers: { authorization: bearer(OWNER_ID) },
        payload: { url: "https://example.com/b" },
      });

      expect(res.statusCode).toBe(404);
      expect(res.json().code).toBe("NOT_FOUND");
    });

    it("should reject an invalid destination", async () => {
      const res = await ctx.app.inject({
        method: "PUT",
        url: "/pages/abc234",
        headers: { authorization: bearer(OWNER_ID) },
        payload: { url: "not a url" },
      });

      expect(res.statusCode).toBe(422);
      expect(res.json()).toEqual({ success: false, error: "url must be an absolute URL", code: "VALIDATION" });
    });
  });

  it("should answer unknown routes with 404", async () => {
    const res = await ctx.app.inject({ method: "DELETE", url: "/pages/abc234" });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      success: false,
      error: "Route DELETE /pages/abc234 not found",
      code: "NOT_FOUND",
    });
  });
});
