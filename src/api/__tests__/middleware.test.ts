/**
 * Request ID middleware and error boundary tests.
 */
import { describe, expect, test, vi } from "vitest";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

// Import after mocks
import { errorHandler } from "../errorHandler.js";
import { requestIdMiddleware } from "../middleware/requestId.js";

function createTestApp(): Hono {
  const app = new Hono();
  app.use("*", requestIdMiddleware);
  app.onError(errorHandler);
  app.get("/ok", (c) => c.json({ requestId: c.get("requestId") }));
  app.get("/boom", () => {
    throw new Error("socket exploded");
  });
  app.get("/teapot", () => {
    throw new HTTPException(418, { message: "short and stout" });
  });
  return app;
}

describe("requestIdMiddleware", () => {
  test("propagates a well-formed x-request-id", async () => {
    const res = await createTestApp().request("/ok", {
      headers: { "x-request-id": "req-42" },
    });

    expect(res.headers.get("x-request-id")).toBe("req-42");
    expect(await res.json()).toEqual({ requestId: "req-42" });
  });

  test("generates an ID when none is sent", async () => {
    const res = await createTestApp().request("/ok");

    expect(res.headers.get("x-request-id")).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
    );
  });

  test("replaces an ID with unexpected characters", async () => {
    const res = await createTestApp().request("/ok", {
      headers: { "x-request-id": "<script>" },
    });

    expect(res.headers.get("x-request-id")).not.toBe("<script>");
  });
});

describe("errorHandler", () => {
  test("answers unhandled errors with 500 and the request ID", async () => {
    const res = await createTestApp().request("/boom", {
      headers: { "x-request-id": "req-7" },
    });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: "socket exploded",
      requestId: "req-7",
    });
  });

  test("keeps the status of an HTTPException", async () => {
    const res = await createTestApp().request("/teapot", {
      headers: { "x-request-id": "req-8" },
    });

    expect(res.status).toBe(418);
    expect(await res.json()).toEqual({
      error: "short and stout",
      requestId: "req-8",
    });
  });
});
