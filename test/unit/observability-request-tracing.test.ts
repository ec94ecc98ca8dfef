import Fastify from "fastify";
import { describe, expect, it, vi } from "vitest";

const loggerMocks = vi.hoisted(() => ({
  logDebug: vi.fn(),
  logInfo: vi.fn(),
  logTrace: vi.fn()
}));

vi.mock("../../src/observability/logger.js", () => loggerMocks);

import {
  registerRequestTraceHooks,
  resolveRequestTraceMode,
  summarizeBody
} from "../../src/observability/request-tracing.js";

describe("observability/request-tracing", () => {
  it("prefers the explicit mode over the boolean flag", () => {
    expect(resolveRequestTraceMode({ REQUEST_TRACE_MODE: " TRACE ", REQUEST_TRACE: "false" })).toBe("trace");
    expect(resolveRequestTraceMode({ REQUEST_TRACE_MODE: "verbose", REQUEST_TRACE: "yes" })).toBe("debug");
    expect(resolveRequestTraceMode({})).toBe("off");
  });

  it("summarizes bodies without their content", () => {
    expect(summarizeBody(undefined)).toBeNull();
    expect(summarizeBody(null)).toEqual({ type: "null" });
    expect(summarizeBody("why is it hot?")).toEqual({ type: "string", length: 14 });
    expect(summarizeBody([1, 2])).toEqual({ type: "array", length: 2 });
    expect(summarizeBody({ query: "why is it hot?", language: "english" })).toEqual({
      type: "object",
      key_count: 2,
      keys: ["query", "language"]
    });
    expect(summarizeBody(42)).toEqual({ type: "number" });
  });

  it("adds no hooks when tracing is off", async () => {
    const app = Fastify();
    const addHook = vi.spyOn(app, "addHook");
    try {
      registerRequestTraceHooks(app, "off");

      expect(addHook).not.toHaveBeenCalled();
    } finally {
      await app.close();
    }
  });

  it("logs request lifecycle events in trace mode", async () => {
    const app = Fastify();
    registerRequestTraceHooks(app, "trace");
    app.post("/echo", async () => ({ ok: true }));
    try {
      const response = await app.inject({ method: "POST", url: "/echo", payload: { query: "why is it hot?" } });

      expect(response.statusCode).toBe(200);
      expect(loggerMocks.logInfo).toHaveBeenCalledWith("http.trace.enabled", {}, { mode: "trace", log_level: expect.any(String) });
      expect(loggerMocks.logTrace).toHaveBeenCalledWith(
        "http.request.pre_handler",
        { requestId: expect.any(String) },
        expect.objectContaining({
          method: "POST",
          url: "/echo",
          route: "/echo",
          body: { type: "object", key_count: 1, keys: ["query"] }
        })
      );
      expect(loggerMocks.logDebug).not.toHaveBeenCalled();
    } finally {
      await app.close();
    }
  });
});
