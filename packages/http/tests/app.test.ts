import { describe, it, expect, beforeEach, vi } from "vitest";
import type { AppLogger } from "@argwire/types";
import { HttpApp, type Plugin, type Route } from "../src/app";
import { BadRequestException } from "../src/errors";
import { response } from "../src/context";
import { mockRequest } from "../src/testing";
import { createMockLogger } from "./helpers";

describe("HttpApp", () => {
  let logger: AppLogger;
  let app: HttpApp;

  beforeEach(() => {
    logger = createMockLogger();
    app = new HttpApp({ config: {}, logger });
  });

  // -----------------------------------------------------------------------
  // Results
  // -----------------------------------------------------------------------

  describe("handle", () => {
    it("should send strings as plain text", async () => {
      app.get("/ping", () => "pong");

      const res = await app.handle(mockRequest("GET", "/ping"));

      expect(res).toEqual({
        status: 200,
        headers: { "content-type": "text/plain; charset=utf-8" },
        body: "pong",
      });
    });

    it("should send other values as JSON", async () => {
      app.get("/orders", async () => [{ id: 1 }]);

      const res = await app.handle(mockRequest("GET", "/orders"));

      expect(res.headers["content-type"]).toBe("application/json");
      expect(res.body).toBe('[{"id":1}]');
    });

    it("should leave the response as the handler built it for undefined", async () => {
      app.post("/orders", () => {
        response.status = 204;
      });

      const res = await app.handle(mockRequest("POST", "/orders"));

      expect(res).toEqual({ status: 204, headers: {} });
    });

    it("should keep a content type set by the handler", async () => {
      app.get("/report", () => {
        response.setHeader("Content-Type", "text/csv");
        return "a,b";
      });

      const res = await app.handle(mockRequest("GET", "/report"));

      expect(res.headers).toEqual({ "content-type": "text/csv" });
    });

    it("should answer 404 for unknown routes", async () => {
      app.get("/orders", () => "orders");

      const missing = await app.handle(mockRequest("GET", "/missing"));
      const wrongMethod = await app.handle(mockRequest("POST", "/orders"));

      expect(missing.status).toBe(404);
      expect(missing.body).toBe('{"message":"No handler found for GET /missing"}');
      expect(wrongMethod.status).toBe(404);
    });

    it("should map HTTP exceptions to their status", async () => {
      app.post("/orders", () => {
        throw new BadRequestException("Invalid order", { field: "qty" });
      });

      const res = await app.handle(mockRequest("POST", "/orders"));

      expect(res).toEqual({
        status: 400,
        headers: { "content-type": "application/json" },
        body: '{"message":"Invalid order","details":{"field":"qty"}}',
      });
    });

    it("should answer 500 and log other errors", async () => {
      app.get("/fail", async () => {
        throw new Error("boom");
      });

      const res = await app.handle(mockRequest("GET", "/fail"));

      expect(res.status).toBe(500);
      expect(res.body).toBe('{"message":"Internal Server Error"}');
      expect(logger.error).toHaveBeenCalledWith(
        "Unhandled error in route handler",
        expect.objectContaining({ error: "boom" }),
      );
    });

    it("should log with the request id", async () => {
      app.get("/ping", () => "pong");

      await app.handle(mockRequest("GET", "/ping", { requestId: "req-1" }));

      expect(logger.withContext).toHaveBeenCalledWith({ requestId: "req-1" });
    });

    it("should tag the request logger with the matched route", async () => {
      app.get("/orders/{id}", () => "order");

      await app.handle(mockRequest("GET", "/orders/7"));

      expect(logger.withContext).toHaveBeenCalledWith({ route: "GET /orders/{id}" });
    });

    it("should log handler errors through the route-tagged logger", async () => {
      const routeLogger = createMockLogger();
      const requestLogger: AppLogger = { ...createMockLogger(), withContext: vi.fn(() => routeLogger) };
      const root: AppLogger = { ...createMockLogger(), withContext: vi.fn(() => requestLogger) };
      const tagged = new HttpApp({ config: {}, logger: root });
      tagged.get("/fail", () => {
        throw new Error("boom");
      });

      await tagged.handle(mockRequest("GET", "/fail"));

      expect(requestLogger.withContext).toHaveBeenCalledWith({ route: "GET /fail" });
      expect(routeLogger.error).toHaveBeenCalledWith(
        "Unhandled error in route handler",
        expect.objectContaining({ error: "boom" }),
      );
      expect(root.error).not.toHaveBeenCalled();
    });

    it("should answer 400 for malformed path parameters", async () => {
      app.get("/files/{name}", () => "file");

      const res = await app.handle(mockRequest("GET", "/files/%E0%A4%A"));

      expect(res.status).toBe(400);
      expect(res.body).toBe('{"message":"Malformed path segment \\"%E0%A4%A\\""}');
    });
  });

  // -----------------------------------------------------------------------
  // Routes
  // -----------------------------------------------------------------------

  describe("route", () => {
    it("should join the app prefix to every route", async () => {
      const prefixed = new HttpApp({ config: {}, logger, prefix: "/api/v1" });
      prefixed.get("/health", () => "ok");

      const res = await prefixed.handle(mockRequest("GET", "/api/v1/health"));

      expect(prefixed.getRoutes().map((r) => r.path)).toEqual(["/api/v1/health"]);
      expect(res.body).toBe("ok");
    });
  });

  // -----------------------------------------------------------------------
  // Plugins
  // -----------------------------------------------------------------------

  describe("install", () => {
    function recordingPlugin(applied: string[]): Plugin {
      return {
        name: "recording",
        setup: vi.fn(),
        apply: (handler, route: Route) => {
          applied.push(route.path);
          return handler;
        },
      };
    }

    it("should set the plugin up with the app", () => {
      const plugin = recordingPlugin([]);

      app.install(plugin);

      expect(plugin.setup).toHaveBeenCalledWith(app);
    });

    it("should apply plugins to existing and later routes", () => {
      const applied: string[] = [];
      app.get("/a", () => "a");

      app.install(recordingPlugin(applied));
      app.get("/b", () => "b");

      expect(applied).toEqual(["/a", "/b"]);
    });

    it("should call the handler returned by the plugin", async () => {
      app.install({
        name: "upper",
        apply: (handler) => () => String(handler()).toUpperCase(),
      });
      app.get("/ping", () => "pong");

      const res = await app.handle(mockRequest("GET", "/ping"));

      expect(res.body).toBe("PONG");
    });
  });
});
