import "reflect-metadata";
import { describe, it, expect } from "vitest";
import { Inject, annotate, getAnnotations, getInjectMetadata } from "../../src/decorators/inject";
import { SignatureInspector } from "../../src/signature/inspector";
import { wraps } from "../../src/signature/callables";
import { inject } from "../../src/injection-point";

/* eslint-disable @typescript-eslint/no-unused-vars */

class OrderService {
  constructor(
    readonly logger: unknown,
    @Inject("database", { config: { pool: "orders" } }) readonly db: unknown,
  ) {}
}

class OrderController {
  show(@Inject("request") req: unknown, id: string, @Inject("format") format = "json") {
    return [req, id, format];
  }
}

describe("@Inject()", () => {
  const inspector = new SignatureInspector();

  it("should record constructor parameter points on the class", () => {
    const points = getInjectMetadata(OrderService);

    expect(points.get(1)?.equals(inject("database", { config: { pool: "orders" } }))).toBe(true);
    expect(points.has(0)).toBe(false);
  });

  it("should override the parameter name for constructor parameters", () => {
    const results = inspector.inspect(OrderService);

    expect(results.get("logger")?.equals(inject("logger"))).toBe(true);
    expect(results.get("db")?.name).toBe("database");
    expect(results.get("db")?.config).toEqual({ pool: "orders" });
  });

  it("should record method parameter points on the method function", () => {
    const points = getInjectMetadata(OrderController.prototype.show);

    expect([...points.keys()].sort()).toEqual([0, 2]);
  });

  it("should inject decorated optional method parameters", () => {
    const results = inspector.inspect(OrderController.prototype.show);

    expect([...results.keys()]).toEqual(["req", "id", "format"]);
    expect(results.get("req")?.name).toBe("request");
    expect(results.get("format")?.name).toBe("format");
  });
});

describe("annotate()", () => {
  const inspector = new SignatureInspector();

  it("should record points by parameter name and return the callable", () => {
    const report = (db: unknown, range: unknown) => [db, range];

    const annotated = annotate(report, { range: inject("dateRange", { config: { days: 7 } }) });

    expect(annotated).toBe(report);
    expect(getAnnotations(report).get("range")?.name).toBe("dateRange");
  });

  it("should turn optional parameters into injection points", () => {
    const handler = annotate((db: unknown, limit = 10) => [db, limit], {
      limit: inject("pageSize"),
    });

    const results = inspector.inspect(handler);

    expect([...results.keys()]).toEqual(["db", "limit"]);
    expect(results.get("limit")?.name).toBe("pageSize");
  });

  it("should take precedence over an inject() default", () => {
    const handler = annotate((cache = inject("memory")) => cache, { cache: inject("redis") });

    expect(inspector.inspect(handler).get("cache")?.name).toBe("redis");
  });

  it("should merge with earlier annotations", () => {
    const handler = (a: unknown, b: unknown) => [a, b];
    annotate(handler, { a: inject("first") });
    annotate(handler, { b: inject("second") });

    const results = inspector.inspect(handler);

    expect(results.get("a")?.name).toBe("first");
    expect(results.get("b")?.name).toBe("second");
  });

  it("should annotate the original callable behind a wrapper", () => {
    const handler = (store: unknown) => store;
    const wrapper = wraps((...args: unknown[]) => Reflect.apply(handler, undefined, args), handler);

    annotate(wrapper, { store: inject("sessionStore") });

    expect(getAnnotations(handler).get("store")?.name).toBe("sessionStore");
    expect(inspector.inspect(wrapper).get("store")?.name).toBe("sessionStore");
  });
});
