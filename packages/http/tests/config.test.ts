import { describe, it, expect } from "vitest";
import { readAppConfig } from "../src/config";

describe("readAppConfig", () => {
  it("should read ARGWIRE_APP_ variables only", () => {
    const config = readAppConfig({
      ARGWIRE_APP_DB__URL: "postgres://localhost/test",
      ARGWIRE_APP_PAGE_SIZE: "20",
      ARGWIRE_LOG_LEVEL: "debug",
      HOME: "/root",
    });

    expect(config).toEqual({ "db.url": "postgres://localhost/test", page_size: "20" });
  });

  it("should skip the bare prefix", () => {
    expect(readAppConfig({ ARGWIRE_APP_: "x" })).toEqual({});
  });
});
