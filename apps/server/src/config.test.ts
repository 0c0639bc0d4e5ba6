import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      dataDir: "./data",
      dbPath: path.join(path.resolve("./data"), "takeout.db"),
      port: 8787,
      host: "127.0.0.1",
      logLevel: "info",
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({ TAKEOUT_DATA_DIR: "/srv/takeout", PORT: "9000", HOST: "0.0.0.0", LOG_LEVEL: "debug" });

    expect(config.dbPath).toBe(path.join("/srv/takeout", "takeout.db"));
    expect(config.port).toBe(9000);
    expect(config.host).toBe("0.0.0.0");
    expect(config.logLevel).toBe("debug");
  });

  it("rejects a port that is not a number", () => {
    expect(() => loadConfig({ PORT: "eighty" })).toThrow(/^invalid environment: PORT: /);
  });
});
