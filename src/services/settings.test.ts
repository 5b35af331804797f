import { Option } from "effect";
import { describe, expect, it } from "vitest";
import { envVariableName, SettingsStoreImpl } from "./settings";

describe("SettingsStore", () => {
  it("should get nested values using dot notation", () => {
    const settings = new SettingsStoreImpl({ engine: { "rpc-dial-url": "http://localhost:8551" } }, {});

    expect(settings.get("engine.rpc-dial-url")).toEqual(Option.some("http://localhost:8551"));
    expect(settings.get("engine.missing")).toEqual(Option.none());
    expect(settings.has("engine")).toBe(true);
  });

  it("should set values, creating intermediate objects", () => {
    const settings = new SettingsStoreImpl({}, {});

    settings.set("logger.log-level", "debug");

    expect(settings.snapshot()).toEqual({ logger: { "log-level": "debug" } });
  });

  it("should deep-merge documents, later values winning", () => {
    const settings = new SettingsStoreImpl({ p2p: { laddr: "tcp://0.0.0.0:1", peers: "" } }, {});

    settings.merge({ p2p: { laddr: "tcp://0.0.0.0:2" }, moniker: "val" });

    expect(settings.snapshot()).toEqual({
      p2p: { laddr: "tcp://0.0.0.0:2", peers: "" },
      moniker: "val",
    });
  });

  it("should not share state with the objects it was given", () => {
    const initial = { logger: { style: "pretty" } };
    const settings = new SettingsStoreImpl(initial, {});

    settings.set("logger.style", "json");
    const snapshot = settings.snapshot();
    snapshot["moniker"] = "changed";

    expect(initial.logger.style).toBe("pretty");
    expect(settings.has("moniker")).toBe(false);
  });

  it("should prefer prefixed environment variables once a prefix is set", () => {
    const settings = new SettingsStoreImpl(
      { logger: { "log-level": "info" } },
      { NODED_LOGGER_LOG_LEVEL: "debug" },
    );

    expect(settings.getString("logger.log-level", "warn")).toBe("info");
    settings.setEnvPrefix("NODED");
    expect(settings.getString("logger.log-level", "warn")).toBe("debug");
  });

  it("should fall back when a value is missing or not a string", () => {
    const settings = new SettingsStoreImpl({ "halt-height": 10 }, {});

    expect(settings.getString("halt-height", "none")).toBe("none");
    expect(settings.getString("absent", "none")).toBe("none");
  });
});

describe("envVariableName", () => {
  it("should upper-case and map dots and dashes to underscores", () => {
    expect(envVariableName("nodekitd", "engine.rpc-dial-url")).toBe("NODEKITD_ENGINE_RPC_DIAL_URL");
  });
});
