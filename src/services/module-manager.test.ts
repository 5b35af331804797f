import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";
import { CHAIN_SPECS } from "../components/chain-spec";
import type { AppModule } from "../core/interfaces/module-manager";
import { GenesisError } from "../core/types/errors";
import { createModuleManager } from "./module-manager";

const chainSpec = CHAIN_SPECS.devnet;

function counterModule(name: string): AppModule {
  return {
    name,
    defaultGenesis: () => ({ count: 0 }),
    validateGenesis: (state) =>
      typeof state === "object" && state !== null && "count" in state
        ? Effect.void
        : Effect.fail(new GenesisError({ module: name, message: "count is required" })),
  };
}

const manager = Effect.runSync(createModuleManager([counterModule("alpha"), counterModule("beta")]));

describe("ModuleManager", () => {
  it("should keep registration order", () => {
    expect(manager.moduleNames()).toEqual(["alpha", "beta"]);
  });

  it("should build the default genesis keyed by module", () => {
    expect(manager.defaultGenesis(chainSpec)).toEqual({ alpha: { count: 0 }, beta: { count: 0 } });
  });

  it("should accept its own default genesis", () => {
    expect(Effect.runSync(Effect.either(manager.validateGenesis(manager.defaultGenesis(chainSpec), chainSpec)))).toEqual(
      Either.right(undefined),
    );
  });

  it("should reject sections of unknown modules", () => {
    const result = Effect.runSync(
      Effect.either(manager.validateGenesis({ alpha: { count: 0 }, beta: { count: 0 }, gamma: {} }, chainSpec)),
    );

    expect(Either.isLeft(result) && result.left.message).toBe(
      'genesis contains a section for unregistered module "gamma"',
    );
  });

  it("should reject a missing section", () => {
    const result = Effect.runSync(Effect.either(manager.validateGenesis({ alpha: { count: 0 } }, chainSpec)));

    expect(Either.isLeft(result) && result.left.message).toBe('genesis is missing the "beta" section');
  });

  it("should run module validation", () => {
    const result = Effect.runSync(
      Effect.either(manager.validateGenesis({ alpha: { count: 0 }, beta: {} }, chainSpec)),
    );

    expect(Either.isLeft(result) && result.left.module).toBe("beta");
  });

  it("should refuse duplicate module names", () => {
    const result = Effect.runSync(Effect.either(createModuleManager([counterModule("alpha"), counterModule("alpha")])));

    expect(Either.isLeft(result) && result.left.message).toBe('module "alpha" is registered twice');
  });
});
