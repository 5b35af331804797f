import { Context, Effect, Either } from "effect";
import { describe, expect, it } from "vitest";
import { ResolutionError } from "../types/errors";
import { configs, inject, lookupFromContext, provide, registeredKeys, supply } from "./container";

const NameTag = Context.GenericTag<string>("Name");
const GreetingTag = Context.GenericTag<string>("Greeting");
const CountTag = Context.GenericTag<number>("Count");
const ATag = Context.GenericTag<string>("A");
const BTag = Context.GenericTag<string>("B");

const run = <A>(effect: Effect.Effect<A, ResolutionError>) => Effect.runSync(Effect.either(effect));

describe("dependency container", () => {
  it("should resolve supplied constants and provider outputs", () => {
    const config = configs(
      supply(NameTag, "node"),
      provide(GreetingTag, (lookup) => Effect.map(lookup(NameTag), (name) => `hello ${name}`)),
    );

    const result = run(inject(config, (lookup) => lookup(GreetingTag)));

    expect(result).toEqual(Either.right("hello node"));
  });

  it("should run each provider at most once per injection", () => {
    let calls = 0;
    const config = configs(
      provide(CountTag, () =>
        Effect.sync(() => {
          calls += 1;
          return 7;
        }),
      ),
      provide(ATag, (lookup) => Effect.map(lookup(CountTag), (n) => `a${n}`)),
      provide(BTag, (lookup) => Effect.map(lookup(CountTag), (n) => `b${n}`)),
    );

    const result = run(
      inject(config, (lookup) => Effect.all([lookup(ATag), lookup(BTag), lookup(CountTag)])),
    );

    expect(result).toEqual(Either.right(["a7", "b7", 7]));
    expect(calls).toBe(1);
  });

  it("should fail with missing and the requiring path when a dependency has no registration", () => {
    const config = provide(GreetingTag, (lookup) => lookup(NameTag));

    const result = run(inject(config, (lookup) => lookup(GreetingTag)));

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left.reason).toBe("missing");
      expect(result.left.dependency).toBe("Name");
      expect(result.left.path).toEqual(["Greeting", "Name"]);
      expect(result.left.message).toBe("no provider for Name (required by Greeting)");
    }
  });

  it("should reject duplicate registrations before running any provider", () => {
    let ran = false;
    const config = configs(
      supply(NameTag, "first"),
      provide(GreetingTag, () =>
        Effect.sync(() => {
          ran = true;
          return "hi";
        }),
      ),
      supply(NameTag, "second"),
    );

    const result = run(inject(config, (lookup) => lookup(GreetingTag)));

    expect(Either.isLeft(result) && result.left.reason).toBe("duplicate");
    expect(Either.isLeft(result) && result.left.dependency).toBe("Name");
    expect(ran).toBe(false);
  });

  it("should detect cycles", () => {
    const config = configs(
      provide(ATag, (lookup) => lookup(BTag)),
      provide(BTag, (lookup) => lookup(ATag)),
    );

    const result = run(inject(config, (lookup) => lookup(ATag)));

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left.reason).toBe("cycle");
      expect(result.left.path).toEqual(["A", "B", "A"]);
      expect(result.left.message).toBe("dependency cycle: A -> B -> A");
    }
  });

  it("should wrap provider failures with the dependency name and keep the cause", () => {
    const boom = new Error("disk on fire");
    const config = configs(
      provide(ATag, () => Effect.fail(boom)),
      provide(BTag, (lookup) => lookup(ATag)),
    );

    const result = run(inject(config, (lookup) => lookup(BTag)));

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left).toBeInstanceOf(ResolutionError);
      expect(result.left.reason).toBe("provider-failed");
      expect(result.left.dependency).toBe("A");
      expect(result.left.path).toEqual(["B", "A"]);
      expect(result.left.message).toBe("provider for A failed: disk on fire");
      expect(result.left.cause).toBe(boom);
    }
  });

  it("should turn exceptions thrown by a provider into resolution errors", () => {
    const thrown = new Error("keystore locked");
    const config = configs(
      provide(ATag, () => {
        throw thrown;
      }),
      provide(BTag, () =>
        Effect.sync((): string => {
          throw new Error("bad entropy");
        }),
      ),
      provide(NameTag, (lookup) => lookup(ATag)),
    );

    const direct = run(inject(config, (lookup) => lookup(NameTag)));
    const inEffect = run(inject(config, (lookup) => lookup(BTag)));

    expect(Either.isLeft(direct) && direct.left).toMatchObject({
      _tag: "ResolutionError",
      dependency: "A",
      reason: "provider-failed",
      path: ["Name", "A"],
      message: "provider for A failed: keystore locked",
    });
    expect(Either.isLeft(direct) && direct.left.cause).toBe(thrown);
    expect(Either.isLeft(inEffect) && inEffect.left).toMatchObject({
      dependency: "B",
      reason: "provider-failed",
      path: ["B"],
      message: "provider for B failed: bad entropy",
    });
  });

  it("should never hand a partial selection to the caller", () => {
    const config = supply(NameTag, "node");
    let selected = false;

    const result = run(
      inject(config, (lookup) =>
        Effect.all([lookup(NameTag), lookup(CountTag)]).pipe(
          Effect.tap(() =>
            Effect.sync(() => {
              selected = true;
            }),
          ),
        ),
      ),
    );

    expect(Either.isLeft(result) && result.left.dependency).toBe("Count");
    expect(selected).toBe(false);
  });

  it("should list registered keys in order", () => {
    expect(registeredKeys(configs(supply(NameTag, "n"), provide(CountTag, () => Effect.succeed(1))))).toEqual([
      "Name",
      "Count",
    ]);
  });

  it("should answer lookups from a populated context", () => {
    const lookup = lookupFromContext(Context.make(NameTag, "stub"));

    expect(Effect.runSync(lookup(NameTag))).toBe("stub");
    const missing = Effect.runSync(Effect.either(lookup(CountTag)));
    expect(Either.isLeft(missing) && missing.left.reason).toBe("missing");
  });
});
