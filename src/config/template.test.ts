import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";
import { renderTemplate, tomlLiteral } from "./template";

describe("tomlLiteral", () => {
  it("should encode scalars", () => {
    expect(tomlLiteral("tcp://0.0.0.0:26656")).toBe('"tcp://0.0.0.0:26656"');
    expect(tomlLiteral('say "hi"')).toBe('"say \\"hi\\""');
    expect(tomlLiteral(42)).toBe("42");
    expect(tomlLiteral(10n)).toBe("10");
    expect(tomlLiteral(false)).toBe("false");
  });

  it("should encode arrays of scalars", () => {
    expect(tomlLiteral(["a", 1])).toBe('["a", 1]');
  });

  it("should have no literal for objects, null and non-finite numbers", () => {
    expect(tomlLiteral({ a: 1 })).toBeUndefined();
    expect(tomlLiteral(null)).toBeUndefined();
    expect(tomlLiteral(Number.NaN)).toBeUndefined();
    expect(tomlLiteral(["a", { b: 1 }])).toBeUndefined();
  });
});

describe("renderTemplate", () => {
  it("should replace placeholders with the values at their paths", () => {
    const template = "name = {{ .name }}\n[p2p]\nladdr = {{.p2p.laddr}}\n";

    const rendered = Effect.runSync(
      renderTemplate("config.toml", template, { name: "val-1", p2p: { laddr: "tcp://0.0.0.0:1" } }),
    );

    expect(rendered).toBe('name = "val-1"\n[p2p]\nladdr = "tcp://0.0.0.0:1"\n');
  });

  it("should fail on the first placeholder without a value", () => {
    const result = Effect.runSync(
      Effect.either(renderTemplate("app.toml", "a = {{ .missing }}\nb = {{ .other }}\n", {})),
    );

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left.file).toBe("app.toml");
      expect(result.left.field).toBe("missing");
      expect(result.left.message).toBe('template placeholder "missing" has no renderable value');
    }
  });
});
