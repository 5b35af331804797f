import { Command } from "commander";
import { Option } from "effect";
import { describe, expect, it } from "vitest";
import { newNode } from "./node";

describe("Node", () => {
  it("should refuse to run without a root command", async () => {
    const node = newNode();

    expect(Option.isNone(node.rootCommand())).toBe(true);
    await expect(node.run(["node", "testd"])).rejects.toMatchObject({
      _tag: "InternalError",
      message: "node has no root command",
    });
  });

  it("should parse argv with the attached root command", async () => {
    const node = newNode();
    const seen: string[] = [];
    const root = new Command("testd");
    root.command("ping <target>").action((target: string) => {
      seen.push(target);
    });
    node.setRootCommand(root);

    await node.run(["node", "testd", "ping", "peer-1"]);

    expect(Option.getOrThrow(node.rootCommand())).toBe(root);
    expect(seen).toEqual(["peer-1"]);
  });
});
