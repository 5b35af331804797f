import chalk from "chalk";
import { Effect, Option } from "effect";
import { describe, expect, it } from "vitest";
import { BufferSink } from "../testing/buffer-sink";
import { createStreamLogger, formatJsonLine, formatPrettyLine, parseLogLevel } from "./logger";

const time = new Date("2024-05-01T12:00:00.000Z");
const plain = new chalk.Instance({ level: 0 });

describe("StreamLoggerService", () => {
  it("should drop entries below its level", () => {
    const sink = new BufferSink();
    const logger = createStreamLogger(sink, { level: "warn", now: () => time });

    Effect.runSync(logger.info("hidden"));
    Effect.runSync(logger.warn("shown"));

    expect(sink.lines()).toEqual(["2024-05-01T12:00:00.000Z WRN shown"]);
  });

  it("should write one JSON object per line", () => {
    const sink = new BufferSink();
    const logger = createStreamLogger(sink, { format: "json", now: () => time }).withModule("builder");

    Effect.runSync(logger.info("resolved", { modules: 2 }));

    expect(JSON.parse(sink.text())).toEqual({
      time: "2024-05-01T12:00:00.000Z",
      level: "info",
      module: "builder",
      msg: "resolved",
      modules: 2,
    });
  });

  it("should keep the level and sink when deriving a module logger", () => {
    const sink = new BufferSink();
    const logger = createStreamLogger(sink, { level: "debug", now: () => time });

    Effect.runSync(logger.withModule("server").debug("tick"));

    expect(logger.withModule("server").level).toBe("debug");
    expect(sink.lines()).toEqual(["2024-05-01T12:00:00.000Z DBG [server] tick"]);
  });
});

describe("formatPrettyLine", () => {
  it("should render metadata as key=value pairs", () => {
    const line = formatPrettyLine(
      { time, level: "error", message: "failed", module: "cli", meta: { file: "app.toml", reason: "bad value" } },
      plain,
    );

    expect(line).toBe('2024-05-01T12:00:00.000Z ERR [cli] failed file=app.toml reason="bad value"\n');
  });
});

describe("formatJsonLine", () => {
  it("should serialise bigint metadata as strings", () => {
    expect(formatJsonLine({ time, level: "debug", message: "m", meta: { n: 5n } })).toBe(
      '{"time":"2024-05-01T12:00:00.000Z","level":"debug","msg":"m","n":"5"}\n',
    );
  });
});

describe("parseLogLevel", () => {
  it("should accept common aliases", () => {
    expect(parseLogLevel("WARNING")).toEqual(Option.some("warn"));
    expect(parseLogLevel("trace")).toEqual(Option.some("debug"));
    expect(parseLogLevel("loud")).toEqual(Option.none());
  });
});
