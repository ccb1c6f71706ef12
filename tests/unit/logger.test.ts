import { describe, expect, it } from "vitest";
import { type LogSink, createLogger } from "../../src/infrastructure/logging/logger.js";
import { stripAnsi } from "../../src/shared/ansi.js";

const captureSink = () => {
  const out: string[] = [];
  const err: string[] = [];
  const sink: LogSink = { out: (line) => out.push(line), err: (line) => err.push(line) };
  return { sink, out, err };
};

const parseLine = (line: string | undefined): Record<string, unknown> => JSON.parse(line ?? "{}");

describe("Logger: JSON format", () => {
  it("writes one JSON line per entry", () => {
    const { sink, out } = captureSink();
    createLogger("info", {}, "json", sink).info("test message", { key: "value" });

    expect(out).toHaveLength(1);
    expect(out[0]?.endsWith("\n")).toBe(true);

    const parsed = parseLine(out[0]);
    expect(parsed["level"]).toBe("info");
    expect(parsed["msg"]).toBe("test message");
    expect(parsed["key"]).toBe("value");
    expect(typeof parsed["time"]).toBe("string");
    expect(new Date(String(parsed["time"])).toISOString()).toBe(parsed["time"]);
  });

  it("child loggers merge bindings", () => {
    const { sink, out } = captureSink();
    const parent = createLogger("info", { app: "ballot-auth" }, "json", sink);
    parent.child({ service: "auth" }).info("child log", { userId: "u-1" });

    expect(parseLine(out[0])).toMatchObject({
      app: "ballot-auth",
      service: "auth",
      userId: "u-1",
      msg: "child log",
    });
  });

  it("drops entries below the minimum level", () => {
    const { sink, out, err } = captureSink();
    const logger = createLogger("warn", {}, "json", sink);
    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(out).toHaveLength(0);
    expect(err).toHaveLength(1);
    expect(parseLine(err[0])["msg"]).toBe("shown");
  });

  it("sends warn and above to the error stream", () => {
    const { sink, out, err } = captureSink();
    const logger = createLogger("debug", {}, "json", sink);
    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");
    logger.fatal("f");

    expect(out.map((l) => parseLine(l)["level"])).toEqual(["debug", "info"]);
    expect(err.map((l) => parseLine(l)["level"])).toEqual(["warn", "error", "fatal"]);
  });
});

describe("Logger: pretty format", () => {
  it("renders badge, message and metadata", () => {
    const { sink, out } = captureSink();
    createLogger("info", { service: "auth" }, "pretty", sink).info("Login attempt", {
      username: "voter1",
      skipped: undefined,
    });

    const line = stripAnsi(out[0] ?? "");
    expect(line).toMatch(
      /^ {2}INF \d{2}:\d{2}:\d{2}\.\d{3} Login attempt service=auth username=voter1\n$/,
    );
  });

  it("prints objects as JSON and errors by message", () => {
    const { sink, err } = captureSink();
    createLogger("info", {}, "pretty", sink).error("Failed", {
      fields: ["email"],
      cause: new Error("disk full"),
    });

    const line = stripAnsi(err[0] ?? "");
    expect(line.endsWith(' Failed fields=["email"] cause=disk full\n')).toBe(true);
  });
});
