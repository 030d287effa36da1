import { describe, expect, it } from "vitest";
import { type LogSink, createLogger } from "../../src/infrastructure/logging/logger.js";

const captureSink = () => {
  const out: string[] = [];
  const err: string[] = [];
  const sink: LogSink = {
    out: (line) => {
      out.push(line);
    },
    err: (line) => {
      err.push(line);
    },
  };
  return { out, err, sink };
};

const parse = (line: string | undefined): Record<string, unknown> =>
  JSON.parse((line ?? "").trim());

describe("Logger: JSON format", () => {
  it("json format outputs valid JSON lines", () => {
    const { out, sink } = captureSink();
    createLogger({ format: "json", sink }).info("test message", { key: "value" });

    expect(out.length).toBe(1);
    const parsed = parse(out[0]);
    expect(parsed["level"]).toBe("info");
    expect(parsed["msg"]).toBe("test message");
    expect(parsed["key"]).toBe("value");
    const time = parsed["time"];
    expect(typeof time).toBe("string");
    expect(new Date(String(time)).toISOString()).toBe(time);
  });

  it("json format includes bindings", () => {
    const { out, sink } = captureSink();
    createLogger({ format: "json", bindings: { service: "test" }, sink }).info("hello");
    expect(parse(out[0])["service"]).toBe("test");
  });

  it("child logger inherits format and bindings", () => {
    const { out, sink } = captureSink();
    const parent = createLogger({ format: "json", bindings: { service: "test" }, sink });
    parent.child({ requestId: "abc-123" }).info("child log");

    const parsed = parse(out[0]);
    expect(parsed["service"]).toBe("test");
    expect(parsed["requestId"]).toBe("abc-123");
    expect(parsed["msg"]).toBe("child log");
  });

  it("respects log level filtering", () => {
    const { out, err, sink } = captureSink();
    const logger = createLogger({ level: "warn", format: "json", sink });
    logger.debug("should not appear");
    logger.info("should not appear");
    logger.warn("should appear");

    expect(out.length).toBe(0);
    expect(err.length).toBe(1);
  });

  it("warn and error go to the error stream", () => {
    const { out, err, sink } = captureSink();
    const logger = createLogger({ level: "warn", format: "json", sink });
    logger.warn("warning message");
    logger.error("error message");

    expect(out.length).toBe(0);
    expect(err.map((line) => parse(line)["level"])).toEqual(["warn", "error"]);
  });

  it("pretty format does not output JSON", () => {
    const { out, sink } = captureSink();
    createLogger({ format: "pretty", sink }).info("pretty log");

    expect(out.length).toBe(1);
    expect(out[0]).toContain("pretty log");
    expect(() => JSON.parse((out[0] ?? "").trim())).toThrow();
  });
});
