import { describe, expect, it } from "vitest";
import { InvariantError, assertNonEmptyString, assertPort } from "../invariants";
import { createProcessLogger, createSilentLogger } from "../logger";

function recordingStream(): { write: (chunk: string) => boolean; lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    write: (chunk: string) => {
      lines.push(chunk);
      return true;
    }
  };
}

describe("createProcessLogger", () => {
  it("writes timestamped info lines to stdout and errors to stderr", () => {
    const stdout = recordingStream();
    const stderr = recordingStream();
    const logger = createProcessLogger({ stdout, stderr }, () => new Date("2024-05-01T10:00:00.000Z"));

    logger.info("server started");
    logger.error("capture failed");

    expect(stdout.lines).toEqual(["2024-05-01T10:00:00.000Z server started\n"]);
    expect(stderr.lines).toEqual(["2024-05-01T10:00:00.000Z capture failed\n"]);
  });

  it("provides a silent logger that accepts messages", () => {
    const logger = createSilentLogger();
    expect(() => {
      logger.info("ignored");
      logger.error("ignored");
    }).not.toThrow();
  });
});

describe("invariants", () => {
  it("rejects blank strings", () => {
    expect(() => assertNonEmptyString("  ", "scriptPath")).toThrow(InvariantError);
    expect(() => assertNonEmptyString(undefined, "venvDir")).toThrow("invalid venvDir: expected a non-blank string");
    expect(() => assertNonEmptyString("  ", "scriptPath")).toThrow("invalid scriptPath: expected a non-blank string");
  });

  it("accepts ports within range only", () => {
    expect(() => assertPort(8080, "port")).not.toThrow();
    expect(() => assertPort(0, "port")).not.toThrow();
    expect(() => assertPort(70000, "port")).toThrow("invalid port: expected an integer port between 0 and 65535");
    expect(() => assertPort(1.5, "port")).toThrow(InvariantError);

    const error = (() => {
      try {
        assertPort(-1, "port");
      } catch (caught) {
        return caught;
      }
      return undefined;
    })();
    expect(error).toMatchObject({ name: "InvariantError", field: "port" });
  });
});
