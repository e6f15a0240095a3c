import { describe, it, expect, vi, afterEach } from "vitest";
import { createLogger, logExternalCall } from "../logger.js";

function captureStdout() {
  const lines: string[] = [];
  const spy = vi
    .spyOn(process.stdout, "write")
    .mockImplementation((chunk: string | Uint8Array) => {
      lines.push(String(chunk));
      return true;
    });
  return { lines, spy };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createLogger", () => {
  it("writes one JSON object per line with bindings and data", () => {
    const { lines } = captureStdout();
    const logger = createLogger({ level: "info" }).child({ requestId: "r-1" });

    logger.info("Simulation completed", { episodes: 3 });

    expect(lines).toHaveLength(1);
    const entry: Record<string, unknown> = JSON.parse(lines[0] ?? "{}");
    expect(entry.level).toBe("info");
    expect(entry.msg).toBe("Simulation completed");
    expect(entry.requestId).toBe("r-1");
    expect(entry.episodes).toBe(3);
    expect(typeof entry.timestamp).toBe("string");
  });

  it("stamps base bindings on every entry and layers child bindings", () => {
    const { lines } = captureStdout();
    const logger = createLogger({ bindings: { component: "digest" } });

    logger.info("Run started");
    logger.child({ documentId: "doc-1" }).warn("Document skipped");

    const entries: Array<Record<string, unknown>> = lines.map((l) =>
      JSON.parse(l),
    );
    expect(entries[0]).toMatchObject({
      component: "digest",
      msg: "Run started",
    });
    expect(entries[0]).not.toHaveProperty("documentId");
    expect(entries[1]).toMatchObject({
      level: "warn",
      component: "digest",
      documentId: "doc-1",
    });
  });

  it("drops entries below the threshold", () => {
    const { lines } = captureStdout();
    const logger = createLogger({ level: "warn" });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('"msg":"shown"');
  });

  it("falls back to info for an unknown level", () => {
    const { lines } = captureStdout();
    const logger = createLogger({ level: "verbose" });

    logger.debug("hidden");
    logger.info("shown");

    expect(lines).toHaveLength(1);
  });
});

describe("logExternalCall", () => {
  it("logs failures at error level with the message", () => {
    const { lines } = captureStdout();
    const logger = createLogger();

    logExternalCall(logger, "readwise", "list", 12, "HTTP 500");

    const entry: Record<string, unknown> = JSON.parse(lines[0] ?? "{}");
    expect(entry).toMatchObject({
      level: "error",
      msg: "External call failed",
      service: "readwise",
      operation: "list",
      durationMs: 12,
      error: "HTTP 500",
    });
  });
});
