// =============================================================================
// Unit tests for the digest run
// =============================================================================
// The vault lives in a temp directory; Readwise, the LLM and the delay between
// documents are fakes.
// =============================================================================

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import {
  type LlmClient,
  type ReadwiseDocument,
  createLogger,
} from "@reinforce-lab/shared";
import { type DigestRunConfig, runDigest } from "../digest.js";
import { HITS_HEADING } from "../daily-note.js";

const INSIGHT = {
  project_name: "Search latency",
  insight_type: "Contradiction",
  summary: "Caching made things slower.",
  actionable_advice: "Measure cache hit rate before tuning.",
  source_name: "Cache myths",
};

const LONG_BODY = "<p>" + "x".repeat(40) + "</p>";

function doc(
  id: string,
  overrides: Partial<ReadwiseDocument> = {},
): ReadwiseDocument {
  return {
    id,
    title: `Doc ${id}`,
    source_url: `https://blog.example/${id}`,
    html_content: LONG_BODY,
    ...overrides,
  };
}

describe("runDigest", () => {
  let vault: string;
  let config: DigestRunConfig;
  const logger = createLogger({ level: "fatal" });
  const now = () => new Date(2026, 4, 1, 8, 0);

  beforeEach(async () => {
    vault = await mkdtemp(join(tmpdir(), "digest-run-"));
    config = {
      READWISE_TOKEN: "test-token",
      OBSIDIAN_VAULT_PATH: vault,
      ACTIVE_PROBLEMS_FILE: "ActiveProblems.md",
      DAILY_NOTE_FOLDER: "Daily Notes",
      DIGEST_LOOKBACK_HOURS: 24,
      DIGEST_DOC_DELAY_MS: 1000,
      DIGEST_MIN_CONTENT_CHARS: 20,
      DIGEST_MAX_CONTENT_CHARS: 15000,
    };
  });

  afterEach(async () => {
    await rm(vault, { recursive: true, force: true });
  });

  function llmReplying(...replies: Array<string | Error>): LlmClient {
    const generate = vi.fn<(prompt: string) => Promise<string>>();
    for (const reply of replies) {
      if (reply instanceof Error) generate.mockRejectedValueOnce(reply);
      else generate.mockResolvedValueOnce(reply);
    }
    return { provider: "gemini", model: "gemini-test", generate };
  }

  async function writeContext(text = "- make search faster\n") {
    await writeFile(join(vault, "ActiveProblems.md"), text, "utf-8");
  }

  it("stops before fetching when the active problems note is missing", async () => {
    const fetchDocuments =
      vi.fn<(hours: number) => Promise<ReadwiseDocument[]>>();

    const result = await runDigest({
      config,
      logger,
      llm: llmReplying(),
      fetchDocuments,
      now,
    });

    expect(result).toEqual({
      status: "missing_context",
      documents: 0,
      analyzed: 0,
      skipped: 0,
      failed: 0,
      hits: [],
    });
    expect(fetchDocuments).not.toHaveBeenCalled();
  });

  it("reports fetch_failed when Readwise is unreachable", async () => {
    await writeContext();
    const llm = llmReplying();

    const result = await runDigest({
      config,
      logger,
      llm,
      fetchDocuments: vi.fn().mockRejectedValue(new Error("ECONNRESET")),
      now,
    });

    expect(result.status).toBe("fetch_failed");
    expect(llm.generate).not.toHaveBeenCalled();
  });

  it("analyzes each document, counts outcomes, and writes hits", async () => {
    await writeContext();
    const sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue();
    const fetchDocuments = vi
      .fn<(hours: number) => Promise<ReadwiseDocument[]>>()
      .mockResolvedValue([
        doc("a"),
        doc("short", { html_content: "tiny" }),
        doc("b"),
        doc("c"),
      ]);
    const llm = llmReplying(
      JSON.stringify(INSIGHT),
      "NO_HIT",
      new Error("rate limited"),
    );

    const result = await runDigest({
      config,
      logger,
      llm,
      fetchDocuments,
      sleep,
      now,
    });

    expect(fetchDocuments).toHaveBeenCalledWith(24);
    expect(result).toMatchObject({
      status: "completed",
      documents: 4,
      analyzed: 2,
      skipped: 1,
      failed: 1,
    });
    expect(result.hits).toEqual([
      { ...INSIGHT, source_url: "https://blog.example/a" },
    ]);
    // One pause between each pair of documents
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(1000);

    const expectedPath = join(vault, "Daily Notes", "2026-05-01.md");
    expect(result.notePath).toBe(expectedPath);
    const note = await readFile(expectedPath, "utf-8");
    expect(
      note.startsWith(`# Daily Note 2026-05-01\n\n\n\n${HITS_HEADING}\n`),
    ).toBe(true);
    expect(note).toContain("### Match: Search latency\n");
  });

  it("leaves the daily note alone when nothing hits", async () => {
    await writeContext();

    const result = await runDigest({
      config,
      logger,
      llm: llmReplying("NO_HIT"),
      fetchDocuments: vi.fn().mockResolvedValue([doc("a")]),
      sleep: vi.fn(),
      now,
    });

    expect(result).toEqual({
      status: "completed",
      documents: 1,
      analyzed: 1,
      skipped: 0,
      failed: 0,
      hits: [],
    });
    await expect(
      readFile(join(vault, "Daily Notes", "2026-05-01.md"), "utf-8"),
    ).rejects.toMatchObject({ code: "ENOENT" });
  });
});
