import { mkdtemp, readFile, rm, writeFile, mkdir } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { InsightHit } from "@reinforce-lab/shared";
import {
  HITS_HEADING,
  appendToDailyNote,
  formatHits,
  formatNoteDate,
} from "../daily-note.js";

const HIT: InsightHit = {
  project_name: "Search latency",
  insight_type: "Solution",
  summary: "Hedged requests cut p99.",
  actionable_advice: "Hedge shard queries after 10ms.",
  source_name: "Hedging notes",
  source_url: "https://blog.example/hedged",
};

const HIT_BLOCK = [
  "### Match: Search latency\n",
  "> **Solution**: Hedged requests cut p99.\n\n",
  "👉 **Action:** Hedge shard queries after 10ms.\n",
  "🔗 [Hedging notes](https://blog.example/hedged)\n\n",
  "---\n",
].join("");

describe("formatNoteDate", () => {
  it("uses the local calendar date", () => {
    expect(formatNoteDate(new Date(2026, 2, 7, 23, 59))).toBe("2026-03-07");
  });
});

describe("formatHits", () => {
  it("renders the heading and one block per hit", () => {
    expect(formatHits([HIT, HIT])).toBe(
      `\n\n${HITS_HEADING}\n${HIT_BLOCK}${HIT_BLOCK}`,
    );
  });
});

describe("appendToDailyNote", () => {
  let vault: string;
  const date = new Date(2026, 2, 10, 9, 30);

  beforeEach(async () => {
    vault = await mkdtemp(join(tmpdir(), "digest-notes-"));
  });

  afterEach(async () => {
    await rm(vault, { recursive: true, force: true });
  });

  it("creates the folder and the note with a title line", async () => {
    const folder = join(vault, "Daily Notes");
    const path = await appendToDailyNote(folder, [HIT], date);

    expect(path).toBe(join(folder, "2026-03-10.md"));
    await expect(readFile(path, "utf-8")).resolves.toBe(
      `# Daily Note 2026-03-10\n\n\n\n${HITS_HEADING}\n${HIT_BLOCK}`,
    );
  });

  it("appends to an existing note without rewriting it", async () => {
    const folder = join(vault, "Daily Notes");
    await mkdir(folder);
    await writeFile(join(folder, "2026-03-10.md"), "Morning log\n", "utf-8");

    const path = await appendToDailyNote(folder, [HIT], date);

    await expect(readFile(path, "utf-8")).resolves.toBe(
      `Morning log\n\n\n${HITS_HEADING}\n${HIT_BLOCK}`,
    );
  });
});
