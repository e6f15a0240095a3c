import { appendFile, mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { InsightHit } from "@reinforce-lab/shared";

export const HITS_HEADING = "## 🎯 Feynman Hits";

/** Local calendar date as YYYY-MM-DD */
export function formatNoteDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

export function formatHits(hits: readonly InsightHit[]): string {
  const lines = [`\n\n${HITS_HEADING}\n`];
  for (const hit of hits) {
    lines.push(
      `### Match: ${hit.project_name}\n`,
      `> **${hit.insight_type}**: ${hit.summary}\n\n`,
      `👉 **Action:** ${hit.actionable_advice}\n`,
      `🔗 [${hit.source_name}](${hit.source_url})\n\n`,
      "---\n",
    );
  }
  return lines.join("");
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST";
}

/**
 * Appends a hits section to the daily note for `date`, creating the folder
 * and the note (with its title line) when they do not exist yet. Returns the
 * note path.
 */
export async function appendToDailyNote(
  folder: string,
  hits: readonly InsightHit[],
  date: Date = new Date(),
): Promise<string> {
  const day = formatNoteDate(date);
  const notePath = join(folder, `${day}.md`);

  await mkdir(folder, { recursive: true });

  try {
    await writeFile(notePath, `# Daily Note ${day}\n\n`, {
      encoding: "utf-8",
      flag: "wx",
    });
  } catch (err) {
    if (!isAlreadyExists(err)) throw err;
  }

  await appendFile(notePath, formatHits(hits), "utf-8");
  return notePath;
}
