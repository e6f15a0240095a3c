// =============================================================================
// @reinforce-lab/worker — Insight digest run
// =============================================================================
// One pass: read the active-problems note, list recent Readwise documents,
// ask the LLM about each one in turn, and append any hits to today's daily
// note. A failing document is logged and counted; it never stops the run.
// =============================================================================

import { join } from "node:path";
import {
  type DigestConfig,
  type InsightHit,
  type LlmClient,
  type Logger,
  type ReadwiseDocument,
  logExternalCall,
} from "@reinforce-lab/shared";
import { analyzeDocument } from "./analyze.js";
import { readActiveProblems } from "./context.js";
import { appendToDailyNote } from "./daily-note.js";
import { fetchRecentDocuments } from "./readwise.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type DigestRunConfig = Pick<
  DigestConfig,
  | "READWISE_TOKEN"
  | "OBSIDIAN_VAULT_PATH"
  | "ACTIVE_PROBLEMS_FILE"
  | "DAILY_NOTE_FOLDER"
  | "DIGEST_LOOKBACK_HOURS"
  | "DIGEST_DOC_DELAY_MS"
  | "DIGEST_MIN_CONTENT_CHARS"
  | "DIGEST_MAX_CONTENT_CHARS"
>;

export interface DigestDependencies {
  config: DigestRunConfig;
  logger: Logger;
  llm: LlmClient;
  /** Defaults to the Readwise Reader list API */
  fetchDocuments?: (hours: number) => Promise<ReadwiseDocument[]>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export type DigestStatus = "completed" | "missing_context" | "fetch_failed";

export interface DigestResult {
  status: DigestStatus;
  documents: number;
  analyzed: number;
  skipped: number;
  failed: number;
  hits: InsightHit[];
  /** Set when hits were written */
  notePath?: string;
}

function emptyResult(status: DigestStatus): DigestResult {
  return {
    status,
    documents: 0,
    analyzed: 0,
    skipped: 0,
    failed: 0,
    hits: [],
  };
}

const delay = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

// ---------------------------------------------------------------------------
// runDigest
// ---------------------------------------------------------------------------

export async function runDigest(
  deps: DigestDependencies,
): Promise<DigestResult> {
  const { config, logger, llm } = deps;
  const sleep = deps.sleep ?? delay;
  const now = deps.now ?? (() => new Date());
  const fetchDocuments =
    deps.fetchDocuments ??
    ((hours: number) =>
      fetchRecentDocuments({ token: config.READWISE_TOKEN, hours }));

  // --- Context ---
  const contextPath = join(
    config.OBSIDIAN_VAULT_PATH,
    config.ACTIVE_PROBLEMS_FILE,
  );
  const context = await readActiveProblems(contextPath);
  if (!context) {
    logger.error("Active problems file missing or empty", {
      path: contextPath,
    });
    return emptyResult("missing_context");
  }

  // --- Documents ---
  logger.info("Fetching Readwise documents", {
    lookbackHours: config.DIGEST_LOOKBACK_HOURS,
  });
  let documents: ReadwiseDocument[];
  const fetchStart = performance.now();
  try {
    documents = await fetchDocuments(config.DIGEST_LOOKBACK_HOURS);
    const durationMs = performance.now() - fetchStart;
    logExternalCall(logger, "readwise", "list", durationMs);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logExternalCall(
      logger,
      "readwise",
      "list",
      performance.now() - fetchStart,
      message,
    );
    return emptyResult("fetch_failed");
  }
  logger.info("Readwise documents fetched", { count: documents.length });

  // --- Analysis ---
  const result: DigestResult = {
    ...emptyResult("completed"),
    documents: documents.length,
  };
  const options = {
    minContentChars: config.DIGEST_MIN_CONTENT_CHARS,
    maxContentChars: config.DIGEST_MAX_CONTENT_CHARS,
  };

  for (const [i, doc] of documents.entries()) {
    const title = doc.title || "Untitled";
    const docLogger = logger.child({ documentId: doc.id, title });
    if (i > 0 && config.DIGEST_DOC_DELAY_MS > 0) {
      await sleep(config.DIGEST_DOC_DELAY_MS);
    }

    const start = performance.now();
    try {
      const outcome = await analyzeDocument(doc, context, llm, options);
      if (outcome.status === "skipped") {
        result.skipped++;
        docLogger.debug("Document skipped", { reason: outcome.reason });
        continue;
      }

      result.analyzed++;
      const durationMs = performance.now() - start;
      logExternalCall(docLogger, llm.provider, "generate", durationMs);
      if (outcome.status === "hit") {
        result.hits.push(outcome.hit);
        docLogger.info("Insight hit", {
          project: outcome.hit.project_name,
          insightType: outcome.hit.insight_type,
        });
      } else {
        docLogger.debug("No hit");
      }
    } catch (err) {
      result.failed++;
      docLogger.error("Document analysis failed", {
        durationMs: Math.round(performance.now() - start),
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  // --- Daily note ---
  if (result.hits.length > 0) {
    const folder = join(config.OBSIDIAN_VAULT_PATH, config.DAILY_NOTE_FOLDER);
    result.notePath = await appendToDailyNote(folder, result.hits, now());
    logger.info("Hits added to daily note", {
      hits: result.hits.length,
      path: result.notePath,
    });
  } else {
    logger.info("No hits found today");
  }

  return result;
}
