// =============================================================================
// @reinforce-lab/worker — Article analysis against the active problems
// =============================================================================
// Builds the research-assistant prompt for one article, sends it to the
// configured LLM, and turns the loosely structured reply into a validated
// insight. "NO_HIT", prose without a JSON object, and JSON that does not
// match the insight shape all count as no hit.
// =============================================================================

import {
  type Insight,
  type InsightHit,
  type LlmClient,
  type ReadwiseDocument,
  InsightSchema,
} from "@reinforce-lab/shared";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AnalyzeOptions {
  /** Shorter articles are usually bare links and are skipped */
  minContentChars: number;
  /** Article text beyond this is cut before prompting */
  maxContentChars: number;
}

export type AnalysisOutcome =
  | { status: "skipped"; reason: string }
  | { status: "no_hit" }
  | { status: "hit"; hit: InsightHit };

export const NO_HIT_MARKER = "NO_HIT";

// ---------------------------------------------------------------------------
// Prompt
// ---------------------------------------------------------------------------

/** HTML content when present, else the summary, else nothing. */
export function documentContent(doc: ReadwiseDocument): string {
  return doc.html_content || doc.summary || "";
}

export function buildInsightPrompt(
  title: string,
  content: string,
  context: string,
  maxContentChars: number,
): string {
  return [
    "You are an expert research assistant using the Feynman Technique.",
    "",
    "CONTEXT (My Active Problems):",
    context,
    "",
    "INPUT TEXT (New Article):",
    `Title: ${title}`,
    content.slice(0, maxContentChars),
    "",
    "---",
    "YOUR TASK:",
    "Run the Input Text against my Active Problems. Look for high-value connections.",
    "",
    "Apply these filters:",
    "1. THE INVERSION: Does this contradict my current hypothesis?",
    "2. THE MECHANISM: Is there an abstract mechanism here I can steal?",
    "3. THE SOLUTION: Does this directly solve a bottleneck?",
    "",
    "OUTPUT FORMAT:",
    `If NO strong connection is found, output exactly: "${NO_HIT_MARKER}"`,
    "",
    "If a connection is found, output a JSON object:",
    "{",
    '    "project_name": "Name of the relevant project",',
    '    "insight_type": "Mechanism" or "Contradiction" or "Solution",',
    '    "summary": "One sentence summary of the connection.",',
    '    "actionable_advice": "Specific thing I should do based on this.",',
    '    "source_name": "Name of the article"',
    "}",
  ].join("\n");
}

// ---------------------------------------------------------------------------
// Response parsing
// ---------------------------------------------------------------------------

/**
 * Extracts the insight from a model reply. The model sometimes wraps the
 * JSON in prose or code fences, so the span from the first "{" to the last
 * "}" is parsed.
 */
export function parseInsightResponse(text: string): Insight | null {
  const trimmed = text.trim();
  if (trimmed.length === 0 || trimmed.includes(NO_HIT_MARKER)) return null;

  const start = trimmed.indexOf("{");
  const end = trimmed.lastIndexOf("}");
  if (start === -1 || end < start) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed.slice(start, end + 1));
  } catch {
    return null;
  }

  const result = InsightSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

// ---------------------------------------------------------------------------
// analyzeDocument
// ---------------------------------------------------------------------------

/**
 * Runs one article through the LLM. LLM failures propagate so the caller can
 * count and log them per document.
 */
export async function analyzeDocument(
  doc: ReadwiseDocument,
  context: string,
  llm: LlmClient,
  options: AnalyzeOptions,
): Promise<AnalysisOutcome> {
  const content = documentContent(doc);
  if (content.length < options.minContentChars) {
    return {
      status: "skipped",
      reason: `content shorter than ${options.minContentChars} characters`,
    };
  }

  const prompt = buildInsightPrompt(
    doc.title || "Untitled",
    content,
    context,
    options.maxContentChars,
  );
  const reply = await llm.generate(prompt);

  const insight = parseInsightResponse(reply);
  if (!insight) return { status: "no_hit" };

  return {
    status: "hit",
    hit: { ...insight, source_url: doc.source_url || doc.url || "#" },
  };
}
