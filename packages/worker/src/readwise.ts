// =============================================================================
// @reinforce-lab/worker — Readwise Reader client
// =============================================================================
// Lists documents updated within a lookback window that are still in the
// "new" location, with their full HTML content. Follows nextPageCursor for a
// bounded number of pages.
// =============================================================================

import {
  type ReadwiseDocument,
  ReadwiseListResponseSchema,
} from "@reinforce-lab/shared";

export const READWISE_LIST_URL = "https://readwise.io/api/v3/list/";

const REQUEST_TIMEOUT_MS = 30_000;
const MAX_PAGES = 10;
const HOUR_MS = 3_600_000;

export class ReadwiseError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "ReadwiseError";
    this.status = status;
  }
}

export interface FetchRecentDocumentsOptions {
  token: string;
  /** Lookback window in hours */
  hours: number;
  now?: Date;
  fetch?: typeof fetch;
}

export function buildListUrl(updatedAfter: string, cursor?: string): URL {
  const url = new URL(READWISE_LIST_URL);
  url.searchParams.set("updatedAfter", updatedAfter);
  url.searchParams.set("withHtmlContent", "true");
  url.searchParams.set("location", "new");
  if (cursor) {
    url.searchParams.set("pageCursor", cursor);
  }
  return url;
}

/**
 * Fetches documents updated in the last `hours` hours.
 *
 * Throws ReadwiseError on a non-2xx response and a ZodError when the body
 * does not look like a list response.
 */
export async function fetchRecentDocuments(
  options: FetchRecentDocumentsOptions,
): Promise<ReadwiseDocument[]> {
  const fetchImpl = options.fetch ?? fetch;
  const now = options.now ?? new Date();
  const updatedAfter = new Date(
    now.getTime() - options.hours * HOUR_MS,
  ).toISOString();

  const documents: ReadwiseDocument[] = [];
  let cursor: string | undefined;

  for (let page = 0; page < MAX_PAGES; page++) {
    const response = await fetchImpl(buildListUrl(updatedAfter, cursor), {
      headers: { Authorization: `Token ${options.token}` },
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });

    if (!response.ok) {
      throw new ReadwiseError(
        `Readwise list request failed with status ${response.status}`,
        response.status,
      );
    }

    const body = ReadwiseListResponseSchema.parse(await response.json());
    documents.push(...body.results);

    cursor = body.nextPageCursor ?? undefined;
    if (!cursor) break;
  }

  return documents;
}
