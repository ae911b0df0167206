import { escapeHtml, sendAdminAlertWithTimeout } from "@/lib/alerts";
import { cleanupIncomplete, saveCrawledProduct, saveSessionStatus, type ProductSaveResult } from "@/lib/db/mutations";
import { getCrawlSession, getSessionStatus } from "@/lib/db/queries";
import { env } from "@/lib/env";
import type { CancellationToken } from "@/lib/scraping/cancellation";
import { walkCatalog } from "@/lib/scraping/catalog-walker";
import { listCatalogs } from "@/lib/scraping/discovery";
import { extractProduct, extractVariants } from "@/lib/scraping/extractors";
import { fetchPageHtml } from "@/lib/scraping/fetcher";
import { logSessionEvent } from "@/lib/scraping/session-log";
import { requiresConfirmation } from "@/lib/scraping/session-state";
import {
  bareItem,
  categorizedItem,
  resolveItemCategory,
  type CrawlItem,
  type CrawlMode,
  type CrawlRunOutcome,
  type IngestionSummary,
  type SessionStatus
} from "@/lib/types";

export type CrawlTarget =
  | { mode: "single_item"; productUrl: string }
  | { mode: "one_catalog"; catalogUrl: string }
  | { mode: "all_catalogs" };

export interface CrawlJobInput {
  sessionId: string;
  target: CrawlTarget;
  categoryName: string | null;
  maxPages: number | null;
  maxProducts: number | null;
}

interface IngestionResult {
  summary: IngestionSummary;
  canceled: boolean;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function emptySummary(): IngestionSummary {
  return {
    attempted: 0,
    saved: 0,
    failures: { network: 0, extraction: 0, rejected: 0, storage: 0 }
  };
}

function failureCount(summary: IngestionSummary): number {
  const { network, extraction, rejected, storage } = summary.failures;
  return network + extraction + rejected + storage;
}

function nonEmpty(value: string | null | undefined): string | null {
  const trimmed = value?.trim() ?? "";
  return trimmed.length > 0 ? trimmed : null;
}

/** An item URL wins over a catalog URL; with neither, every catalog is walked. */
export function resolveCrawlTarget(input: { productUrl?: string | null; catalogUrl?: string | null }): CrawlTarget {
  const productUrl = nonEmpty(input.productUrl);
  if (productUrl) {
    return { mode: "single_item", productUrl };
  }

  const catalogUrl = nonEmpty(input.catalogUrl);
  if (catalogUrl) {
    return { mode: "one_catalog", catalogUrl };
  }

  return { mode: "all_catalogs" };
}

async function collectItems(input: CrawlJobInput, token: CancellationToken): Promise<CrawlItem[]> {
  const { target } = input;

  if (target.mode === "single_item") {
    return [bareItem(target.productUrl)];
  }

  if (target.mode === "one_catalog") {
    const walk = await walkCatalog({
      sessionId: input.sessionId,
      catalogUrl: target.catalogUrl,
      maxPages: input.maxPages,
      maxProducts: input.maxProducts,
      token,
      fetchPage: fetchPageHtml
    });
    return walk.productUrls.map((url) => bareItem(url));
  }

  const catalogs = await listCatalogs(fetchPageHtml);
  if (catalogs.length === 0) {
    await logSessionEvent(input.sessionId, {
      severity: "warn",
      code: "CATALOG_DISCOVERY_EMPTY",
      message: "No catalogs found on the site menu",
      payload: { siteUrl: env.CATALOG_SITE_URL }
    });
  }

  const items: CrawlItem[] = [];
  const seen = new Set<string>();

  for (const catalog of catalogs) {
    if (token.isCancelled) {
      break;
    }

    const remaining = input.maxProducts === null ? null : input.maxProducts - items.length;
    if (remaining !== null && remaining <= 0) {
      break;
    }

    const walk = await walkCatalog({
      sessionId: input.sessionId,
      catalogUrl: catalog.url,
      maxPages: input.maxPages,
      maxProducts: remaining,
      token,
      fetchPage: fetchPageHtml
    });

    for (const url of walk.productUrls) {
      if (seen.has(url)) {
        continue;
      }
      seen.add(url);
      items.push(categorizedItem(url, catalog.name));
    }
  }

  return items;
}

/**
 * Fetches, extracts and stores each item in order, counting into `input.summary`.
 * Per-item failures are counted and skipped; only a run of storage failures at the
 * escalation threshold throws, and the summary keeps what was counted before it.
 */
export async function ingestCrawlItems(input: {
  sessionId: string;
  items: CrawlItem[];
  defaultCategory: string | null;
  token: CancellationToken;
  summary: IngestionSummary;
}): Promise<IngestionResult> {
  const { summary } = input;
  const threshold = env.STORAGE_FAILURE_ESCALATION_THRESHOLD;
  let consecutiveStorageFailures = 0;

  for (const item of input.items) {
    if (input.token.isCancelled) {
      return { summary, canceled: true };
    }

    await sleep(env.CRAWL_REQUEST_DELAY_MS);

    if (input.token.isCancelled) {
      return { summary, canceled: true };
    }

    summary.attempted += 1;

    const page = await fetchPageHtml(item.url);
    if (!page.ok) {
      summary.failures.network += 1;
      await logSessionEvent(input.sessionId, {
        severity: "warn",
        code: "ITEM_FETCH_FAILED",
        message: `Failed to fetch ${item.url}: ${page.error}`,
        payload: { url: item.url, status: page.status, error: page.error }
      });
      continue;
    }

    const product = extractProduct({
      html: page.body,
      pageUrl: item.url,
      category: resolveItemCategory(item, input.defaultCategory)
    });
    if (!product) {
      summary.failures.extraction += 1;
      await logSessionEvent(input.sessionId, {
        severity: "warn",
        code: "ITEM_EXTRACTION_FAILED",
        message: `No product data found at ${item.url}`,
        payload: { url: item.url }
      });
      continue;
    }

    const variants = extractVariants({ html: page.body, pageUrl: item.url });

    let result: ProductSaveResult;
    try {
      result = await saveCrawledProduct(product, variants, input.token);
    } catch (error) {
      summary.failures.storage += 1;
      consecutiveStorageFailures += 1;
      const message = error instanceof Error ? error.message : "unknown storage error";

      await logSessionEvent(input.sessionId, {
        severity: "warn",
        code: "ITEM_STORAGE_FAILED",
        message: `Failed to store ${item.url}: ${message}`,
        payload: { url: item.url, consecutiveStorageFailures }
      });

      if (threshold > 0 && consecutiveStorageFailures >= threshold) {
        throw new Error(`Storage failed for ${consecutiveStorageFailures} consecutive items; last error: ${message}`);
      }
      continue;
    }

    consecutiveStorageFailures = 0;

    if (result.status === "canceled") {
      return { summary, canceled: true };
    }

    if (result.status === "rejected") {
      summary.failures.rejected += 1;
      await logSessionEvent(input.sessionId, {
        severity: "warn",
        code: "ITEM_REJECTED",
        message: `Skipped ${item.url}: product has no title`,
        payload: { url: item.url, reason: result.reason }
      });
      continue;
    }

    summary.saved += 1;
    await logSessionEvent(input.sessionId, {
      severity: "info",
      code: "ITEM_SAVED",
      message: `Saved ${product.title} with ${result.variants} variant(s)`,
      payload: { url: item.url, productId: result.productId, variants: result.variants }
    });
  }

  return { summary, canceled: false };
}

async function currentStatus(sessionId: string, fallback: SessionStatus): Promise<SessionStatus> {
  const status = await getSessionStatus(sessionId);
  return status?.status ?? fallback;
}

async function finishIngestion(input: {
  sessionId: string;
  mode: CrawlMode | "resume";
  discovered: number;
  result: IngestionResult;
}): Promise<CrawlRunOutcome> {
  const { sessionId, mode, discovered, result } = input;
  const failed = failureCount(result.summary);

  if (result.canceled) {
    await saveSessionStatus({ sessionId, status: "canceled", pendingItems: [] });
    await logSessionEvent(sessionId, {
      severity: "info",
      code: "SESSION_CANCELED",
      message: `Canceled after ${result.summary.attempted} of ${discovered} item(s)`,
      payload: { ...result.summary }
    });

    return {
      sessionId,
      mode,
      status: "canceled",
      discovered,
      ingestion: result.summary,
      message: `Canceled: saved ${result.summary.saved} of ${discovered} item(s)`
    };
  }

  const completed = await saveSessionStatus({ sessionId, status: "complete", pendingItems: [] });
  const status = completed ? "complete" : await currentStatus(sessionId, "error");

  await logSessionEvent(sessionId, {
    severity: failed > 0 ? "warn" : "info",
    code: "SESSION_COMPLETE",
    message: `Saved ${result.summary.saved} of ${discovered} item(s), ${failed} failed`,
    payload: { ...result.summary }
  });

  return {
    sessionId,
    mode,
    status,
    discovered,
    ingestion: result.summary,
    message: `Saved ${result.summary.saved} of ${discovered} item(s), ${failed} failed`
  };
}

/** Forces `error`, purges partial writes and alerts an admin. Never throws. */
async function failSession(input: {
  sessionId: string;
  mode: CrawlMode | "resume";
  discovered: number;
  summary: IngestionSummary;
  error: unknown;
}): Promise<CrawlRunOutcome> {
  const message = input.error instanceof Error ? input.error.message : "unknown crawl failure";
  console.error(`[crawl:${input.sessionId.slice(0, 8)}] fatal error`, { mode: input.mode, error: message });

  try {
    await saveSessionStatus({ sessionId: input.sessionId, status: "error", pendingItems: [] });
  } catch (statusError) {
    console.error("[crawl] failed to mark session as error", {
      sessionId: input.sessionId,
      error: statusError instanceof Error ? statusError.message : "unknown"
    });
  }

  let removed: number | null = null;
  try {
    removed = await cleanupIncomplete(input.sessionId);
  } catch (cleanupError) {
    console.error("[crawl] cleanup after failure did not run", {
      sessionId: input.sessionId,
      error: cleanupError instanceof Error ? cleanupError.message : "unknown"
    });
  }

  await logSessionEvent(input.sessionId, {
    severity: "error",
    code: "SESSION_FAILED",
    message,
    payload: { mode: input.mode, removedIncomplete: removed }
  });

  await sendAdminAlertWithTimeout(
    "Catalog crawl failed",
    `<p>Session: ${escapeHtml(input.sessionId)}</p><p>Mode: ${escapeHtml(input.mode)}</p><p>Error: ${escapeHtml(message)}</p>`
  );

  return {
    sessionId: input.sessionId,
    mode: input.mode,
    status: "error",
    discovered: input.discovered,
    ingestion: input.summary,
    message
  };
}

/**
 * Runs one crawl session from creation to a terminal state, or until it parks in
 * `awaiting_confirmation`. Returns an outcome instead of throwing.
 */
export async function runCrawlJob(input: CrawlJobInput, token: CancellationToken): Promise<CrawlRunOutcome> {
  const { sessionId } = input;
  const mode = input.target.mode;
  const summary = emptySummary();
  let discovered = 0;

  try {
    const created = await saveSessionStatus({
      sessionId,
      status: "collecting_urls",
      pendingItems: [],
      categoryName: input.categoryName
    });

    if (!created) {
      const status = await currentStatus(sessionId, "error");
      console.warn(`[crawl:${sessionId.slice(0, 8)}] session already exists`, { status });
      return {
        sessionId,
        mode,
        status,
        discovered,
        ingestion: emptySummary(),
        message: `Session ${sessionId} already exists`
      };
    }

    await logSessionEvent(sessionId, {
      severity: "info",
      code: "SESSION_STARTED",
      message: `Started ${mode} crawl`,
      payload: { target: input.target, maxPages: input.maxPages, maxProducts: input.maxProducts }
    });

    const items = await collectItems(input, token);
    discovered = items.length;

    if (token.isCancelled) {
      return finishIngestion({
        sessionId,
        mode,
        discovered,
        result: { summary, canceled: true }
      });
    }

    if (requiresConfirmation(items.length)) {
      await saveSessionStatus({ sessionId, status: "awaiting_confirmation", pendingItems: items });
      await logSessionEvent(sessionId, {
        severity: "info",
        code: "AWAITING_CONFIRMATION",
        message: `Discovered ${items.length} item(s); waiting for confirmation`,
        payload: { discovered: items.length }
      });

      if (token.isCancelled && (await cancelAwaitingSession(sessionId))) {
        return {
          sessionId,
          mode,
          status: "canceled",
          discovered,
          ingestion: summary,
          message: `Canceled before confirmation of ${items.length} item(s)`
        };
      }

      return {
        sessionId,
        mode,
        status: "awaiting_confirmation",
        discovered,
        ingestion: summary,
        message: `Discovered ${items.length} item(s); confirmation required`
      };
    }

    await saveSessionStatus({ sessionId, status: "parsing_products", pendingItems: items });

    const result = await ingestCrawlItems({
      sessionId,
      items,
      defaultCategory: input.categoryName,
      token,
      summary
    });

    return await finishIngestion({ sessionId, mode, discovered, result });
  } catch (error) {
    return failSession({ sessionId, mode, discovered, summary, error });
  }
}

/**
 * Continues a session parked in `awaiting_confirmation` with its stored items.
 * Returns null when the session is not waiting, which makes repeat confirms no-ops.
 */
export async function resumeConfirmedSession(sessionId: string, token: CancellationToken): Promise<CrawlRunOutcome | null> {
  const summary = emptySummary();
  let discovered = 0;

  try {
    const session = await getCrawlSession(sessionId);
    if (!session || session.status !== "awaiting_confirmation") {
      return null;
    }

    discovered = session.pendingItems.length;

    const moved = await saveSessionStatus({
      sessionId,
      status: "parsing_products",
      from: "awaiting_confirmation"
    });
    if (!moved) {
      return null;
    }

    await logSessionEvent(sessionId, {
      severity: "info",
      code: "SESSION_CONFIRMED",
      message: `Confirmed; processing ${discovered} item(s)`,
      payload: { discovered }
    });

    const result = await ingestCrawlItems({
      sessionId,
      items: session.pendingItems,
      defaultCategory: session.categoryName,
      token,
      summary
    });

    return await finishIngestion({ sessionId, mode: "resume", discovered, result });
  } catch (error) {
    return failSession({ sessionId, mode: "resume", discovered, summary, error });
  }
}

/** Declines a waiting session and purges partial writes. False when it was not waiting. */
export async function declineAwaitingSession(sessionId: string): Promise<boolean> {
  const moved = await saveSessionStatus({
    sessionId,
    status: "canceled",
    from: "awaiting_confirmation",
    pendingItems: []
  });
  if (!moved) {
    return false;
  }

  const removed = await cleanupIncomplete(sessionId);
  await logSessionEvent(sessionId, {
    severity: "info",
    code: "SESSION_DECLINED",
    message: "Declined by operator",
    payload: { removedIncomplete: removed }
  });

  return true;
}

/** Cancels a waiting session that no worker is running. No cleanup: nothing was written. */
export async function cancelAwaitingSession(sessionId: string): Promise<boolean> {
  const moved = await saveSessionStatus({
    sessionId,
    status: "canceled",
    from: "awaiting_confirmation",
    pendingItems: []
  });

  if (moved) {
    await logSessionEvent(sessionId, {
      severity: "info",
      code: "SESSION_CANCELED",
      message: "Canceled while awaiting confirmation",
      payload: {}
    });
  }

  return moved;
}
