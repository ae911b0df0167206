import { randomUUID } from "node:crypto";

import { getSessionStatus } from "@/lib/db/queries";
import { CancellationRegistry, type CancellationToken } from "@/lib/scraping/cancellation";
import {
  cancelAwaitingSession,
  declineAwaitingSession,
  resolveCrawlTarget,
  resumeConfirmedSession,
  runCrawlJob,
  type CrawlTarget
} from "@/lib/scraping/worker";
import type { CrawlRunOutcome, CrawlSessionStatus } from "@/lib/types";

export interface CrawlJobRequest {
  productUrl?: string | null;
  catalogUrl?: string | null;
  categoryName?: string | null;
  maxPages?: number | null;
  maxProducts?: number | null;
}

export interface StartedCrawlJob {
  sessionId: string;
  target: CrawlTarget;
}

export type CancelResult = "signaled" | "canceled" | "not_running";

const registry = new CancellationRegistry();
const inFlight = new Map<string, Promise<CrawlRunOutcome | null>>();

function launch(sessionId: string, run: (token: CancellationToken) => Promise<CrawlRunOutcome | null>): void {
  const token = registry.register(sessionId);

  const promise: Promise<CrawlRunOutcome | null> = run(token)
    .catch((error: unknown) => {
      console.error(`[job:crawl] session ${sessionId} run failed`, {
        error: error instanceof Error ? error.message : "unknown"
      });
      return null;
    })
    .finally(() => {
      if (inFlight.get(sessionId) === promise) {
        inFlight.delete(sessionId);
        registry.release(sessionId);
      }
    });

  inFlight.set(sessionId, promise);
}

function limitOrNull(value: number | null | undefined): number | null {
  return typeof value === "number" && Number.isFinite(value) && value >= 0 ? Math.floor(value) : null;
}

/** Starts a crawl in the background and returns its session id immediately. */
export function startCrawlJob(request: CrawlJobRequest): StartedCrawlJob {
  const sessionId = randomUUID();
  const target = resolveCrawlTarget(request);

  launch(sessionId, (token) =>
    runCrawlJob(
      {
        sessionId,
        target,
        categoryName: request.categoryName?.trim() || null,
        maxPages: limitOrNull(request.maxPages),
        maxProducts: limitOrNull(request.maxProducts)
      },
      token
    )
  );

  console.log(`[job:crawl] started ${target.mode} session ${sessionId}`);
  return { sessionId, target };
}

/** Resumes a session waiting for confirmation on a fresh worker. False when it is not waiting. */
export async function confirmCrawlSession(sessionId: string): Promise<boolean> {
  if (inFlight.has(sessionId)) {
    return false;
  }

  const status = await getSessionStatus(sessionId);
  if (status?.status !== "awaiting_confirmation" || inFlight.has(sessionId)) {
    return false;
  }

  launch(sessionId, (token) => resumeConfirmedSession(sessionId, token));
  return true;
}

export async function declineCrawlSession(sessionId: string): Promise<boolean> {
  if (inFlight.has(sessionId)) {
    return false;
  }

  return declineAwaitingSession(sessionId);
}

/**
 * Running sessions are signaled and stop at their next checkpoint. A session
 * parked in `awaiting_confirmation` has no worker to observe the signal, so it is
 * canceled directly.
 */
export async function cancelCrawlSession(sessionId: string): Promise<CancelResult> {
  if (registry.cancel(sessionId)) {
    console.log(`[job:crawl] cancellation requested for ${sessionId}`);
    return "signaled";
  }

  return (await cancelAwaitingSession(sessionId)) ? "canceled" : "not_running";
}

export async function getCrawlSessionStatus(sessionId: string): Promise<CrawlSessionStatus | null> {
  return getSessionStatus(sessionId);
}

/** Resolves once the session's current run settles; null when nothing is running. */
export async function waitForCrawlSession(sessionId: string): Promise<CrawlRunOutcome | null> {
  const running = inFlight.get(sessionId);
  return running ? running : null;
}

export function activeCrawlSessionCount(): number {
  return registry.size;
}
