import { env } from "@/lib/env";

export type FetchResult =
  | { ok: true; url: string; status: number; body: string }
  | { ok: false; url: string; status: number | null; error: string };

export type PageFetcher = (pageUrl: string) => Promise<FetchResult>;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isTransientHttpStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status === 500 || status === 502 || status === 503 || status === 504;
}

function isTransientNetworkError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const message = error.message.toLowerCase();
  return (
    message.includes("econnreset") ||
    message.includes("econnrefused") ||
    message.includes("socket hang up") ||
    message.includes("fetch failed")
  );
}

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

/**
 * GETs one page. Never throws: timeouts, HTTP errors and connection failures come
 * back as `{ ok: false }` so callers can count them as per-item failures.
 */
export async function fetchPageHtml(pageUrl: string): Promise<FetchResult> {
  const maxAttempts = env.FETCH_MAX_ATTEMPTS;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), env.FETCH_TIMEOUT_MS);

    try {
      const response = await fetch(pageUrl, {
        headers: {
          "user-agent": env.SCRAPER_USER_AGENT,
          accept: "text/html,application/xhtml+xml",
          "accept-language": "ru-RU,ru;q=0.9,en;q=0.8"
        },
        signal: controller.signal
      });

      if (!response.ok) {
        if (attempt < maxAttempts && isTransientHttpStatus(response.status)) {
          await sleep(350 * attempt);
          continue;
        }

        return { ok: false, url: pageUrl, status: response.status, error: `HTTP ${response.status}` };
      }

      return { ok: true, url: pageUrl, status: response.status, body: await response.text() };
    } catch (error) {
      if (isTimeoutError(error)) {
        return { ok: false, url: pageUrl, status: null, error: `Timed out after ${env.FETCH_TIMEOUT_MS}ms` };
      }

      if (attempt < maxAttempts && isTransientNetworkError(error)) {
        await sleep(350 * attempt);
        continue;
      }

      return { ok: false, url: pageUrl, status: null, error: error instanceof Error ? error.message : "unknown" };
    } finally {
      clearTimeout(timeout);
    }
  }

  return { ok: false, url: pageUrl, status: null, error: "No fetch attempts made" };
}
