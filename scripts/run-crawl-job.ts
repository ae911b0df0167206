import "dotenv/config";

import { sql } from "@/lib/db/client";
import { cancelCrawlSession, confirmCrawlSession, startCrawlJob, waitForCrawlSession } from "@/lib/jobs/crawl-jobs";

function parseArgValue(args: string[], key: string): string | null {
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token === `--${key}`) {
      return args[index + 1] ?? null;
    }

    const prefix = `--${key}=`;
    if (token.startsWith(prefix)) {
      return token.slice(prefix.length);
    }
  }

  return null;
}

function parseLimit(args: string[], key: string): number | null {
  const raw = parseArgValue(args, key);
  if (raw === null) {
    return null;
  }

  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`--${key} must be a non-negative integer, got "${raw}"`);
  }
  return parsed;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  const job = startCrawlJob({
    productUrl: parseArgValue(args, "url"),
    catalogUrl: parseArgValue(args, "catalog"),
    categoryName: parseArgValue(args, "category"),
    maxPages: parseLimit(args, "max-pages"),
    maxProducts: parseLimit(args, "max-products")
  });

  process.on("SIGINT", () => {
    console.log("[job:crawl] SIGINT received, requesting cancellation...");
    cancelCrawlSession(job.sessionId).catch((error: unknown) => {
      console.error("[job:crawl] cancel request failed", error);
    });
  });

  let outcome = await waitForCrawlSession(job.sessionId);

  if (outcome?.status === "awaiting_confirmation") {
    if (!args.includes("--confirm")) {
      console.log(`[job:crawl] ${outcome.message}. Run: npm run crawl:session -- confirm ${job.sessionId}`);
    } else if (await confirmCrawlSession(job.sessionId)) {
      outcome = await waitForCrawlSession(job.sessionId);
    }
  }

  console.log(JSON.stringify(outcome, null, 2));

  if (outcome?.status === "error") {
    process.exitCode = 1;
  }
}

async function shutdown(): Promise<void> {
  await sql.end({ timeout: 5 }).catch((error: unknown) => {
    console.warn("[job:crawl] database pool did not close cleanly", error);
  });
}

main()
  .then(async () => {
    await shutdown();
  })
  .catch(async (error) => {
    console.error(error);
    await shutdown();
    process.exit(1);
  });
