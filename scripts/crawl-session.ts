import "dotenv/config";

import { sql } from "@/lib/db/client";
import { listSessionEvents } from "@/lib/db/queries";
import {
  confirmCrawlSession,
  declineCrawlSession,
  getCrawlSessionStatus,
  waitForCrawlSession
} from "@/lib/jobs/crawl-jobs";

const USAGE = "Usage: crawl-session <status|events|confirm|decline> <sessionId>";

async function main(): Promise<void> {
  const [command, sessionId] = process.argv.slice(2);
  if (!command || !sessionId) {
    throw new Error(USAGE);
  }

  switch (command) {
    case "status": {
      const status = await getCrawlSessionStatus(sessionId);
      if (!status) {
        throw new Error(`Session not found: ${sessionId}`);
      }
      console.log(JSON.stringify(status, null, 2));
      return;
    }
    case "events": {
      for (const event of await listSessionEvents(sessionId)) {
        console.log(`${event.createdAt} ${event.severity.toUpperCase()} ${event.code} ${event.message}`);
      }
      return;
    }
    case "confirm": {
      if (!(await confirmCrawlSession(sessionId))) {
        console.log("[job:crawl] session is not awaiting confirmation; nothing to do");
        return;
      }
      const outcome = await waitForCrawlSession(sessionId);
      console.log(JSON.stringify(outcome, null, 2));
      return;
    }
    case "decline": {
      const declined = await declineCrawlSession(sessionId);
      console.log(
        declined ? "[job:crawl] session declined" : "[job:crawl] session is not awaiting confirmation; nothing to do"
      );
      return;
    }
    default:
      throw new Error(USAGE);
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
    console.error(error instanceof Error ? error.message : error);
    await shutdown();
    process.exit(1);
  });
