import { recordSessionEvent } from "@/lib/db/mutations";
import type { EventSeverity } from "@/lib/types";

export interface SessionLogEntry {
  severity: EventSeverity;
  code: string;
  message: string;
  payload?: Record<string, unknown>;
}

function prefix(sessionId: string | null): string {
  return sessionId ? `[crawl:${sessionId.slice(0, 8)}]` : "[crawl]";
}

/** Writes to the console and, for a known session, to its event log. */
export async function logSessionEvent(sessionId: string | null, entry: SessionLogEntry): Promise<void> {
  const line = `${prefix(sessionId)} ${entry.message}`;

  if (entry.severity === "error") {
    console.error(line, entry.payload ?? {});
  } else if (entry.severity === "warn") {
    console.warn(line, entry.payload ?? {});
  } else {
    console.log(line);
  }

  if (!sessionId) {
    return;
  }

  try {
    await recordSessionEvent({
      sessionId,
      severity: entry.severity,
      code: entry.code,
      message: entry.message,
      payload: entry.payload
    });
  } catch (error) {
    console.warn("[crawl] session event was not recorded", {
      sessionId,
      code: entry.code,
      error: error instanceof Error ? error.message : "unknown"
    });
  }
}
