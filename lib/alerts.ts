import { Resend } from "resend";

import { env } from "@/lib/env";

const resend = env.RESEND_API_KEY ? new Resend(env.RESEND_API_KEY) : null;

const ALERT_TIMEOUT_MS = 5_000;

export async function sendAdminAlert(subject: string, html: string): Promise<void> {
  if (!resend || !env.ALERT_FROM_EMAIL || !env.ALERT_TO_EMAIL) {
    console.warn("[alerts] missing resend configuration", { subject });
    return;
  }

  const { error } = await resend.emails.send({
    from: env.ALERT_FROM_EMAIL,
    to: env.ALERT_TO_EMAIL,
    subject,
    html
  });

  if (error) {
    throw new Error(`Alert delivery failed: ${error.message}`);
  }
}

/** Alert delivery never holds up a crawl; failures are logged and a slow send is abandoned. */
export async function sendAdminAlertWithTimeout(subject: string, html: string, timeoutMs = ALERT_TIMEOUT_MS): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, timeoutMs);
  });

  try {
    await Promise.race([sendAdminAlert(subject, html), timeoutPromise]);
  } catch (error) {
    console.warn("[alerts] failed to send admin alert", {
      subject,
      error: error instanceof Error ? error.message : "unknown"
    });
  } finally {
    clearTimeout(timer);
  }
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}
