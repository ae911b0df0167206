import type { SessionProgress, SessionStatus } from "@/lib/types";

export const CONFIRMATION_THRESHOLD = 5;

const SESSION_STATUSES: readonly SessionStatus[] = [
  "collecting_urls",
  "awaiting_confirmation",
  "parsing_products",
  "complete",
  "canceled",
  "error"
];

const TRANSITIONS: Record<SessionStatus, readonly SessionStatus[]> = {
  collecting_urls: ["awaiting_confirmation", "parsing_products", "canceled", "error"],
  awaiting_confirmation: ["parsing_products", "canceled", "error"],
  parsing_products: ["complete", "canceled", "error"],
  complete: [],
  canceled: [],
  error: []
};

const PROGRESS_BY_STATUS: Record<SessionStatus, SessionProgress | null> = {
  collecting_urls: "collecting_urls",
  awaiting_confirmation: "awaiting_confirmation",
  parsing_products: "parsing_products",
  complete: "done",
  canceled: null,
  error: null
};

export function isSessionStatus(value: string): value is SessionStatus {
  return SESSION_STATUSES.some((status) => status === value);
}

export function isTerminalStatus(status: SessionStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function canTransition(from: SessionStatus, to: SessionStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * States a session must currently be in for a move to `to` to apply. An empty list
 * means `to` can only be written for a session that does not exist yet.
 */
export function allowedSourcesFor(to: SessionStatus): SessionStatus[] {
  return SESSION_STATUSES.filter((from) => canTransition(from, to));
}

export function progressFor(status: SessionStatus): SessionProgress | null {
  return PROGRESS_BY_STATUS[status];
}

export function requiresConfirmation(discoveredCount: number): boolean {
  return discoveredCount > CONFIRMATION_THRESHOLD;
}
