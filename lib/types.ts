export type SessionStatus =
  | "collecting_urls"
  | "awaiting_confirmation"
  | "parsing_products"
  | "complete"
  | "canceled"
  | "error";

export type SessionProgress = "collecting_urls" | "awaiting_confirmation" | "parsing_products" | "done";

export type CrawlMode = "single_item" | "one_catalog" | "all_catalogs";

export type EventSeverity = "info" | "warn" | "error";

export type ItemFailureKind = "network" | "extraction" | "rejected" | "storage";

/** Placeholder the catalog site prints where a field has no value. */
export const NOT_FOUND_TEXT = "Не найдено";

/** Stored on products whose item and session both lack a category. */
export const UNKNOWN_CATEGORY = "Unknown";

/**
 * A discovered product URL. Single-catalog runs produce bare URLs that take the
 * session's default category; all-catalog runs tag each URL with its catalog.
 */
export type CrawlItem = { kind: "url"; url: string } | { kind: "categorized"; url: string; category: string };

export function bareItem(url: string): CrawlItem {
  return { kind: "url", url };
}

export function categorizedItem(url: string, category: string): CrawlItem {
  return { kind: "categorized", url, category };
}

export function resolveItemCategory(item: CrawlItem, defaultCategory: string | null): string {
  return item.kind === "categorized" ? item.category : defaultCategory ?? UNKNOWN_CATEGORY;
}

export interface ProductRecord {
  url: string;
  title: string;
  price: string;
  composition: string;
  skeinWeight: string;
  skeinLength: string;
  packageWeight: string;
  category: string | null;
  imageUrl: string | null;
  lastUpdated: Date;
}

export interface VariantRecord {
  articleNumber: string;
  variantName: string;
  isAvailable: boolean;
  imageUrl: string | null;
  lastUpdated: Date;
}

export interface CatalogRef {
  name: string;
  url: string;
}

export interface CrawlSessionStatus {
  status: SessionStatus;
  pendingCount: number;
  progress: SessionProgress | null;
}

export interface CrawlSession extends CrawlSessionStatus {
  id: string;
  pendingItems: CrawlItem[];
  categoryName: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface SessionEvent {
  severity: EventSeverity;
  code: string;
  message: string;
  payload: Record<string, unknown>;
  createdAt: string;
}

export interface IngestionSummary {
  attempted: number;
  saved: number;
  failures: Record<ItemFailureKind, number>;
}

export interface CrawlRunOutcome {
  sessionId: string;
  mode: CrawlMode | "resume";
  status: SessionStatus;
  discovered: number;
  ingestion: IngestionSummary;
  message: string;
}
