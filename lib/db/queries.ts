import { z } from "zod";

import { sql } from "@/lib/db/client";
import { isSessionStatus } from "@/lib/scraping/session-state";
import {
  bareItem,
  categorizedItem,
  type CrawlItem,
  type CrawlSession,
  type CrawlSessionStatus,
  type EventSeverity,
  type SessionEvent,
  type SessionProgress,
  type SessionStatus
} from "@/lib/types";

const pendingItemsSchema = z.array(
  z.object({
    url: z.string().min(1),
    category: z.string().nullable().optional()
  })
);

const progressSchema = z.enum(["collecting_urls", "awaiting_confirmation", "parsing_products", "done"]);
const severitySchema = z.enum(["info", "warn", "error"]);

export function parsePendingItems(value: unknown): CrawlItem[] {
  const parsed = pendingItemsSchema.safeParse(value);
  if (!parsed.success) {
    console.warn("[crawl] ignoring malformed pending_urls", { issues: parsed.error.issues.length });
    return [];
  }

  return parsed.data.map((entry) => (entry.category ? categorizedItem(entry.url, entry.category) : bareItem(entry.url)));
}

function parseStatus(value: string): SessionStatus {
  if (!isSessionStatus(value)) {
    throw new Error(`Unknown session status stored: ${value}`);
  }
  return value;
}

function parseProgress(value: string | null): SessionProgress | null {
  const parsed = progressSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

function parseSeverity(value: string): EventSeverity {
  const parsed = severitySchema.safeParse(value);
  return parsed.success ? parsed.data : "info";
}

function toIso(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : value;
}

interface SessionRow {
  id: string;
  status: string;
  progress: string | null;
  pendingUrls: unknown;
  categoryName: string | null;
  createdAt: Date | string;
  updatedAt: Date | string;
}

/** Status poll. Reads straight from the table and never waits on the write lock. */
export async function getSessionStatus(sessionId: string): Promise<CrawlSessionStatus | null> {
  const session = await getCrawlSession(sessionId);
  if (!session) {
    return null;
  }

  return {
    status: session.status,
    pendingCount: session.pendingCount,
    progress: session.progress
  };
}

export async function getCrawlSession(sessionId: string): Promise<CrawlSession | null> {
  const rows = await sql<SessionRow[]>`
    select id, status, progress, pending_urls, category_name, created_at, updated_at
    from crawl_sessions
    where id = ${sessionId}
    limit 1
  `;

  const row = rows[0];
  if (!row) {
    return null;
  }

  const pendingItems = parsePendingItems(row.pendingUrls);

  return {
    id: row.id,
    status: parseStatus(row.status),
    progress: parseProgress(row.progress),
    pendingItems,
    pendingCount: pendingItems.length,
    categoryName: row.categoryName,
    createdAt: toIso(row.createdAt),
    updatedAt: toIso(row.updatedAt)
  };
}

export async function listSessionEvents(sessionId: string, limit = 200): Promise<SessionEvent[]> {
  const rows = await sql<
    {
      severity: string;
      code: string;
      message: string;
      payload: Record<string, unknown> | null;
      createdAt: Date | string;
    }[]
  >`
    select severity, code, message, payload, created_at
    from crawl_session_events
    where session_id = ${sessionId}
    order by id asc
    limit ${limit}
  `;

  return rows.map((row) => ({
    severity: parseSeverity(row.severity),
    code: row.code,
    message: row.message,
    payload: row.payload ?? {},
    createdAt: toIso(row.createdAt)
  }));
}

export interface StoredVariant {
  articleNumber: string;
  variantName: string;
  isAvailable: boolean;
  imageUrl: string | null;
}

export interface StoredProduct {
  id: string;
  url: string;
  title: string;
  price: string;
  composition: string;
  skeinWeight: string;
  skeinLength: string;
  packageWeight: string;
  category: string | null;
  imageUrl: string | null;
  lastUpdated: string;
  variants: StoredVariant[];
}

export async function listProductCategories(): Promise<string[]> {
  const rows = await sql<{ category: string }[]>`
    select distinct category
    from products
    where is_complete = true and category is not null
    order by category asc
  `;

  return rows.map((row) => row.category);
}

/** Complete products of one category with their variants, numeric article numbers first. */
export async function listProductsByCategory(category: string): Promise<StoredProduct[]> {
  const products = await sql<
    {
      id: string;
      url: string;
      title: string;
      price: string;
      composition: string;
      skeinWeight: string;
      skeinLength: string;
      packageWeight: string;
      category: string | null;
      imageUrl: string | null;
      lastUpdated: Date | string;
    }[]
  >`
    select
      id,
      url,
      title,
      price,
      composition,
      skein_weight,
      skein_length,
      package_weight,
      category,
      image_url,
      last_updated
    from products
    where category = ${category} and is_complete = true
    order by title asc
  `;

  if (products.length === 0) {
    return [];
  }

  const variants = await sql<
    {
      productId: string;
      articleNumber: string;
      variantName: string;
      isAvailable: boolean;
      imageUrl: string | null;
    }[]
  >`
    select product_id, article_number, variant_name, is_available, image_url
    from variants
    where product_id = any(${sql.array(products.map((product) => product.id))}::uuid[])
      and is_complete = true
    order by
      product_id,
      case when article_number ~ '^[0-9]+$' then 0 else 1 end,
      case when article_number ~ '^[0-9]+$' then article_number::numeric end,
      article_number
  `;

  const byProduct = new Map<string, StoredVariant[]>();
  for (const variant of variants) {
    const list = byProduct.get(variant.productId) ?? [];
    list.push({
      articleNumber: variant.articleNumber,
      variantName: variant.variantName,
      isAvailable: variant.isAvailable,
      imageUrl: variant.imageUrl
    });
    byProduct.set(variant.productId, list);
  }

  return products.map((product) => ({
    ...product,
    lastUpdated: toIso(product.lastUpdated),
    variants: byProduct.get(product.id) ?? []
  }));
}
