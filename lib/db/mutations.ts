import type { JSONValue } from "postgres";

import { sql } from "@/lib/db/client";
import { withWriteLock } from "@/lib/db/write-lock";
import type { CancellationToken } from "@/lib/scraping/cancellation";
import { allowedSourcesFor, progressFor } from "@/lib/scraping/session-state";
import { redactEventPayload } from "@/lib/security/redaction";
import {
  NOT_FOUND_TEXT,
  type CrawlItem,
  type EventSeverity,
  type ProductRecord,
  type SessionProgress,
  type SessionStatus,
  type VariantRecord
} from "@/lib/types";

const toJson = (value: unknown) => sql.json(value as JSONValue);

type Queryable = typeof sql;

export type ProductSaveResult =
  | { status: "saved"; productId: string; variants: number }
  | { status: "rejected"; reason: "missing_title" }
  | { status: "canceled" };

export type VariantBatchResult = { status: "saved"; count: number } | { status: "canceled" };

class WriteCanceledError extends Error {
  constructor(sessionId: string) {
    super(`Write canceled for session ${sessionId}`);
    this.name = "WriteCanceledError";
  }
}

export function hasUsableTitle(title: string | null | undefined): boolean {
  const trimmed = title?.trim() ?? "";
  return trimmed.length > 0 && trimmed !== NOT_FOUND_TEXT;
}

export function serializeCrawlItems(items: CrawlItem[]): { url: string; category: string | null }[] {
  return items.map((item) => ({
    url: item.url,
    category: item.kind === "categorized" ? item.category : null
  }));
}

async function writeProduct(q: Queryable, record: ProductRecord): Promise<string> {
  const rows = await q<
    {
      id: string;
    }[]
  >`
    insert into products (
      url,
      category,
      title,
      price,
      composition,
      skein_weight,
      skein_length,
      package_weight,
      image_url,
      last_updated,
      is_complete
    )
    values (
      ${record.url},
      ${record.category},
      ${record.title},
      ${record.price},
      ${record.composition},
      ${record.skeinWeight},
      ${record.skeinLength},
      ${record.packageWeight},
      ${record.imageUrl},
      ${record.lastUpdated},
      true
    )
    on conflict (url) do update
    set
      category = excluded.category,
      title = excluded.title,
      price = excluded.price,
      composition = excluded.composition,
      skein_weight = excluded.skein_weight,
      skein_length = excluded.skein_length,
      package_weight = excluded.package_weight,
      image_url = excluded.image_url,
      last_updated = excluded.last_updated,
      is_complete = true
    returning id
  `;

  return rows[0].id;
}

async function writeVariants(
  q: Queryable,
  productId: string,
  records: VariantRecord[],
  token: CancellationToken | null
): Promise<number> {
  for (const record of records) {
    if (token?.isCancelled) {
      throw new WriteCanceledError(token.sessionId);
    }

    await q`
      insert into variants (
        product_id,
        article_number,
        variant_name,
        is_available,
        image_url,
        last_updated,
        is_complete
      )
      values (
        ${productId},
        ${record.articleNumber},
        ${record.variantName},
        ${record.isAvailable},
        ${record.imageUrl},
        ${record.lastUpdated},
        true
      )
      on conflict (product_id, article_number, variant_name) do update
      set
        is_available = excluded.is_available,
        image_url = excluded.image_url,
        last_updated = excluded.last_updated,
        is_complete = true
    `;
  }

  return records.length;
}

/** Inserts or overwrites the product stored under `record.url`. Returns null for a title-less record. */
export async function upsertProduct(record: ProductRecord): Promise<string | null> {
  if (!hasUsableTitle(record.title)) {
    return null;
  }

  return withWriteLock(() =>
    sql.begin(async (tx) => {
      const q = tx as unknown as typeof sql;
      return writeProduct(q, record);
    })
  );
}

/**
 * Writes a product's variant set in one transaction. Any failing statement, or a
 * cancellation seen between variants, rolls the whole batch back.
 */
export async function upsertVariants(
  productId: string,
  records: VariantRecord[],
  token: CancellationToken | null = null
): Promise<VariantBatchResult> {
  try {
    const count = await withWriteLock(() =>
      sql.begin(async (tx) => {
        const q = tx as unknown as typeof sql;
        return writeVariants(q, productId, records, token);
      })
    );
    return { status: "saved", count };
  } catch (error) {
    if (error instanceof WriteCanceledError) {
      return { status: "canceled" };
    }
    throw error;
  }
}

/** Product row and its variants commit together or not at all. */
export async function saveCrawledProduct(
  product: ProductRecord,
  variants: VariantRecord[],
  token: CancellationToken | null = null
): Promise<ProductSaveResult> {
  if (!hasUsableTitle(product.title)) {
    return { status: "rejected", reason: "missing_title" };
  }

  if (token?.isCancelled) {
    return { status: "canceled" };
  }

  try {
    return await withWriteLock(() =>
      sql.begin(async (tx) => {
        const q = tx as unknown as typeof sql;
        const productId = await writeProduct(q, product);
        const count = await writeVariants(q, productId, variants, token);
        return { status: "saved" as const, productId, variants: count };
      })
    );
  } catch (error) {
    if (error instanceof WriteCanceledError) {
      return { status: "canceled" };
    }
    throw error;
  }
}

/** Deletes every product not marked complete; variants go with them through the cascade. */
export async function cleanupIncomplete(sessionId: string): Promise<number> {
  const rows = await withWriteLock(() =>
    sql.begin(async (tx) => {
      const q = tx as unknown as typeof sql;
      return q<
        {
          id: string;
        }[]
      >`
        delete from products
        where is_complete = false
        returning id
      `;
    })
  );

  console.log(`[crawl:${sessionId.slice(0, 8)}] cleanup removed ${rows.length} incomplete product(s)`);
  return rows.length;
}

export interface SessionStatusWrite {
  sessionId: string;
  status: SessionStatus;
  progress?: SessionProgress | null;
  pendingItems?: CrawlItem[];
  categoryName?: string | null;
  /** Restricts the move to sessions currently in this status. */
  from?: SessionStatus;
}

/**
 * The only writer of `crawl_sessions`. A session is created by writing
 * `collecting_urls`; every later write is a transition that applies only when the
 * stored status may move to the new one. Returns false when nothing was written.
 * Omitted pending items and category keep their stored values.
 */
export async function saveSessionStatus(input: SessionStatusWrite): Promise<boolean> {
  const progress = input.progress === undefined ? progressFor(input.status) : input.progress;
  const sources = allowedSourcesFor(input.status);
  const allowedFrom = input.from === undefined ? sources : sources.filter((status) => status === input.from);

  if (sources.length > 0 && allowedFrom.length === 0) {
    return false;
  }

  return withWriteLock(() =>
    sql.begin(async (tx) => {
      const q = tx as unknown as typeof sql;

      if (sources.length === 0) {
        const inserted = await q<
          {
            id: string;
          }[]
        >`
          insert into crawl_sessions (id, status, progress, pending_urls, category_name, created_at, updated_at)
          values (
            ${input.sessionId},
            ${input.status},
            ${progress},
            ${toJson(serializeCrawlItems(input.pendingItems ?? []))},
            ${input.categoryName ?? null},
            now(),
            now()
          )
          on conflict (id) do nothing
          returning id
        `;

        return inserted.length > 0;
      }

      const pending = input.pendingItems === undefined ? null : toJson(serializeCrawlItems(input.pendingItems));
      const updated = await q<
        {
          id: string;
        }[]
      >`
        update crawl_sessions
        set
          status = ${input.status},
          progress = ${progress},
          pending_urls = coalesce(${pending}::jsonb, pending_urls),
          category_name = coalesce(${input.categoryName ?? null}, category_name),
          updated_at = now()
        where id = ${input.sessionId}
          and status = any(${sql.array(allowedFrom)}::text[])
        returning id
      `;

      return updated.length > 0;
    })
  );
}

export async function recordSessionEvent(input: {
  sessionId: string;
  severity: EventSeverity;
  code: string;
  message: string;
  payload?: Record<string, unknown>;
}): Promise<void> {
  const payload = redactEventPayload(input.payload ?? {});

  await sql`
    insert into crawl_session_events (session_id, severity, code, message, payload)
    values (
      ${input.sessionId},
      ${input.severity},
      ${input.code},
      ${input.message},
      ${toJson(payload)}
    )
  `;
}
