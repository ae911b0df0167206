import type { CancellationToken } from "@/lib/scraping/cancellation";
import { extractCatalogListing } from "@/lib/scraping/extractors";
import type { PageFetcher } from "@/lib/scraping/fetcher";
import { logSessionEvent } from "@/lib/scraping/session-log";

export type WalkStopReason = "last_page" | "page_limit" | "product_limit" | "canceled" | "fetch_failed" | "no_rows";

export interface CatalogWalkInput {
  sessionId: string | null;
  catalogUrl: string;
  maxPages: number | null;
  maxProducts: number | null;
  token: CancellationToken;
  fetchPage: PageFetcher;
}

export interface CatalogWalkResult {
  productUrls: string[];
  pagesVisited: number;
  stopReason: WalkStopReason;
}

/**
 * Follows a catalog's pagination and collects product URLs in discovery order.
 * Fetch or markup problems end the walk early with whatever was collected; they
 * are never thrown.
 */
export async function walkCatalog(input: CatalogWalkInput): Promise<CatalogWalkResult> {
  const productUrls: string[] = [];
  const seen = new Set<string>();
  const visitedPages = new Set<string>();
  let pageUrl: string | null = input.catalogUrl;
  let pagesVisited = 0;

  const finish = async (stopReason: WalkStopReason): Promise<CatalogWalkResult> => {
    await logSessionEvent(input.sessionId, {
      severity: "info",
      code: "CATALOG_WALK_FINISHED",
      message: `Collected ${productUrls.length} product URL(s) from ${input.catalogUrl} (${stopReason})`,
      payload: { catalogUrl: input.catalogUrl, pagesVisited, productUrls: productUrls.length, stopReason }
    });

    return { productUrls, pagesVisited, stopReason };
  };

  if (input.maxProducts !== null && input.maxProducts <= 0) {
    return finish("product_limit");
  }

  while (pageUrl) {
    if (input.maxPages !== null && pagesVisited >= input.maxPages) {
      return finish("page_limit");
    }

    if (input.token.isCancelled) {
      return finish("canceled");
    }

    visitedPages.add(pageUrl);
    const page = await input.fetchPage(pageUrl);
    if (!page.ok) {
      await logSessionEvent(input.sessionId, {
        severity: "warn",
        code: "CATALOG_PAGE_FETCH_FAILED",
        message: `Catalog page could not be fetched: ${pageUrl}`,
        payload: { pageUrl, status: page.status, error: page.error }
      });
      return finish("fetch_failed");
    }

    const listing = extractCatalogListing(page.body, pageUrl);
    if (!listing.tableFound || listing.productUrls.length === 0) {
      await logSessionEvent(input.sessionId, {
        severity: "warn",
        code: "CATALOG_PAGE_NO_ROWS",
        message: `No product rows on catalog page ${pageUrl}`,
        payload: { pageUrl, tableFound: listing.tableFound }
      });
      return finish("no_rows");
    }

    for (const productUrl of listing.productUrls) {
      if (seen.has(productUrl)) {
        continue;
      }

      seen.add(productUrl);
      productUrls.push(productUrl);

      if (input.maxProducts !== null && productUrls.length >= input.maxProducts) {
        pagesVisited += 1;
        return finish("product_limit");
      }
    }

    pagesVisited += 1;

    if (input.token.isCancelled) {
      return finish("canceled");
    }

    if (listing.nextPageUrl && visitedPages.has(listing.nextPageUrl)) {
      return finish("last_page");
    }

    pageUrl = listing.nextPageUrl;
  }

  return finish("last_page");
}
