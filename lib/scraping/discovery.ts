import { env } from "@/lib/env";
import { extractCatalogs } from "@/lib/scraping/extractors";
import type { PageFetcher } from "@/lib/scraping/fetcher";
import type { CatalogRef } from "@/lib/types";

/** Reads the site's catalog menu. An unreachable home page yields no catalogs. */
export async function listCatalogs(fetchPage: PageFetcher, siteUrl: string = env.CATALOG_SITE_URL): Promise<CatalogRef[]> {
  const page = await fetchPage(siteUrl);
  if (!page.ok) {
    console.warn("[crawl] catalog discovery failed", {
      siteUrl,
      status: page.status,
      error: page.error
    });
    return [];
  }

  const catalogs = extractCatalogs(page.body, siteUrl);
  if (catalogs.length === 0) {
    console.warn("[crawl] catalog menu not found", { siteUrl });
  }

  return catalogs;
}
