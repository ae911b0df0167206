import * as cheerio from "cheerio";

import { NOT_FOUND_TEXT, type CatalogRef, type ProductRecord, type VariantRecord } from "@/lib/types";

// Markup of the catalog site this crawler targets.
const SELECTORS = {
  productTitle: "h1.page-title",
  productPrice: "span.price",
  field: "div.field",
  fieldLabel: "div.field-label",
  fieldInlineLabel: "div.field-label-inline-first",
  fieldValue: "div.field-item",
  mainImageLink: "div.field-field-yarn-foto a[href]",
  variant: "#samples div.sample",
  variantNumber: "span.sample-number",
  variantName: "span.sample-name",
  variantCartLink: "div.add-cart-link",
  variantOutOfStock: "div.no-exist",
  variantImageLink: "div.sample-img a[href]",
  listingTable: "table.views-table",
  listingTitleCell: "td.views-field-title",
  nextPageLink: "li.pager-next a[href]",
  catalogMenuItem: "#block-block-4 ul.menu.catalog-menu.level-0 > li"
} as const;

const FIELD_LABELS = {
  composition: "Состав",
  skeinWeight: "Вес мотка",
  skeinLength: "Длина мотка",
  packageWeight: "Вес упаковки"
} as const;

const OUT_OF_STOCK_MARKER = "(нет)";

export interface CatalogListing {
  tableFound: boolean;
  productUrls: string[];
  nextPageUrl: string | null;
}

function cleanupText(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}

function toAbsoluteUrl(baseUrl: string, href: string | undefined): string | null {
  if (!href) {
    return null;
  }

  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

function textOrNotFound(value: string): string {
  return value.length > 0 ? value : NOT_FOUND_TEXT;
}

export function extractLabelledField($: cheerio.CheerioAPI, label: string): string {
  for (const node of $(SELECTORS.field).toArray()) {
    const field = $(node);
    const blockLabel = field.find(SELECTORS.fieldLabel).first();
    const inlineLabel = field.find(SELECTORS.fieldInlineLabel).first();

    if (blockLabel.length > 0 && blockLabel.text().includes(label)) {
      const value = field.find(SELECTORS.fieldValue).first();
      if (value.length > 0) {
        return cleanupText(value.text());
      }
    } else if (inlineLabel.length > 0 && inlineLabel.text().includes(label)) {
      const full = cleanupText(inlineLabel.parent().text());
      return full.replace(cleanupText(inlineLabel.text()), "").trim();
    }
  }

  return NOT_FOUND_TEXT;
}

export function extractProduct(input: {
  html: string;
  pageUrl: string;
  category: string | null;
}): ProductRecord | null {
  const $ = cheerio.load(input.html);

  const looksLikeProduct =
    $(SELECTORS.productTitle).length > 0 || $(SELECTORS.productPrice).length > 0 || $(SELECTORS.variant).length > 0;
  if (!looksLikeProduct) {
    return null;
  }

  return {
    url: input.pageUrl,
    title: textOrNotFound(cleanupText($(SELECTORS.productTitle).first().text())),
    price: textOrNotFound(cleanupText($(SELECTORS.productPrice).first().text())),
    composition: extractLabelledField($, FIELD_LABELS.composition),
    skeinWeight: extractLabelledField($, FIELD_LABELS.skeinWeight),
    skeinLength: extractLabelledField($, FIELD_LABELS.skeinLength),
    packageWeight: extractLabelledField($, FIELD_LABELS.packageWeight),
    category: input.category,
    imageUrl: toAbsoluteUrl(input.pageUrl, $(SELECTORS.mainImageLink).first().attr("href")),
    lastUpdated: new Date()
  };
}

export function extractVariants(input: { html: string; pageUrl: string }): VariantRecord[] {
  const $ = cheerio.load(input.html);
  const lastUpdated = new Date();

  return $(SELECTORS.variant)
    .toArray()
    .map((node) => {
      const sample = $(node);
      const outOfStock = sample.find(SELECTORS.variantOutOfStock).first();
      const hasCartLink = sample.find(SELECTORS.variantCartLink).length > 0;

      return {
        articleNumber: textOrNotFound(cleanupText(sample.find(SELECTORS.variantNumber).first().text())),
        variantName: textOrNotFound(cleanupText(sample.find(SELECTORS.variantName).first().text())),
        isAvailable: hasCartLink && (outOfStock.length === 0 || cleanupText(outOfStock.text()) !== OUT_OF_STOCK_MARKER),
        imageUrl: toAbsoluteUrl(input.pageUrl, sample.find(SELECTORS.variantImageLink).first().attr("href")),
        lastUpdated
      };
    });
}

export function extractCatalogListing(html: string, pageUrl: string): CatalogListing {
  const $ = cheerio.load(html);
  const nextPageUrl = toAbsoluteUrl(pageUrl, $(SELECTORS.nextPageLink).first().attr("href"));

  let table = $(SELECTORS.listingTable).first();
  if (table.length === 0) {
    table = $("table").first();
  }

  if (table.length === 0) {
    return { tableFound: false, productUrls: [], nextPageUrl };
  }

  const productUrls = table
    .find("tbody tr")
    .toArray()
    .map((row) => {
      const href = $(row).find(SELECTORS.listingTitleCell).first().find("a[href]").first().attr("href");
      return toAbsoluteUrl(pageUrl, href);
    })
    .filter((url): url is string => url !== null);

  return { tableFound: true, productUrls, nextPageUrl };
}

export function extractCatalogs(html: string, siteUrl: string): CatalogRef[] {
  const $ = cheerio.load(html);
  const catalogs: CatalogRef[] = [];
  const seen = new Set<string>();

  for (const node of $(SELECTORS.catalogMenuItem).toArray()) {
    const item = $(node);
    if (item.hasClass("hide")) {
      continue;
    }

    const link = item.find("a[href]").first();
    const url = toAbsoluteUrl(siteUrl, link.attr("href"));
    const name = cleanupText(link.text());
    if (!url || !name || seen.has(url)) {
      continue;
    }

    seen.add(url);
    catalogs.push({ name, url });
  }

  return catalogs;
}
