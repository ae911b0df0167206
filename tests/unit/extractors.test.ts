import { describe, expect, it } from "vitest";

import { extractCatalogListing, extractCatalogs, extractProduct, extractVariants } from "@/lib/scraping/extractors";

const PAGE_URL = "https://shop.test/p/wool-classic";

const PRODUCT_HTML = `
<html><body>
  <h1 class="page-title">Wool Classic</h1>
  <span class="price">250 руб.</span>
  <div class="field">
    <div class="field-label">Состав:&nbsp;</div>
    <div class="field-items"><div class="field-item">100% шерсть</div></div>
  </div>
  <div class="field"><div class="field-label-inline-first">Вес мотка:</div> 100 г</div>
  <div class="field field-field-yarn-foto"><a href="/files/wool.jpg">photo</a></div>
  <div id="samples">
    <div class="sample">
      <div class="sample-img"><a href="/files/101.jpg">img</a></div>
      <span class="sample-number">101</span>
      <span class="sample-name">Red</span>
      <div class="add-cart-link"><a href="/cart/add/101">buy</a></div>
    </div>
    <div class="sample">
      <span class="sample-number">102</span>
      <span class="sample-name">Blue</span>
      <div class="add-cart-link"><a href="/cart/add/102">buy</a></div>
      <div class="no-exist">(нет)</div>
    </div>
    <div class="sample">
      <span class="sample-number">103</span>
    </div>
  </div>
</body></html>`;

describe("extractProduct", () => {
  it("reads the title, price and labelled fields", () => {
    const product = extractProduct({ html: PRODUCT_HTML, pageUrl: PAGE_URL, category: "Wool" });

    expect(product).toMatchObject({
      url: PAGE_URL,
      title: "Wool Classic",
      price: "250 руб.",
      composition: "100% шерсть",
      skeinWeight: "100 г",
      skeinLength: "Не найдено",
      packageWeight: "Не найдено",
      category: "Wool",
      imageUrl: "https://shop.test/files/wool.jpg"
    });
  });

  it("fills a missing price with the not-found placeholder", () => {
    const product = extractProduct({
      html: '<h1 class="page-title">Cotton Soft</h1>',
      pageUrl: PAGE_URL,
      category: null
    });

    expect(product?.price).toBe("Не найдено");
    expect(product?.imageUrl).toBeNull();
  });

  it("returns null for a page without product markup", () => {
    expect(extractProduct({ html: "<p>Страница не найдена</p>", pageUrl: PAGE_URL, category: null })).toBeNull();
  });
});

describe("extractVariants", () => {
  it("derives availability from the cart link and the out-of-stock marker", () => {
    const variants = extractVariants({ html: PRODUCT_HTML, pageUrl: PAGE_URL });

    expect(variants.map(({ articleNumber, variantName, isAvailable, imageUrl }) => ({
      articleNumber,
      variantName,
      isAvailable,
      imageUrl
    }))).toEqual([
      { articleNumber: "101", variantName: "Red", isAvailable: true, imageUrl: "https://shop.test/files/101.jpg" },
      { articleNumber: "102", variantName: "Blue", isAvailable: false, imageUrl: null },
      { articleNumber: "103", variantName: "Не найдено", isAvailable: false, imageUrl: null }
    ]);
  });
});

describe("extractCatalogListing", () => {
  it("collects one url per row and resolves the next page link", () => {
    const listing = extractCatalogListing(
      `<table class="views-table"><tbody>
        <tr><td class="views-field-title"><a href="/p/1">One</a></td></tr>
        <tr><td class="views-field-title"><a href="https://shop.test/p/2">Two</a></td></tr>
        <tr><td class="views-field-title">no link</td></tr>
      </tbody></table>
      <ul class="pager"><li class="pager-next"><a href="/catalog/wool?page=1">next</a></li></ul>`,
      "https://shop.test/catalog/wool"
    );

    expect(listing).toEqual({
      tableFound: true,
      productUrls: ["https://shop.test/p/1", "https://shop.test/p/2"],
      nextPageUrl: "https://shop.test/catalog/wool?page=1"
    });
  });

  it("falls back to the first table when the listing class is missing", () => {
    const listing = extractCatalogListing(
      '<table><tbody><tr><td class="views-field-title"><a href="/p/9">Nine</a></td></tr></tbody></table>',
      "https://shop.test/catalog/wool"
    );

    expect(listing).toEqual({ tableFound: true, productUrls: ["https://shop.test/p/9"], nextPageUrl: null });
  });

  it("reports a page without any table", () => {
    expect(extractCatalogListing("<div>empty</div>", "https://shop.test/catalog/wool")).toEqual({
      tableFound: false,
      productUrls: [],
      nextPageUrl: null
    });
  });
});

describe("extractCatalogs", () => {
  it("lists visible top-level menu entries once each", () => {
    const catalogs = extractCatalogs(
      `<div id="block-block-4"><ul class="menu catalog-menu level-0">
        <li><a href="/catalog/wool">Wool</a></li>
        <li class="hide"><a href="/catalog/archive">Archive</a></li>
        <li><a href="/catalog/cotton"> Cotton </a></li>
        <li><a href="/catalog/wool">Wool again</a></li>
      </ul></div>`,
      "https://shop.test"
    );

    expect(catalogs).toEqual([
      { name: "Wool", url: "https://shop.test/catalog/wool" },
      { name: "Cotton", url: "https://shop.test/catalog/cotton" }
    ]);
  });
});
