/**
 * Sitemap XML parsing utilities
 */

import { JSDOM } from "jsdom";

export const SITEMAP_NS = "http://www.sitemaps.org/schemas/sitemap/0.9";

/**
 * Collect the text of every <url><loc> in document order.
 * Unparseable XML is logged and yields an empty list.
 */
export function extractUrls(document: Buffer | string): string[] {
  const xml = typeof document === "string" ? document : document.toString("utf8");

  let doc: Document;
  try {
    doc = new JSDOM(xml, { contentType: "application/xml" }).window.document;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.warn(`Could not parse sitemap XML: ${msg}`);
    return [];
  }
  if (doc.getElementsByTagName("parsererror").length > 0) {
    console.warn("Could not parse sitemap XML: parser error");
    return [];
  }

  const locs: string[] = [];
  for (const url of Array.from(doc.getElementsByTagNameNS(SITEMAP_NS, "url"))) {
    for (const child of Array.from(url.children)) {
      if (child.namespaceURI !== SITEMAP_NS || child.localName !== "loc") continue;
      const loc = (child.textContent ?? "").trim();
      if (loc) locs.push(loc);
    }
  }
  return locs;
}
