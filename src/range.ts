/**
 * Sitemap range helpers shared by the index builder and the browser search
 */

export interface SitemapRange {
  start: number;
  end: number;
}

/**
 * Outcome for one sitemap number. `passed` means the document was obtained
 * (index builder) or the term was found (browser search).
 */
export interface RangeItemResult {
  index: number;
  url: string;
  passed: boolean;
  detail?: string;
}

export const INDEX_PLACEHOLDER = "{index}";

/**
 * Ascending, inclusive list of sitemap numbers
 */
export function rangeIndices(range: SitemapRange): number[] {
  const out: number[] = [];
  for (let i = range.start; i <= range.end; i++) out.push(i);
  return out;
}

/**
 * Fill the sitemap number into a URL template
 */
export function sitemapUrl(template: string, index: number): string {
  return template.split(INDEX_PLACEHOLDER).join(String(index));
}

/**
 * Throw unless the range is 1-based, integral and not inverted
 */
export function validateRange(range: SitemapRange): SitemapRange {
  const { start, end } = range;
  if (!Number.isInteger(start) || start < 1) {
    throw new Error(`Invalid range start: ${start} (expected an integer >= 1)`);
  }
  if (!Number.isInteger(end) || end < start) {
    throw new Error(`Invalid range end: ${end} (expected an integer >= ${start})`);
  }
  return { start, end };
}
