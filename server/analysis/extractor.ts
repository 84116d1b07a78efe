import type { Headings, ImageStats, KeywordEntry, LinkSet, MetaData } from "@shared/analysis-types";
import { HEADING_LEVELS } from "@shared/analysis-types";
import type { PageDocument } from "./types";
import { getHost, resolveHref } from "./url-utils";

export const NO_TITLE = "No title found";
export const NO_DESCRIPTION = "No description found";
export const NO_KEYWORDS = "No keywords found";
export const NOT_SET = "Not set";

export const DEFAULT_TOP_KEYWORDS = 20;
const MIN_KEYWORD_LENGTH = 4;

const STOP_WORDS = new Set([
  "the", "a", "an", "and", "or", "but", "in", "on", "at", "to", "for",
  "of", "with", "is", "was", "are", "be", "been", "have", "has", "had",
  "do", "does", "did", "will", "would", "could", "should", "may", "might",
  "this", "that", "these", "those", "it", "its", "from", "by", "as",
]);

function metaContent(doc: PageDocument, selector: string, fallback: string): string {
  return doc.$(selector).first().attr("content") || fallback;
}

export function extractMetaData(doc: PageDocument): MetaData {
  const $title = doc.$("title").first();
  // An empty <title> is still a title: only a missing element gets the sentinel.
  const title = $title.length > 0 ? $title.text().trim() : NO_TITLE;
  const description = metaContent(doc, 'meta[name="description"]', NO_DESCRIPTION);

  return {
    title,
    titleLength: title.length,
    description,
    descriptionLength: description.length,
    metaKeywords: metaContent(doc, 'meta[name="keywords"]', NO_KEYWORDS),
    ogTitle: metaContent(doc, 'meta[property="og:title"]', NOT_SET),
    ogDescription: metaContent(doc, 'meta[property="og:description"]', NOT_SET),
  };
}

export function extractHeadings(doc: PageDocument): Headings {
  const headings: Headings = { h1: [], h2: [], h3: [], h4: [], h5: [], h6: [] };
  for (const level of HEADING_LEVELS) {
    doc.$(level).each((_, el) => {
      headings[level].push(doc.$(el).text().trim());
    });
  }
  return headings;
}

/**
 * Ranks the words of `text` by frequency. Only ASCII letters survive
 * normalisation, so "web3.0" counts as "web". Ties keep first-seen order.
 */
export function extractKeywords(text: string, topN: number = DEFAULT_TOP_KEYWORDS): KeywordEntry[] {
  if (topN <= 0) return [];

  const cleaned = text.toLowerCase().replace(/[^a-z\s]/g, "");
  const counts = new Map<string, number>();

  for (const word of cleaned.split(/\s+/)) {
    if (word.length < MIN_KEYWORD_LENGTH || STOP_WORDS.has(word)) continue;
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }

  return Array.from(counts, ([term, frequency]) => ({ term, frequency }))
    .sort((a, b) => b.frequency - a.frequency)
    .slice(0, topN);
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function classifyLinks(doc: PageDocument, baseUrl: string): LinkSet {
  const baseHost = getHost(baseUrl);
  const internal: string[] = [];
  const external: string[] = [];

  doc.$("a[href]").each((_, el) => {
    const href = doc.$(el).attr("href") ?? "";
    const resolved = resolveHref(href, baseUrl);
    if (resolved.host === baseHost || resolved.host === "") {
      internal.push(resolved.url);
    } else {
      external.push(resolved.url);
    }
  });

  return { internal, external };
}

export function auditImages(doc: PageDocument): ImageStats {
  const images = doc.$("img");
  let withAlt = 0;
  images.each((_, el) => {
    if (doc.$(el).attr("alt")) {
      withAlt++;
    }
  });

  return {
    total: images.length,
    withAlt,
    withoutAlt: images.length - withAlt,
  };
}
