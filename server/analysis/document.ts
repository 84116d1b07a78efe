import * as cheerio from "cheerio";
import type { PageDocument } from "./types";

const NON_VISIBLE_SELECTORS = ["script", "style", "noscript", "template"];

// Parse <noscript> content as markup so fallback images and headings are counted.
const LOAD_OPTIONS = { scriptingEnabled: false };

export function parseDocument(html: string): PageDocument {
  return { $: cheerio.load(html, LOAD_OPTIONS), html };
}

/**
 * Text of the whole document minus script-like content. Works on its own parse
 * so the shared document stays untouched. Element texts are joined as-is, so
 * `<p>one</p><p>two</p>` reads "onetwo".
 */
export function extractVisibleText(doc: PageDocument): string {
  const $ = cheerio.load(doc.html, LOAD_OPTIONS);
  NON_VISIBLE_SELECTORS.forEach((sel) => {
    $(sel).remove();
  });
  return $.root().text();
}
