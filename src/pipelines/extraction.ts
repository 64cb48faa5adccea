import * as cheerio from "cheerio";
import { ExtractionFormat } from "../domain/types.js";
import { tidyLines } from "../utils/text.js";

export interface MarkdownVariants {
  fit_markdown?: string | null;
  raw_markdown?: string | null;
}

export interface CrawlPayload {
  markdown?: string | MarkdownVariants | null;
  cleaned_html?: string | null;
  extracted_content?: string | null;
  content?: string | null;
}

export interface ExtractedContent {
  text: string;
  format: ExtractionFormat;
}

/**
 * Picks the richest representation a crawl produced: markdown first, then
 * cleaned HTML reduced to text, then whatever raw extraction is left.
 */
export function selectContent(payload: CrawlPayload): ExtractedContent | null {
  const markdown = pickMarkdown(payload.markdown);
  if (markdown) {
    return { text: markdown, format: "markdown" };
  }

  const html = payload.cleaned_html?.trim();
  if (html) {
    const text = htmlToText(html);
    if (text) {
      return { text, format: "cleaned_html" };
    }
  }

  const raw = payload.extracted_content?.trim() || payload.content?.trim();
  if (raw) {
    return { text: raw, format: "extracted_content" };
  }

  return null;
}

export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $("script, style, noscript, template").remove();

  const body = $("body");
  const text = body.length > 0 ? body.text() : $.root().text();
  return tidyLines(text);
}

function pickMarkdown(markdown: CrawlPayload["markdown"]): string | null {
  if (!markdown) {
    return null;
  }
  if (typeof markdown === "string") {
    return markdown.trim() || null;
  }
  return markdown.fit_markdown?.trim() || markdown.raw_markdown?.trim() || null;
}
