import { JSDOM } from "jsdom";
import { Readability } from "@mozilla/readability";
import { logger } from "./logger";
import type { ExtractedContent, ExtractionResult } from "./types";

export function cleanupText(text: string): string {
  return text.replace(/^[\n\r]+|[\n\r]+$/g, "").trim();
}

export function extractMainContent(
  html: string,
  url: string,
): ExtractedContent | null {
  try {
    const dom = new JSDOM(html, { url });
    try {
      const article = new Readability(dom.window.document).parse();
      if (!article) {
        return null;
      }
      return {
        title: article.title || "",
        text: cleanupText(article.textContent || ""),
      };
    } finally {
      dom.window.close();
    }
  } catch (error) {
    logger.warn("Article extraction failed", {
      url,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

/**
 * Article view of a rendered page: Readability's title and text in place of
 * the raw ones. PDF results, and pages without a recognisable article, come
 * back as they are.
 */
export function toReadable(result: ExtractionResult): ExtractionResult {
  if (!result.html) {
    return result;
  }
  const article = extractMainContent(result.html, result.url);
  if (!article || !article.text) {
    return result;
  }
  return {
    ...result,
    title: article.title || result.title,
    text: article.text,
  };
}
