import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { fileURLToPath } from "node:url";
import { errorMessage } from "./errors";
import { logger } from "./logger";
import type { ExtractionResult } from "./types";

/** Returns the text of each page, in order. */
export type PdfTextReader = (data: Uint8Array) => Promise<string[]>;

export interface PdfOptions {
  timeoutMs: number;
  userAgent?: string;
  reader?: PdfTextReader;
}

const REMOTE_PROTOCOLS = new Set(["http:", "https:", "ftp:"]);

function parseUrl(source: string): URL | null {
  try {
    return new URL(source);
  } catch {
    return null;
  }
}

/** `.pdf` path suffix, ignoring query and fragment. */
export function hasPdfSuffix(url: string): boolean {
  const path = url.toLowerCase().split("?")[0]?.split("#")[0] ?? "";
  return path.replace(/\/+$/, "").endsWith(".pdf");
}

/**
 * Suffix check first; for http(s) URLs without one, a HEAD request decides
 * by Content-Type. Network failures count as "not a PDF".
 */
export async function detectPdf(
  url: string,
  options: { userAgent?: string; timeoutMs?: number } = {},
): Promise<boolean> {
  if (hasPdfSuffix(url)) return true;

  const parsed = parseUrl(url);
  if (!parsed || (parsed.protocol !== "http:" && parsed.protocol !== "https:")) {
    return false;
  }

  try {
    const response = await fetch(url, {
      method: "HEAD",
      headers: options.userAgent ? { "User-Agent": options.userAgent } : {},
      signal: AbortSignal.timeout(options.timeoutMs ?? 10000),
    });
    const contentType = response.headers.get("content-type") ?? "";
    return contentType.toLowerCase().includes("application/pdf");
  } catch (error) {
    logger.debug("PDF probe failed", { url, error: errorMessage(error) });
    return false;
  }
}

export function pdfTitle(source: string): string {
  const parsed = parseUrl(source);
  if (parsed && (REMOTE_PROTOCOLS.has(parsed.protocol) || parsed.protocol === "file:")) {
    const name = basename(parsed.pathname);
    try {
      return decodeURIComponent(name);
    } catch {
      // a stray "%" is not an escape
      return name;
    }
  }
  return basename(source);
}

export const readPdfPages: PdfTextReader = async (data) => {
  const pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
  const document = await pdfjs.getDocument({
    data,
    isEvalSupported: false,
    useSystemFonts: true,
  }).promise;

  try {
    const pages: string[] = [];
    for (let number = 1; number <= document.numPages; number += 1) {
      const page = await document.getPage(number);
      const content = await page.getTextContent();
      let text = "";
      for (const item of content.items) {
        if ("str" in item) {
          text += item.str + (item.hasEOL ? "\n" : "");
        }
      }
      pages.push(text.trim());
      page.cleanup();
    }
    return pages;
  } finally {
    await document.destroy();
  }
};

async function loadSource(
  source: string,
  options: PdfOptions,
): Promise<{ data: Uint8Array } | { error: string }> {
  const parsed = parseUrl(source);

  if (parsed && REMOTE_PROTOCOLS.has(parsed.protocol)) {
    const response = await fetch(source, {
      headers: options.userAgent ? { "User-Agent": options.userAgent } : {},
      signal: AbortSignal.timeout(options.timeoutMs),
    });
    if (!response.ok) {
      return { error: `Failed to fetch PDF: HTTP ${response.status}` };
    }
    return { data: new Uint8Array(await response.arrayBuffer()) };
  }

  const path = parsed?.protocol === "file:" ? fileURLToPath(parsed) : source;
  return { data: new Uint8Array(await readFile(path)) };
}

/**
 * Text of a PDF at a URL or local path. Every failure ends up in
 * `result.error` with empty text; this never throws.
 */
export async function extractPdf(
  source: string,
  options: PdfOptions,
): Promise<ExtractionResult> {
  const result: ExtractionResult = { url: source, title: "", text: "", html: "" };
  const reader = options.reader ?? readPdfPages;

  try {
    const loaded = await loadSource(source, options);
    if ("error" in loaded) {
      result.error = loaded.error;
      return result;
    }

    let pages: string[];
    try {
      pages = await reader(loaded.data);
    } catch (error) {
      result.error = `Failed to load PDF: ${errorMessage(error)}`;
      return result;
    }

    result.text = pages.join("\n\n");
    result.title = pdfTitle(source);
  } catch (error) {
    result.error = errorMessage(error);
  }

  return result;
}
