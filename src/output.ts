import type { ExtractionResult, OutputFormat } from "./types";

export const RESULT_SEPARATOR = "=".repeat(60);

function serializable(result: ExtractionResult): Required<ExtractionResult> {
  return {
    url: result.url,
    title: result.title,
    text: result.text,
    html: result.html,
    error: result.error ?? "",
  };
}

/** Stdout part of a text-format result; errors go to stderr separately. */
export function formatText(result: ExtractionResult, html: boolean = false): string {
  const body = html ? result.html : result.text;
  if (!result.title) {
    return body;
  }
  return `=== ${result.title} ===\nURL: ${result.url}\n\n${body}`;
}

export function formatResult(
  result: ExtractionResult,
  format: OutputFormat = "text",
  html: boolean = false,
): string {
  switch (format) {
    case "json":
    case "jsonl":
      return JSON.stringify(serializable(result));
    case "text":
    default:
      return formatText(result, html);
  }
}

export function formatResults(
  results: ExtractionResult[],
  format: OutputFormat = "text",
  html: boolean = false,
): string {
  if (format === "json") {
    return results.length === 1 && results[0]
      ? formatResult(results[0], "json")
      : JSON.stringify(results.map(serializable));
  }

  if (format === "jsonl") {
    return results.map((result) => formatResult(result, "jsonl")).join("\n");
  }

  return results
    .map((result) => formatText(result, html))
    .join(results.length > 1 ? `\n\n${RESULT_SEPARATOR}\n\n` : "");
}
