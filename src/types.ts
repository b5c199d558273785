export type ExtractionMode = "page" | "pdf";

export type JobState = "pending" | "loading" | "settling" | "extracting" | "done";

export interface ExtractionResult {
  url: string;
  title: string;
  text: string;
  html: string;
  error?: string;
}

export interface ExtractedContent {
  title: string;
  text: string;
}

export type OutputFormat = "text" | "json" | "jsonl";

export interface ExtractOptions {
  pdf?: boolean;
  readable?: boolean;
}

export interface HealthStatus {
  status: "ok";
  queued: number;
  timestamp: string;
}
