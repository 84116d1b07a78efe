import { z } from "zod";
import type { CheerioAPI } from "cheerio";

export const BROWSER_USER_AGENT = "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36";

export const AnalysisConfigSchema = z.object({
  url: z.string().url(),
  timeoutMs: z.number().int().positive().default(10000),
  userAgent: z.string().default(BROWSER_USER_AGENT),
  topKeywords: z.number().int().positive().default(20),
  blockPrivateHosts: z.boolean().default(false),
});

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;

export interface PageDocument {
  $: CheerioAPI;
  html: string;
}

export interface FetchedPage {
  html: string;
  statusCode: number;
  loadTimeSeconds: number;
}

export type FetchErrorReason = "network" | "timeout" | "status" | "blocked";

export class FetchError extends Error {
  readonly reason: FetchErrorReason;
  readonly statusCode?: number;

  constructor(reason: FetchErrorReason, message: string, statusCode?: number) {
    super(message);
    this.name = "FetchError";
    this.reason = reason;
    this.statusCode = statusCode;
  }
}

export type FetchOutcome = { page: FetchedPage } | { error: FetchError };

export interface FetchInfo {
  statusCode: number;
  loadTimeSeconds: number;
}

export interface AnalyzeOptions {
  topKeywords?: number;
}
