import { randomUUID } from "crypto";
import { Pool } from "pg";
import { desc, eq, sql } from "drizzle-orm";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import type { AnalysisResult } from "@shared/analysis-types";
import type { AnalysisHistoryEntry, HistorySummary } from "@shared/history-types";
import { analysisEntries, analysisResults, insertAnalysisEntrySchema } from "@shared/schema";
import type { AnalysisEntryRow, InsertAnalysisEntry } from "@shared/schema";
import { getDomainFromUrl } from "./analysis/url-utils";

const MAX_MEMORY_ENTRIES = 1000;
const RECENT_LIMIT = 20;

export interface HistoryStore {
  recordAnalysis(result: AnalysisResult): Promise<AnalysisHistoryEntry>;
  getSummary(): Promise<HistorySummary>;
  getAll(): Promise<AnalysisHistoryEntry[]>;
  getResultById(id: string): Promise<AnalysisResult | undefined>;
}

function emptyDistribution(): Record<string, number> {
  return { "0-20": 0, "21-40": 0, "41-60": 0, "61-80": 0, "81-100": 0 };
}

function loadLocalEnvFiles(): void {
  if (typeof process.loadEnvFile !== "function") {
    return;
  }

  for (const envPath of [".env.local", ".env"]) {
    try {
      process.loadEnvFile(envPath);
    } catch (error) {
      const code = error instanceof Error && "code" in error ? error.code : undefined;
      if (code !== "ENOENT") {
        console.warn(`[history] Failed to load ${envPath}:`, error);
      }
    }
  }
}

function toEntryValues(result: AnalysisResult): InsertAnalysisEntry {
  return insertAnalysisEntrySchema.parse({
    url: result.url,
    domain: getDomainFromUrl(result.url),
    siteName: result.siteName,
    score: result.score,
    recommendationCount: result.recommendations.length,
    loadTimeSeconds: result.meta.loadTimeSeconds,
  });
}

/**
 * Entries are expected newest first.
 */
export function summarizeEntries(entries: AnalysisHistoryEntry[]): HistorySummary {
  const totalAnalyses = entries.length;
  const scoreDistribution = emptyDistribution();

  if (totalAnalyses === 0) {
    return { totalAnalyses: 0, avgScore: 0, scoreDistribution, recentAnalyses: [] };
  }

  const avgScore = Math.round(entries.reduce((sum, item) => sum + item.score, 0) / totalAnalyses);

  for (const entry of entries) {
    if (entry.score <= 20) scoreDistribution["0-20"] += 1;
    else if (entry.score <= 40) scoreDistribution["21-40"] += 1;
    else if (entry.score <= 60) scoreDistribution["41-60"] += 1;
    else if (entry.score <= 80) scoreDistribution["61-80"] += 1;
    else scoreDistribution["81-100"] += 1;
  }

  return {
    totalAnalyses,
    avgScore,
    scoreDistribution,
    recentAnalyses: entries.slice(0, RECENT_LIMIT),
  };
}

export class MemoryHistoryStore implements HistoryStore {
  private entries: AnalysisHistoryEntry[] = [];
  private results: Map<string, AnalysisResult> = new Map();

  async recordAnalysis(result: AnalysisResult): Promise<AnalysisHistoryEntry> {
    const values = toEntryValues(result);

    const replaced = this.entries.filter((entry) => entry.domain === values.domain);
    if (replaced.length > 0) {
      this.entries = this.entries.filter((entry) => entry.domain !== values.domain);
      for (const item of replaced) {
        this.results.delete(item.id);
      }
    }

    const entry: AnalysisHistoryEntry = {
      id: randomUUID(),
      ...values,
      createdAt: new Date().toISOString(),
    };

    this.entries.unshift(entry);
    this.results.set(entry.id, result);

    if (this.entries.length > MAX_MEMORY_ENTRIES) {
      const removed = this.entries.splice(MAX_MEMORY_ENTRIES);
      for (const item of removed) {
        this.results.delete(item.id);
      }
    }

    return entry;
  }

  async getSummary(): Promise<HistorySummary> {
    return summarizeEntries(this.entries);
  }

  async getAll(): Promise<AnalysisHistoryEntry[]> {
    return [...this.entries];
  }

  async getResultById(id: string): Promise<AnalysisResult | undefined> {
    return this.results.get(id);
  }
}

export class PostgresHistoryStore implements HistoryStore {
  private readonly db: NodePgDatabase;

  constructor(databaseUrl: string) {
    this.db = drizzle(new Pool({ connectionString: databaseUrl }));
  }

  private mapEntryRow(row: AnalysisEntryRow): AnalysisHistoryEntry {
    return {
      id: row.id,
      url: row.url,
      domain: row.domain,
      siteName: row.siteName,
      score: row.score,
      recommendationCount: row.recommendationCount,
      loadTimeSeconds: row.loadTimeSeconds,
      createdAt: row.createdAt.toISOString(),
    };
  }

  async recordAnalysis(result: AnalysisResult): Promise<AnalysisHistoryEntry> {
    const values = toEntryValues(result);

    const entry = await this.db.transaction(async (tx) => {
      const [row] = await tx
        .insert(analysisEntries)
        .values(values)
        .onConflictDoUpdate({
          target: analysisEntries.domain,
          set: {
            url: values.url,
            siteName: values.siteName,
            score: values.score,
            recommendationCount: values.recommendationCount,
            loadTimeSeconds: values.loadTimeSeconds,
            createdAt: sql`now()`,
          },
        })
        .returning();

      await tx
        .insert(analysisResults)
        .values({ entryId: row.id, resultJson: result })
        .onConflictDoUpdate({
          target: analysisResults.entryId,
          set: { resultJson: result, createdAt: sql`now()` },
        });

      return row;
    });

    return this.mapEntryRow(entry);
  }

  async getSummary(): Promise<HistorySummary> {
    return summarizeEntries(await this.getAll());
  }

  async getAll(): Promise<AnalysisHistoryEntry[]> {
    const rows = await this.db.select().from(analysisEntries).orderBy(desc(analysisEntries.createdAt));
    return rows.map((row) => this.mapEntryRow(row));
  }

  async getResultById(id: string): Promise<AnalysisResult | undefined> {
    const rows = await this.db
      .select({ resultJson: analysisResults.resultJson })
      .from(analysisResults)
      .where(eq(analysisResults.entryId, id))
      .limit(1);

    return rows[0]?.resultJson;
  }
}

export function createHistoryStore(databaseUrl: string | undefined = process.env.DATABASE_URL): HistoryStore {
  if (databaseUrl) {
    console.log("[history] Using Postgres history store.");
    return new PostgresHistoryStore(databaseUrl);
  }
  console.warn("[history] DATABASE_URL not set, falling back to in-memory history store.");
  return new MemoryHistoryStore();
}

loadLocalEnvFiles();

export const historyStore: HistoryStore = createHistoryStore();
