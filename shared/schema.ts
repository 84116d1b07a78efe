import { doublePrecision, integer, jsonb, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";
import type { AnalysisResult } from "./analysis-types";

export const analysisEntries = pgTable("analysis_entries", {
  id: uuid("id").primaryKey().defaultRandom(),
  url: text("url").notNull(),
  domain: text("domain").notNull().unique(),
  siteName: text("site_name").notNull(),
  score: doublePrecision("score").notNull(),
  recommendationCount: integer("recommendation_count").notNull(),
  loadTimeSeconds: doublePrecision("load_time_seconds").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});

export const analysisResults = pgTable("analysis_results", {
  entryId: uuid("entry_id").primaryKey().references(() => analysisEntries.id, { onDelete: "cascade" }),
  resultJson: jsonb("result_json").$type<AnalysisResult>().notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});

export const insertAnalysisEntrySchema = createInsertSchema(analysisEntries).omit({
  id: true,
  createdAt: true,
});

export type InsertAnalysisEntry = z.infer<typeof insertAnalysisEntrySchema>;
export type AnalysisEntryRow = typeof analysisEntries.$inferSelect;
export type AnalysisResultRow = typeof analysisResults.$inferSelect;
