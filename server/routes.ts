import type { Express, Request, Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import type { AnalysisResult } from "@shared/analysis-types";
import { runAnalysis, FetchError } from "./analysis";
import { historyStore, type HistoryStore } from "./history";
import { generateMarkdown, keywordsCsvFilename, keywordsToCsv } from "./export";

const AnalyzeRequestSchema = z.object({
  url: z.string().url(),
  timeoutMs: z.coerce.number().int().positive().optional(),
  userAgent: z.string().optional(),
  topKeywords: z.coerce.number().int().positive().optional(),
});

const headingTexts = z.array(z.string());
const priority = z.enum(["Critical", "High", "Medium", "Low"]);

const AnalysisResultSchema = z.object({
  url: z.string(),
  siteName: z.string(),
  metaData: z.object({
    title: z.string(),
    titleLength: z.number(),
    description: z.string(),
    descriptionLength: z.number(),
    metaKeywords: z.string(),
    ogTitle: z.string(),
    ogDescription: z.string(),
  }),
  headings: z.object({
    h1: headingTexts,
    h2: headingTexts,
    h3: headingTexts,
    h4: headingTexts,
    h5: headingTexts,
    h6: headingTexts,
  }),
  keywords: z.array(z.object({ term: z.string(), frequency: z.number() })),
  links: z.object({ internal: z.array(z.string()), external: z.array(z.string()) }),
  images: z.object({ total: z.number(), withAlt: z.number(), withoutAlt: z.number() }),
  checks: z.array(z.object({ name: z.string(), passed: z.boolean() })),
  score: z.number(),
  recommendations: z.array(
    z.object({ priority, category: z.string(), issue: z.string(), recommendation: z.string() })
  ),
  overview: z.object({
    wordCount: z.number(),
    headingCounts: z.object({
      h1: z.number().optional(),
      h2: z.number().optional(),
      h3: z.number().optional(),
      h4: z.number().optional(),
      h5: z.number().optional(),
      h6: z.number().optional(),
    }),
    totalHeadings: z.number(),
    totalLinks: z.number(),
    internalLinkCount: z.number(),
    externalLinkCount: z.number(),
    secure: z.boolean(),
    scoreStatus: z.enum(["Good", "Needs Work"]),
    scoreVerdict: z.enum(["Excellent SEO!", "Good, but can improve", "Needs improvement"]),
    loadSpeed: z.enum(["Fast", "Slow"]),
    recommendationCounts: z.object({
      Critical: z.number(),
      High: z.number(),
      Medium: z.number(),
      Low: z.number(),
    }),
  }),
  meta: z.object({ statusCode: z.number(), loadTimeSeconds: z.number() }),
}) satisfies z.ZodType<AnalysisResult>;

function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error && error.message ? error.message : fallback;
}

function attachmentName(base: string, ext: string): string {
  return `${base}-${new Date().toISOString().split("T")[0]}.${ext}`;
}

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  store: HistoryStore = historyStore
): Promise<Server> {
  app.post("/api/analyze", async (req: Request, res: Response) => {
    const parsed = AnalyzeRequestSchema.safeParse(req.body);

    if (!parsed.success) {
      res.status(400).json({
        error: true,
        message: "Invalid request body",
        details: parsed.error.errors,
      });
      return;
    }

    try {
      const result = await runAnalysis({ ...parsed.data, blockPrivateHosts: true });

      await store.recordAnalysis(result);

      res.json(result);
    } catch (error) {
      if (error instanceof FetchError) {
        res.status(error.reason === "blocked" ? 403 : 502).json({
          error: true,
          message: `Failed to fetch website: ${error.message}`,
          reason: error.reason,
          ...(error.statusCode !== undefined ? { statusCode: error.statusCode } : {}),
        });
        return;
      }

      res.status(500).json({
        error: true,
        message: errorMessage(error, "An error occurred during the analysis"),
      });
    }
  });

  app.post("/api/export/keywords", (req: Request, res: Response) => {
    const parsed = AnalysisResultSchema.safeParse(req.body);

    if (!parsed.success) {
      res.status(400).json({
        error: true,
        message: "Invalid analysis result data",
      });
      return;
    }

    const result = parsed.data;

    res.setHeader("Content-Type", "text/csv; charset=utf-8");
    res.setHeader("Content-Disposition", `attachment; filename="${keywordsCsvFilename(result.siteName)}"`);
    res.send(keywordsToCsv(result.keywords));
  });

  app.post("/api/export/markdown", (req: Request, res: Response) => {
    const parsed = AnalysisResultSchema.safeParse(req.body);

    if (!parsed.success) {
      res.status(400).json({
        error: true,
        message: "Invalid analysis result data",
      });
      return;
    }

    const result = parsed.data;

    try {
      const markdown = generateMarkdown(result);

      res.setHeader("Content-Type", "text/markdown; charset=utf-8");
      res.setHeader("Content-Disposition", `attachment; filename="${attachmentName("seo-report", "md")}"`);
      res.send(markdown);
    } catch (error) {
      res.status(500).json({
        error: true,
        message: errorMessage(error, "Failed to generate export"),
      });
    }
  });

  app.get("/api/history", async (_req: Request, res: Response) => {
    try {
      res.json(await store.getAll());
    } catch (error) {
      res.status(500).json({
        error: true,
        message: errorMessage(error, "Failed to fetch history"),
      });
    }
  });

  app.get("/api/history/summary", async (_req: Request, res: Response) => {
    try {
      res.json(await store.getSummary());
    } catch (error) {
      res.status(500).json({
        error: true,
        message: errorMessage(error, "Failed to fetch history summary"),
      });
    }
  });

  app.get("/api/history/:id", async (req: Request, res: Response) => {
    const id = z.string().uuid().safeParse(req.params.id);
    if (!id.success) {
      res.status(404).json({ error: true, message: "Analysis not found" });
      return;
    }

    try {
      const result = await store.getResultById(id.data);
      if (!result) {
        res.status(404).json({ error: true, message: "Analysis not found" });
        return;
      }
      res.json(result);
    } catch (error) {
      res.status(500).json({
        error: true,
        message: errorMessage(error, "Failed to fetch analysis"),
      });
    }
  });

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", service: "seo-page-analyzer" });
  });

  return httpServer;
}
