import type { AnalysisOverview, AnalysisResult, Headings } from "@shared/analysis-types";
import { HEADING_LEVELS } from "@shared/analysis-types";
import type { AnalysisConfig, AnalyzeOptions, FetchInfo } from "./types";
import { AnalysisConfigSchema } from "./types";
import { parseDocument, extractVisibleText } from "./document";
import {
  DEFAULT_TOP_KEYWORDS,
  auditImages,
  classifyLinks,
  countWords,
  extractHeadings,
  extractKeywords,
  extractMetaData,
} from "./extractor";
import { fetchPage } from "./fetcher";
import { getScoreStatus, getScoreVerdict, scoreSeo } from "./scorer";
import { SLOW_LOAD_SECONDS, countByPriority, recommend } from "./recommender";
import { getSiteName, isSecureUrl } from "./url-utils";

function countHeadings(headings: Headings): AnalysisOverview["headingCounts"] {
  const counts: AnalysisOverview["headingCounts"] = {};
  for (const level of HEADING_LEVELS) {
    if (headings[level].length > 0) {
      counts[level] = headings[level].length;
    }
  }
  return counts;
}

function buildOverview(
  result: Omit<AnalysisResult, "overview" | "siteName" | "meta">,
  wordCount: number,
  loadTimeSeconds: number
): AnalysisOverview {
  const { headings, links } = result;

  return {
    wordCount,
    headingCounts: countHeadings(headings),
    totalHeadings: HEADING_LEVELS.reduce((sum, level) => sum + headings[level].length, 0),
    totalLinks: links.internal.length + links.external.length,
    internalLinkCount: links.internal.length,
    externalLinkCount: links.external.length,
    secure: isSecureUrl(result.url),
    scoreStatus: getScoreStatus(result.score),
    scoreVerdict: getScoreVerdict(result.score),
    loadSpeed: loadTimeSeconds < SLOW_LOAD_SECONDS ? "Fast" : "Slow",
    recommendationCounts: countByPriority(result.recommendations),
  };
}

/**
 * Runs every extractor, the scorer and the recommender over already-fetched
 * HTML. Pure: the same arguments always give an equal result.
 */
export function analyzeDocument(
  html: string,
  url: string,
  fetchInfo: FetchInfo,
  options: AnalyzeOptions = {}
): AnalysisResult {
  const doc = parseDocument(html);
  const text = extractVisibleText(doc);

  const metaData = extractMetaData(doc);
  const headings = extractHeadings(doc);
  const keywords = extractKeywords(text, options.topKeywords ?? DEFAULT_TOP_KEYWORDS);
  const links = classifyLinks(doc, url);
  const images = auditImages(doc);

  const { checks, score } = scoreSeo({ metaData, images, url });
  const recommendations = recommend({
    metaData,
    headings,
    images,
    url,
    loadTimeSeconds: fetchInfo.loadTimeSeconds,
  });

  const core = { url, metaData, headings, keywords, links, images, checks, score, recommendations };

  return {
    ...core,
    siteName: getSiteName(url),
    overview: buildOverview(core, countWords(text), fetchInfo.loadTimeSeconds),
    meta: {
      statusCode: fetchInfo.statusCode,
      loadTimeSeconds: fetchInfo.loadTimeSeconds,
    },
  };
}

export async function runAnalysis(config: Partial<AnalysisConfig> & { url: string }): Promise<AnalysisResult> {
  const validatedConfig = AnalysisConfigSchema.parse(config);

  const outcome = await fetchPage(validatedConfig.url, validatedConfig);
  if ("error" in outcome) {
    throw outcome.error;
  }

  const { html, statusCode, loadTimeSeconds } = outcome.page;
  return analyzeDocument(html, validatedConfig.url, { statusCode, loadTimeSeconds }, {
    topKeywords: validatedConfig.topKeywords,
  });
}

export { AnalysisConfigSchema, FetchError } from "./types";
export type { AnalysisConfig } from "./types";
