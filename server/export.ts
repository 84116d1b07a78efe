import type { AnalysisResult, KeywordEntry, RecommendationPriority } from "@shared/analysis-types";
import { HEADING_LEVELS, RECOMMENDATION_PRIORITIES } from "@shared/analysis-types";
import { filterByPriority } from "./analysis/recommender";

export interface MarkdownOptions {
  priorities?: readonly RecommendationPriority[];
}

function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function keywordsToCsv(keywords: KeywordEntry[]): string {
  const rows = keywords.map((k) => `${escapeCsvField(k.term)},${k.frequency}`);
  return ["Keyword,Frequency", ...rows].join("\n") + "\n";
}

export function keywordsCsvFilename(siteName: string): string {
  return `${siteName}_keywords.csv`;
}

function escapeTableCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\s+/g, " ").trim();
}

function formatScore(score: number): string {
  return `${Math.round(score)}%`;
}

export function generateMarkdown(result: AnalysisResult, options: MarkdownOptions = {}): string {
  const lines: string[] = [];
  const { metaData, overview, images } = result;
  const recommendations = filterByPriority(result.recommendations, options.priorities ?? RECOMMENDATION_PRIORITIES);

  lines.push(`# ${result.siteName} Website Analysis`);
  lines.push("");
  lines.push(`**Analyzed:** ${result.url}`);
  lines.push("");

  lines.push("## Overview");
  lines.push("");
  lines.push(`- SEO score: ${formatScore(result.score)} (${overview.scoreStatus})`);
  lines.push(`- Page load time: ${result.meta.loadTimeSeconds.toFixed(2)}s (${overview.loadSpeed})`);
  lines.push(`- Total words: ${overview.wordCount}`);
  lines.push(`- Total images: ${images.total}`);
  lines.push(`- SSL: ${overview.secure ? "Secure" : "Insecure"}`);
  lines.push("");

  lines.push("## SEO Checklist");
  lines.push("");
  for (const check of result.checks) {
    lines.push(`- [${check.passed ? "x" : " "}] ${check.name}`);
  }
  lines.push("");
  lines.push(`**${overview.scoreVerdict}**`);
  lines.push("");

  lines.push("## Meta Tags");
  lines.push("");
  lines.push(`- Title (${metaData.titleLength} characters, optimal 30-60): ${metaData.title}`);
  lines.push(`- Description (${metaData.descriptionLength} characters, optimal 120-160): ${metaData.description}`);
  lines.push(`- Keywords: ${metaData.metaKeywords}`);
  lines.push(`- OG title: ${metaData.ogTitle}`);
  lines.push(`- OG description: ${metaData.ogDescription}`);
  lines.push("");

  lines.push("## Keywords");
  lines.push("");
  if (result.keywords.length > 0) {
    lines.push("| Keyword | Frequency |");
    lines.push("| --- | ---: |");
    for (const k of result.keywords) {
      lines.push(`| ${escapeTableCell(k.term)} | ${k.frequency} |`);
    }
  } else {
    lines.push("No keywords extracted.");
  }
  lines.push("");

  lines.push("## Headings");
  lines.push("");
  if (overview.totalHeadings === 0) {
    lines.push("No heading tags found.");
    lines.push("");
  }
  for (const level of HEADING_LEVELS) {
    const texts = result.headings[level];
    if (texts.length === 0) continue;
    lines.push(`### ${level.toUpperCase()} (${texts.length})`);
    lines.push("");
    texts.forEach((text, i) => {
      lines.push(`${i + 1}. ${text}`);
    });
    lines.push("");
  }

  lines.push("## Links & Images");
  lines.push("");
  lines.push(`- Total links: ${overview.totalLinks}`);
  lines.push(`- Internal links: ${overview.internalLinkCount}`);
  lines.push(`- External links: ${overview.externalLinkCount}`);
  lines.push(`- Images with alt text: ${images.withAlt}`);
  lines.push(`- Images without alt text: ${images.withoutAlt}`);
  lines.push("");

  lines.push("## Recommendations");
  lines.push("");
  if (result.recommendations.length === 0) {
    lines.push("Excellent! Your website follows all major SEO best practices!");
  } else {
    for (const rec of recommendations) {
      lines.push(`### ${rec.priority} - ${rec.category}: ${rec.issue}`);
      lines.push("");
      lines.push(rec.recommendation);
      lines.push("");
    }
    const counts = overview.recommendationCounts;
    lines.push(`Critical: ${counts.Critical} | High: ${counts.High} | Medium: ${counts.Medium} | Low: ${counts.Low}`);
  }

  return lines.join("\n") + "\n";
}
