import type { ImageStats, MetaData, ScoreStatus, ScoreVerdict, SeoCheck } from "@shared/analysis-types";
import { NO_DESCRIPTION, NO_TITLE } from "./extractor";
import { isSecureUrl } from "./url-utils";

export const TITLE_LENGTH_RANGE = { min: 30, max: 60 } as const;
export const DESCRIPTION_LENGTH_RANGE = { min: 120, max: 160 } as const;
const ALT_COVERAGE_THRESHOLD = 0.7;

export interface ScoreInput {
  metaData: MetaData;
  images: ImageStats;
  url: string;
}

export function isWithin(value: number, range: { min: number; max: number }): boolean {
  return value >= range.min && value <= range.max;
}

function hasAltCoverage(images: ImageStats): boolean {
  // A page without images has nothing to cover and fails the check.
  if (images.total === 0) return false;
  return images.withAlt / images.total > ALT_COVERAGE_THRESHOLD;
}

export function runSeoChecks({ metaData, images, url }: ScoreInput): SeoCheck[] {
  return [
    { name: "Title tag present", passed: metaData.title !== NO_TITLE },
    { name: "Title length optimal", passed: isWithin(metaData.titleLength, TITLE_LENGTH_RANGE) },
    { name: "Meta description present", passed: metaData.description !== NO_DESCRIPTION },
    { name: "Description length optimal", passed: isWithin(metaData.descriptionLength, DESCRIPTION_LENGTH_RANGE) },
    { name: "SSL enabled", passed: isSecureUrl(url) },
    { name: "Images have alt tags", passed: hasAltCoverage(images) },
  ];
}

export function calculateSeoScore(checks: SeoCheck[]): number {
  if (checks.length === 0) return 0;
  const passed = checks.filter((c) => c.passed).length;
  return (passed / checks.length) * 100;
}

export function scoreSeo(input: ScoreInput): { checks: SeoCheck[]; score: number } {
  const checks = runSeoChecks(input);
  return { checks, score: calculateSeoScore(checks) };
}

export function getScoreStatus(score: number): ScoreStatus {
  return score >= 70 ? "Good" : "Needs Work";
}

export function getScoreVerdict(score: number): ScoreVerdict {
  if (score >= 80) return "Excellent SEO!";
  if (score >= 60) return "Good, but can improve";
  return "Needs improvement";
}
