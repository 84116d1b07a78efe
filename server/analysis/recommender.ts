import type {
  Headings,
  ImageStats,
  MetaData,
  Recommendation,
  RecommendationPriority,
} from "@shared/analysis-types";
import { DESCRIPTION_LENGTH_RANGE, TITLE_LENGTH_RANGE, isWithin } from "./scorer";
import { isSecureUrl } from "./url-utils";

export const SLOW_LOAD_SECONDS = 3;

export interface RecommendInput {
  metaData: MetaData;
  headings: Headings;
  images: ImageStats;
  url: string;
  loadTimeSeconds: number;
}

/**
 * Rules are independent; output follows rule order, not priority.
 */
export function recommend({ metaData, headings, images, url, loadTimeSeconds }: RecommendInput): Recommendation[] {
  const recommendations: Recommendation[] = [];

  if (!isWithin(metaData.titleLength, TITLE_LENGTH_RANGE)) {
    recommendations.push({
      priority: "High",
      category: "SEO",
      issue: "Title Tag Length",
      recommendation: "Optimize title tag length to 30-60 characters for better search visibility",
    });
  }

  if (!isWithin(metaData.descriptionLength, DESCRIPTION_LENGTH_RANGE)) {
    recommendations.push({
      priority: "High",
      category: "SEO",
      issue: "Meta Description Length",
      recommendation: "Optimize meta description to 120-160 characters",
    });
  }

  if (headings.h1.length === 0) {
    recommendations.push({
      priority: "Critical",
      category: "Content",
      issue: "Missing H1 Tags",
      recommendation: "Add H1 tags to your pages - crucial for SEO",
    });
  }

  if (images.withoutAlt > 0) {
    recommendations.push({
      priority: "Medium",
      category: "Accessibility",
      issue: `${images.withoutAlt} Images Without Alt Text`,
      recommendation: "Add descriptive alt text to all images for better SEO and accessibility",
    });
  }

  if (loadTimeSeconds > SLOW_LOAD_SECONDS) {
    recommendations.push({
      priority: "High",
      category: "Performance",
      issue: "Slow Page Load Time",
      recommendation: "Optimize page load time to under 3 seconds (consider image compression, caching, CDN)",
    });
  }

  if (!isSecureUrl(url)) {
    recommendations.push({
      priority: "Critical",
      category: "Security",
      issue: "No SSL Certificate",
      recommendation: "Implement SSL certificate (HTTPS) immediately for security and SEO",
    });
  }

  return recommendations;
}

export function filterByPriority(
  recommendations: Recommendation[],
  priorities: readonly RecommendationPriority[]
): Recommendation[] {
  return recommendations.filter((r) => priorities.includes(r.priority));
}

export function countByPriority(recommendations: Recommendation[]): Record<RecommendationPriority, number> {
  const counts: Record<RecommendationPriority, number> = { Critical: 0, High: 0, Medium: 0, Low: 0 };
  for (const r of recommendations) {
    counts[r.priority] += 1;
  }
  return counts;
}
