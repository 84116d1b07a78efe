export type HeadingLevel = "h1" | "h2" | "h3" | "h4" | "h5" | "h6";

export const HEADING_LEVELS: readonly HeadingLevel[] = ["h1", "h2", "h3", "h4", "h5", "h6"];

export interface MetaData {
  title: string;
  titleLength: number;
  description: string;
  descriptionLength: number;
  metaKeywords: string;
  ogTitle: string;
  ogDescription: string;
}

export type Headings = Record<HeadingLevel, string[]>;

export interface KeywordEntry {
  term: string;
  frequency: number;
}

export interface LinkSet {
  internal: string[];
  external: string[];
}

export interface ImageStats {
  total: number;
  withAlt: number;
  withoutAlt: number;
}

export interface SeoCheck {
  name: string;
  passed: boolean;
}

export type RecommendationPriority = "Critical" | "High" | "Medium" | "Low";

export const RECOMMENDATION_PRIORITIES: readonly RecommendationPriority[] = ["Critical", "High", "Medium", "Low"];

export interface Recommendation {
  priority: RecommendationPriority;
  category: string;
  issue: string;
  recommendation: string;
}

export type ScoreStatus = "Good" | "Needs Work";

export type ScoreVerdict = "Excellent SEO!" | "Good, but can improve" | "Needs improvement";

export type LoadSpeed = "Fast" | "Slow";

export interface AnalysisOverview {
  wordCount: number;
  headingCounts: Partial<Record<HeadingLevel, number>>;
  totalHeadings: number;
  totalLinks: number;
  internalLinkCount: number;
  externalLinkCount: number;
  secure: boolean;
  scoreStatus: ScoreStatus;
  scoreVerdict: ScoreVerdict;
  loadSpeed: LoadSpeed;
  recommendationCounts: Record<RecommendationPriority, number>;
}

export interface AnalysisMeta {
  statusCode: number;
  loadTimeSeconds: number;
}

export interface AnalysisResult {
  url: string;
  siteName: string;
  metaData: MetaData;
  headings: Headings;
  keywords: KeywordEntry[];
  links: LinkSet;
  images: ImageStats;
  checks: SeoCheck[];
  score: number;
  recommendations: Recommendation[];
  overview: AnalysisOverview;
  meta: AnalysisMeta;
}

export interface AnalyzeRequest {
  url: string;
  timeoutMs?: number;
  userAgent?: string;
  topKeywords?: number;
}
