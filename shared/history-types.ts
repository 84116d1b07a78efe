export interface AnalysisHistoryEntry {
  id: string;
  url: string;
  domain: string;
  siteName: string;
  score: number;
  recommendationCount: number;
  loadTimeSeconds: number;
  createdAt: string;
}

export interface HistorySummary {
  totalAnalyses: number;
  avgScore: number;
  scoreDistribution: Record<string, number>;
  recentAnalyses: AnalysisHistoryEntry[];
}
