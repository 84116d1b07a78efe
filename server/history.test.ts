import { describe, expect, it } from "vitest";
import { GARDEN_PAGE, SHORT_PAGE } from "./__fixtures__/pages";
import { analyzeDocument } from "./analysis";
import { MemoryHistoryStore, summarizeEntries } from "./history";

const fetchInfo = { statusCode: 200, loadTimeSeconds: 0.4 };
const garden = analyzeDocument(GARDEN_PAGE, "https://www.garden.example/", fetchInfo);
const short = analyzeDocument(SHORT_PAGE, "https://example.com/", fetchInfo);

describe("MemoryHistoryStore", () => {
  it("records analyses newest first", async () => {
    const store = new MemoryHistoryStore();

    const first = await store.recordAnalysis(garden);
    await store.recordAnalysis(short);

    const all = await store.getAll();
    expect(all.map((e) => e.domain)).toEqual(["example.com", "garden.example"]);
    expect(first).toMatchObject({
      url: "https://www.garden.example/",
      domain: "garden.example",
      siteName: "GARDEN",
      score: 100,
      recommendationCount: 0,
      loadTimeSeconds: 0.4,
    });
    expect(await store.getResultById(first.id)).toBe(garden);
  });

  it("keeps only the latest analysis per domain", async () => {
    const store = new MemoryHistoryStore();

    const first = await store.recordAnalysis(short);
    const second = await store.recordAnalysis(short);

    expect((await store.getAll()).map((e) => e.id)).toEqual([second.id]);
    expect(await store.getResultById(first.id)).toBeUndefined();
  });

  it("caps the number of stored analyses", async () => {
    const store = new MemoryHistoryStore();

    for (let i = 0; i < 1001; i++) {
      await store.recordAnalysis({ ...short, url: `https://site${i}.example/` });
    }

    const all = await store.getAll();
    expect(all).toHaveLength(1000);
    expect(all[999].domain).toBe("site1.example");
  });

  it("summarizes scores", async () => {
    const store = new MemoryHistoryStore();
    await store.recordAnalysis(garden);
    await store.recordAnalysis(short);

    const summary = await store.getSummary();
    expect(summary.totalAnalyses).toBe(2);
    expect(summary.avgScore).toBe(67);
    expect(summary.scoreDistribution).toEqual({ "0-20": 0, "21-40": 1, "41-60": 0, "61-80": 0, "81-100": 1 });
    expect(summary.recentAnalyses.map((e) => e.domain)).toEqual(["example.com", "garden.example"]);
  });
});

describe("summarizeEntries", () => {
  it("returns an empty summary without entries", () => {
    expect(summarizeEntries([])).toEqual({
      totalAnalyses: 0,
      avgScore: 0,
      scoreDistribution: { "0-20": 0, "21-40": 0, "41-60": 0, "61-80": 0, "81-100": 0 },
      recentAnalyses: [],
    });
  });
});
