#!/usr/bin/env node
import { Command, Option } from "commander";
import { runAnalysis, AnalysisConfigSchema, FetchError } from "./analysis";
import { BROWSER_USER_AGENT } from "./analysis/types";
import { filterByPriority } from "./analysis/recommender";
import { RECOMMENDATION_PRIORITIES, type RecommendationPriority } from "@shared/analysis-types";
import { generateMarkdown, keywordsToCsv } from "./export";

interface CliOptions {
  timeoutMs: string;
  userAgent: string;
  top: string;
  format: "json" | "markdown" | "csv";
  priority?: RecommendationPriority[];
}

const program = new Command();

program
  .name("seo-analyze")
  .description("Analyze a single web page for on-page SEO signals")
  .version("1.0.0")
  .argument("<url>", "The full URL of the page to analyze, including https://")
  .option("--timeoutMs <number>", "Request timeout in milliseconds", "10000")
  .option("--userAgent <string>", "User agent string", BROWSER_USER_AGENT)
  .option("--top <number>", "Number of keywords to report", "20")
  .addOption(
    new Option("--format <format>", "Output format").choices(["json", "markdown", "csv"]).default("json")
  )
  .addOption(
    new Option("--priority <levels...>", "Only report recommendations of these priorities").choices(
      RECOMMENDATION_PRIORITIES
    )
  )
  .action(async (url: string, options: CliOptions) => {
    try {
      const config = AnalysisConfigSchema.parse({
        url,
        timeoutMs: parseInt(options.timeoutMs, 10),
        userAgent: options.userAgent,
        topKeywords: parseInt(options.top, 10),
      });

      const result = await runAnalysis(config);

      const priorities = options.priority ?? RECOMMENDATION_PRIORITIES;

      if (options.format === "markdown") {
        process.stdout.write(generateMarkdown(result, { priorities }));
      } else if (options.format === "csv") {
        process.stdout.write(keywordsToCsv(result.keywords));
      } else {
        const recommendations = filterByPriority(result.recommendations, priorities);
        console.log(JSON.stringify({ ...result, recommendations }, null, 2));
      }
    } catch (error) {
      const message = error instanceof Error && error.message ? error.message : "Unknown error occurred";
      console.error(
        JSON.stringify(
          {
            error: true,
            message: error instanceof FetchError ? `Failed to fetch website: ${message}` : message,
          },
          null,
          2
        )
      );
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
