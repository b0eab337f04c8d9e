/**
 * Weather agent pipeline: synthesis followed by analysis, as plain
 * function composition. Only InvalidInputError can escape.
 */
import {
  type RandomSource,
  type WeatherReading,
  synthesizeWeather,
} from "../services/weather.service.js";
import { type Provenance, runAnalysis } from "../services/analysis.service.js";
import type { CompletionClient } from "../services/llm.service.js";

export const DEFAULT_CITY = "London";

export type PipelineDeps = {
  completionClient: CompletionClient;
  random?: RandomSource;
};

export type AnalysisResult = {
  city: string;
  reading: WeatherReading;
  report: string;
  provenance: Provenance;
};

export async function runWeatherPipeline(
  city: string = DEFAULT_CITY,
  deps: PipelineDeps
): Promise<AnalysisResult> {
  const reading = synthesizeWeather(city, deps.random);
  const { report, provenance } = await runAnalysis(
    reading,
    city,
    deps.completionClient
  );

  console.log(`[pipeline] ${city}: ${provenance} report generated`);
  return { city, reading, report, provenance };
}
