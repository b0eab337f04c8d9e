/**
 * Weather analysis: one attempt at a model-written assessment, then the
 * rule engine. Callers always get a report back.
 */
import { type WeatherReading, formatRawData } from "./weather.service.js";
import { composeRuleReport } from "./rule-engine.service.js";
import {
  type CompletionClient,
  type CompletionRequest,
  attemptRemoteCompletion,
} from "./llm.service.js";

export type Provenance = "LLM" | "Rule-based";

export type AnalysisOutput = {
  report: string;
  provenance: Provenance;
};

export const SYSTEM_PROMPT = "You are a helpful weather analysis expert.";
export const MAX_TOKENS = 300;
export const CREATIVITY = 0.7;

export function buildWeatherPrompt(reading: WeatherReading, city: string): string {
  return `You are a weather expert AI assistant. Analyze the following weather data for ${city} and provide detailed insights and recommendations.

Weather Data:
- City: ${city}
- Temperature: ${reading.temperature.toFixed(1)}°C
- Humidity: ${reading.humidity}%
- Wind Speed: ${reading.windSpeed.toFixed(1)} km/h

Please provide:
1. A brief weather assessment
2. Comfort level rating (1-10)
3. Recommended activities
4. What to wear
5. Any weather warnings or tips

Keep your response concise but informative.`;
}

export function composeLlmReport(
  analysis: string,
  reading: WeatherReading,
  city: string,
  model: string
): string {
  return [
    `🤖 LLM Weather Analysis for ${city}:`,
    "",
    analysis,
    "",
    "---",
    formatRawData(reading),
    `Powered by: ${model} (LLM)`,
  ].join("\n");
}

export async function runAnalysis(
  reading: WeatherReading,
  city: string,
  client: CompletionClient
): Promise<AnalysisOutput> {
  const request: CompletionRequest = {
    systemPrompt: SYSTEM_PROMPT,
    userPrompt: buildWeatherPrompt(reading, city),
    maxTokens: MAX_TOKENS,
    temperature: CREATIVITY,
  };

  const outcome = await attemptRemoteCompletion(client, request);
  if (outcome.ok) {
    return {
      report: composeLlmReport(outcome.text, reading, city, client.model),
      provenance: "LLM",
    };
  }

  console.warn(
    `[analysis] LLM analysis failed (${outcome.reason}), using fallback...`
  );
  return { report: composeRuleReport(reading, city), provenance: "Rule-based" };
}

export async function analyzeWeather(
  reading: WeatherReading,
  city: string,
  client: CompletionClient
): Promise<string> {
  const { report } = await runAnalysis(reading, city, client);
  return report;
}
