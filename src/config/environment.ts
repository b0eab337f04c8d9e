/**
 * Environment configuration for the weather agent
 */
import { z } from "zod";
import { DEFAULT_MODEL, DEFAULT_TIMEOUT_MS } from "../services/llm.service.js";
import { DEFAULT_CITY } from "../pipeline/weather-pipeline.js";

export interface EnvironmentConfig {
  /** Absent key is not an error: analysis falls back to the rule engine. */
  openAiApiKey: string | null;
  openAiModel: string;
  llmTimeoutMs: number;
  defaultCity: string;
}

const timeoutSchema = z.coerce
  .number()
  .int()
  .positive()
  .default(DEFAULT_TIMEOUT_MS);

function optionalValue(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Load environment configuration with validation
 */
export function loadEnvironmentConfig(
  env: NodeJS.ProcessEnv = process.env
): EnvironmentConfig {
  const timeout = timeoutSchema.safeParse(optionalValue(env.LLM_TIMEOUT_MS));
  if (!timeout.success) {
    throw new Error(
      `LLM_TIMEOUT_MS must be a positive integer (got "${env.LLM_TIMEOUT_MS}")`
    );
  }

  return {
    openAiApiKey: optionalValue(env.OPENAI_API_KEY) ?? null,
    openAiModel: optionalValue(env.OPENAI_MODEL) ?? DEFAULT_MODEL,
    llmTimeoutMs: timeout.data,
    defaultCity: optionalValue(env.DEFAULT_CITY) ?? DEFAULT_CITY,
  };
}
