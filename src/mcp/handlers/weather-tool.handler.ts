/**
 * Weather analysis tool handler
 */
import { z } from "zod";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import {
  type PipelineDeps,
  runWeatherPipeline,
} from "../../pipeline/weather-pipeline.js";
import {
  InvalidInputError,
  sanitizeCity,
} from "../../services/weather.service.js";
import type { ReadingStore } from "../reading-store.js";

/**
 * Params shape for the tool input (Zod raw shape as required by registerTool)
 */
export const weatherToolParams = {
  city: z.string().min(1).optional(),
};

/**
 * Configuration for weather tool
 */
export const weatherToolConfig = {
  title: "Weather Analysis",
  description:
    "Synthesize a weather reading for a city and return an assessment with comfort, activity and clothing advice",
  inputSchema: weatherToolParams,
};

export function readingUri(runId: string): string {
  return `weather://reading/${runId}`;
}

export function createWeatherToolHandler(
  deps: PipelineDeps,
  defaultCity: string,
  readings: ReadingStore
) {
  return async function weatherToolHandler({
    city,
  }: {
    city?: string;
  }): Promise<CallToolResult> {
    try {
      const result = await runWeatherPipeline(
        sanitizeCity(city ?? defaultCity),
        deps
      );
      const stored = readings.add(result.city, result.reading);
      return {
        content: [
          { type: "text", text: result.report },
          {
            type: "resource_link",
            uri: readingUri(stored.runId),
            name: `weather reading ${result.city}`,
            mimeType: "application/json",
            description: "Raw JSON for the reading this report was built from",
          },
        ],
        structuredContent: {
          runId: stored.runId,
          city: result.city,
          provenance: result.provenance,
          reading: result.reading,
        },
      };
    } catch (err) {
      if (err instanceof InvalidInputError) {
        return {
          isError: true,
          content: [{ type: "text", text: err.message }],
        };
      }
      throw err;
    }
  };
}
