/**
 * Weather reading resource handler
 */
import {
  ResourceTemplate,
  type ReadResourceTemplateCallback,
} from "@modelcontextprotocol/sdk/server/mcp.js";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import type { ReadingStore } from "../reading-store.js";

/**
 * Resource configuration
 */
export const weatherResourceConfig = {
  title: "Weather Reading",
  description: "JSON for the reading a weather.analyze run was built from",
  mimeType: "application/json",
};

/**
 * Create weather resource template
 */
export function createWeatherResourceTemplate() {
  return new ResourceTemplate("weather://reading/{runId}", { list: undefined });
}

export function createWeatherResourceHandler(
  readings: ReadingStore
): ReadResourceTemplateCallback {
  return async (uri, variables) => {
    const runIdRaw = variables.runId;
    const runId = Array.isArray(runIdRaw) ? runIdRaw[0] ?? "" : runIdRaw ?? "";

    const stored = readings.get(runId);
    if (!stored) {
      throw new McpError(ErrorCode.InvalidParams, `Unknown reading: ${runId}`, {
        runId,
      });
    }

    return {
      contents: [
        {
          uri: uri.href,
          text: JSON.stringify({ city: stored.city, ...stored.reading }),
          mimeType: "application/json",
        },
      ],
    };
  };
}
