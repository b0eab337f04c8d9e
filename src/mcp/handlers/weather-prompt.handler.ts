/**
 * Weather prompt handler
 */
import { z } from "zod";
import {
  ErrorCode,
  McpError,
  type GetPromptResult,
} from "@modelcontextprotocol/sdk/types.js";
import {
  InvalidInputError,
  sanitizeCity,
} from "../../services/weather.service.js";

/**
 * Prompt configuration
 */
export const weatherPromptConfig = {
  title: "Ensure city provided",
  description: "Guide to call weather.analyze with a city",
  argsSchema: { city: z.string().min(1) },
};

function cityArgument(city: string): string {
  try {
    return sanitizeCity(city);
  } catch (err) {
    if (err instanceof InvalidInputError) {
      throw new McpError(ErrorCode.InvalidParams, err.message, { city });
    }
    throw err;
  }
}

/**
 * Weather prompt handler
 */
export function weatherPromptHandler({ city }: { city: string }): GetPromptResult {
  return {
    messages: [
      {
        role: "user",
        content: {
          type: "text",
          text: `Please call the tool weather.analyze with ${JSON.stringify({
            city: cityArgument(city),
          })}`,
        },
      },
    ],
  };
}
