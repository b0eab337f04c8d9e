/**
 * Server factory to build a pre-configured MCP server (tools/resources/prompts registered)
 */
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerConfig } from "../config/server-config.js";
import type { PipelineDeps } from "../pipeline/weather-pipeline.js";
import {
  createWeatherToolHandler,
  weatherToolConfig,
} from "./handlers/weather-tool.handler.js";
import {
  createWeatherResourceHandler,
  createWeatherResourceTemplate,
  weatherResourceConfig,
} from "./handlers/weather-resource.handler.js";
import {
  weatherPromptConfig,
  weatherPromptHandler,
} from "./handlers/weather-prompt.handler.js";
import { ReadingStore } from "./reading-store.js";

export type ServerInstanceFactory = () => McpServer;

/**
 * Build a server creator function once at startup, and use it per-session to get a new MCP server instance.
 */
export function buildWeatherServerFactory(
  serverConfig: Pick<ServerConfig, "serverName" | "version">,
  deps: PipelineDeps,
  defaultCity: string,
  readings: ReadingStore = new ReadingStore()
): ServerInstanceFactory {
  const toolHandler = createWeatherToolHandler(deps, defaultCity, readings);
  const resourceHandler = createWeatherResourceHandler(readings);

  return function createServerInstance(): McpServer {
    const server = new McpServer({
      name: serverConfig.serverName,
      version: serverConfig.version,
    });

    server.registerTool("weather.analyze", weatherToolConfig, toolHandler);

    server.registerResource(
      "weather.reading",
      createWeatherResourceTemplate(),
      weatherResourceConfig,
      resourceHandler
    );

    server.registerPrompt(
      "weather.ensureCity",
      weatherPromptConfig,
      weatherPromptHandler
    );

    return server;
  };
}
