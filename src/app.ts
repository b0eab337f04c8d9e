/**
 * Main application class for the weather agent server
 */
import express from "express";
import dotenv from "dotenv";
import type { Server } from "node:http";
import { type ServerConfig, createServerConfig } from "./config/server-config.js";
import {
  type EnvironmentConfig,
  loadEnvironmentConfig,
} from "./config/environment.js";
import { SessionManager } from "./transport/session-manager.js";
import { setupMcpRoutes } from "./routes/mcp.routes.js";
import { setupPipelineRoutes } from "./routes/pipeline.routes.js";
import { buildWeatherServerFactory } from "./mcp/server-factory.js";
import { createCompletionClient } from "./services/llm.service.js";
import type { PipelineDeps } from "./pipeline/weather-pipeline.js";

// Load environment variables
dotenv.config();

export type WeatherAgentAppOptions = {
  serverConfig?: ServerConfig;
  envConfig?: EnvironmentConfig;
  /** Overrides the completion client and random source built from config. */
  deps?: Partial<PipelineDeps>;
};

/**
 * Weather Agent Application
 */
export class WeatherAgentApp {
  private app: express.Express;
  private sessionManager: SessionManager;
  private serverConfig: ServerConfig;
  private envConfig: EnvironmentConfig;
  private deps: PipelineDeps;
  private httpServer: Server | null = null;

  constructor(options: WeatherAgentAppOptions = {}) {
    this.serverConfig = options.serverConfig ?? createServerConfig();
    this.envConfig = options.envConfig ?? loadEnvironmentConfig();
    this.deps = {
      completionClient:
        options.deps?.completionClient ?? createCompletionClient(this.envConfig),
      random: options.deps?.random,
    };
    this.sessionManager = new SessionManager(this.serverConfig);
    this.app = express();

    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(express.json({ limit: "1mb" }));
  }

  private setupRoutes(): void {
    const createServerInstance = buildWeatherServerFactory(
      this.serverConfig,
      this.deps,
      this.envConfig.defaultCity
    );
    setupMcpRoutes(this.app, this.sessionManager, createServerInstance);
    setupPipelineRoutes(this.app, this.deps, this.envConfig.defaultCity);

    // Health check endpoint
    this.app.get("/healthz", (_req, res) => {
      res.status(200).json({ ok: true });
    });
  }

  /**
   * Start the server; resolves with the bound port
   */
  public start(port: number = this.serverConfig.port): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, () => {
        const address = server.address();
        const boundPort =
          address && typeof address === "object" ? address.port : port;
        const mode = this.envConfig.openAiApiKey ? "LLM" : "rule-based only";
        console.log(
          `weather-agent listening on http://localhost:${boundPort} (${mode})`
        );
        resolve(boundPort);
      });
      server.once("error", reject);
      this.httpServer = server;
    });
  }

  /**
   * Close MCP sessions and the HTTP listener
   */
  public async stop(): Promise<void> {
    await this.sessionManager.closeAll();
    const server = this.httpServer;
    this.httpServer = null;
    if (!server) return;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  /**
   * Get Express app (for testing)
   */
  public getApp(): express.Express {
    return this.app;
  }
}
