/**
 * MCP HTTP routes
 */
import type { Express, Request, Response } from "express";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import type { SessionManager } from "../transport/session-manager.js";
import type { ServerInstanceFactory } from "../mcp/server-factory.js";

function sendJsonRpcError(
  res: Response,
  status: number,
  code: number,
  message: string
) {
  res.status(status).json({
    jsonrpc: "2.0",
    error: { code, message },
    id: null,
  });
}

/**
 * Handle POST /mcp - client->server requests
 */
function createPostHandler(
  sessionManager: SessionManager,
  createServerInstance: ServerInstanceFactory
) {
  return async (req: Request, res: Response) => {
    try {
      const sessionId = req.header("mcp-session-id") ?? undefined;

      const sample =
        typeof req.body === "string" ? req.body : JSON.stringify(req.body);
      console.log("[mcp POST] body snippet:", sample?.slice(0, 200));

      let transport = sessionId
        ? sessionManager.getTransport(sessionId)
        : undefined;

      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        transport = sessionManager.createTransport();
        const server = createServerInstance();
        await server.connect(transport);
      }

      if (!transport) {
        sendJsonRpcError(
          res,
          400,
          -32000,
          "Bad Request: No valid session ID provided"
        );
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("Error handling MCP POST:", err);
      if (!res.headersSent) {
        sendJsonRpcError(res, 500, -32603, "Internal server error");
      }
    }
  };
}

/**
 * Handle GET /mcp (SSE notifications) and DELETE /mcp (terminate session)
 */
function createSessionHandler(sessionManager: SessionManager, label: string) {
  return async (req: Request, res: Response) => {
    try {
      const sessionId = req.header("mcp-session-id") ?? undefined;
      const transport = sessionId
        ? sessionManager.getTransport(sessionId)
        : undefined;

      if (!transport) {
        res.status(400).send("Invalid or missing session ID");
        return;
      }

      await transport.handleRequest(req, res);
    } catch (err) {
      console.error(`Error handling MCP ${label}:`, err);
      if (!res.headersSent) {
        sendJsonRpcError(res, 500, -32603, "Internal server error");
      }
    }
  };
}

/**
 * Setup MCP routes on Express app
 */
export function setupMcpRoutes(
  app: Express,
  sessionManager: SessionManager,
  createServerInstance: ServerInstanceFactory
) {
  app.post("/mcp", createPostHandler(sessionManager, createServerInstance));
  app.get("/mcp", createSessionHandler(sessionManager, "GET"));
  app.delete("/mcp", createSessionHandler(sessionManager, "DELETE"));
}
