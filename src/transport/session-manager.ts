/**
 * Session management for MCP transports (Streamable HTTP)
 */
import { randomUUID } from "node:crypto";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { ServerConfig } from "../config/server-config.js";

/**
 * Tracks one transport per initialized MCP session
 */
export class SessionManager {
  private transports = new Map<string, StreamableHTTPServerTransport>();

  constructor(private config: Pick<ServerConfig, "allowedHosts">) {}

  /**
   * Create a transport that registers itself once the session is initialized
   */
  createTransport(): StreamableHTTPServerTransport {
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      enableDnsRebindingProtection: true,
      allowedHosts: this.config.allowedHosts,
      onsessioninitialized: (sessionId: string) => {
        this.transports.set(sessionId, transport);
        console.log(`[session] opened ${sessionId}`);
      },
    });

    transport.onclose = () => {
      if (transport.sessionId && this.transports.delete(transport.sessionId)) {
        console.log(`[session] closed ${transport.sessionId}`);
      }
    };

    return transport;
  }

  getTransport(sessionId: string): StreamableHTTPServerTransport | undefined {
    return this.transports.get(sessionId);
  }

  /**
   * Close every open transport (used on shutdown)
   */
  async closeAll(): Promise<void> {
    const open = Array.from(this.transports.values());
    this.transports.clear();
    await Promise.all(open.map((t) => t.close()));
  }
}
