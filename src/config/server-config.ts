/**
 * Server configuration constants and utilities
 */
export interface ServerConfig {
  port: number;
  allowedHosts: string[];
  serverName: string;
  version: string;
}

/**
 * Create server configuration from environment variables
 */
export function createServerConfig(
  env: NodeJS.ProcessEnv = process.env
): ServerConfig {
  const port = env.PORT ? Number(env.PORT) : 3000;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`PORT must be an integer between 0 and 65535 (got "${env.PORT}")`);
  }

  const baseAllowedHosts = (env.ALLOWED_HOSTS || "127.0.0.1,localhost")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);

  // Include host:port variants for DNS-rebind protection
  const allowedHosts = Array.from(
    new Set(baseAllowedHosts.flatMap((h) => [h, `${h}:${port}`]))
  );

  return {
    port,
    allowedHosts,
    serverName: "weather-agent",
    version: "0.1.0",
  };
}
