/**
 * @file Minimal MCP client to exercise the weather agent server.
 */
import dotenv from "dotenv";
dotenv.config();

import { Client as McpClient } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";

async function main() {
  const endpoint = process.env.MCP_ENDPOINT || "http://localhost:3000/mcp";
  const city = process.argv[2] || process.env.DEFAULT_CITY || "London";

  const transport = new StreamableHTTPClientTransport(new URL(endpoint));
  const client = new McpClient({
    name: "weather-agent-client",
    version: "0.1.0",
  });

  await client.connect(transport);

  try {
    const tools = await client.listTools();
    console.log(
      "Tools:",
      tools.tools.map((t) => t.name)
    );

    console.log(`\nCalling weather.analyze for city: ${city}`);
    const result = CallToolResultSchema.parse(
      await client.callTool({
        name: "weather.analyze",
        arguments: { city },
      })
    );

    if (result.isError) {
      console.error("Tool error:", JSON.stringify(result, null, 2));
    }

    for (const item of result.content) {
      if (item.type === "text") {
        console.log(item.text);
      } else if (item.type === "resource_link") {
        const res = await client.readResource({ uri: item.uri });
        const first = res.contents[0];
        console.log("\nResource read uri:", item.uri);
        if (first && "text" in first) console.log("Resource JSON:", first.text);
      }
    }
  } finally {
    await client.close();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
