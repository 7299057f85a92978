#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
import { loadEncoderConfig } from "./config.js";
import { encodeToolSchema, runEncodeTool } from "./helpers.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.resolve(__dirname, "..", ".env") });

const config = loadEncoderConfig();

// --- MCP server ---

const server = new McpServer({
  name: "toon-encoder-mcp",
  version: "0.1.0",
});

server.registerTool(
  "toon_encode",
  {
    description:
      "Convert JSON to TOON, a compact line-oriented format that spends fewer tokens than JSON. " +
      "Arrays of uniform records become a header plus one row per record.",
    inputSchema: encodeToolSchema,
  },
  async (args) => runEncodeTool(args, config),
);

// ============================================================
// START SERVER
// ============================================================

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
