#!/usr/bin/env node
import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createEngine, loadEngineConfig } from "@ledgerlens/engine";
import { registerDocumentTools } from "./tools/documents.js";
import { registerQuestionTools } from "./tools/questions.js";

const engine = await createEngine(loadEngineConfig());

const server = new McpServer({
  name: "ledgerlens-mcp",
  version: "0.1.0",
});

registerDocumentTools(server, engine);
registerQuestionTools(server, engine);

const transport = new StdioServerTransport();
await server.connect(transport);
