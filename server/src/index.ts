#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServer } from "./server.js";

// ── Start ───────────────────────────────────────────────────────────────────

const server = createServer();
const transport = new StdioServerTransport();
await server.connect(transport);
console.error("geodesic-route-mcp running on stdio");
