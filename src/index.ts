#!/usr/bin/env node
import { startServer } from './server.js';

startServer().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Failed to start MCP server: ${message}`);
    process.exit(1);
});
