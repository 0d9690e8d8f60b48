#!/usr/bin/env -S node --no-node-snapshot --import tsx

import { startServer } from './server.js';

startServer().catch((err) => {
  console.error('Failed to start rlm MCP server:', err);
  process.exit(1);
});
