#!/usr/bin/env node
// =============================================================================
// @rss-courier/worker — CLI entry point
// =============================================================================
// Usage:
//   npm start -- [--dry-run] [--config ./courier.env] [--watch]
// =============================================================================

import { main } from "./main.js";

process.exitCode = await main(process.argv.slice(2));
