#!/usr/bin/env node
/**
 * PDF Reader MCP Server - CLI Entry Point
 *
 * Usage:
 *   npx pdf-reader-mcp              # via npx
 *   pdf-reader-mcp                  # after npm install -g
 *   node dist/index.js              # direct invocation
 *
 * @module bin
 */

import './index.js';
