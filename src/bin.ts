#!/usr/bin/env node
/**
 * KYC Multi-Document MCP Server - CLI Entry Point
 *
 * Usage:
 *   npx kyc-multidoc-mcp              # via npx
 *   kyc-multidoc-mcp                  # after npm install -g
 *   node dist/index.js                # direct invocation
 *
 * @module bin
 */

import './index.js';
