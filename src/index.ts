#!/usr/bin/env node
/**
 * proverb-trawl - MCP Entry Point
 */

import 'dotenv/config';
import { runServer } from './server.js';
import { VERSION } from './version.js';

async function main(): Promise<void> {
    const args = process.argv.slice(2);

    if (args.includes('--help') || args.includes('-h')) {
        console.log(`
proverb-trawl MCP Server - find emergent proverbs in model output

Usage: trawl-mcp [options]

Options:
  --help, -h     Show this help message
  --version, -v  Show version information

Tools:
  - tokenize        Split text into the tokens n-grams are built from
  - extract-ngrams  Count recurring n-grams across texts
  - score-novelty   Compare phrase frequency in generated vs reference text
  - trawl           Full pipeline: recurring long phrases ranked by novelty

The server communicates via stdio using the Model Context Protocol.
`);
        process.exit(0);
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(`proverb-trawl version ${VERSION}`);
        process.exit(0);
    }

    try {
        await runServer();
    } catch (error) {
        console.error('Failed to start server:', error);
        process.exit(1);
    }
}

void main();
