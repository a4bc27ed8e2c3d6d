#!/usr/bin/env node
/*
 * Copyright 2025 The Carpocratian Church of Commonality and Equality, Inc.
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *      http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

/**
 * Arcade RL CLI
 *
 * Usage:
 *   arcade-rl <command> [options]
 *
 * Commands:
 *   bridge   Start the environment bridge server
 */

import { runBridge } from './commands/bridge.js';

const VERSION = '0.1.0';

function showHelp(): void {
  console.log(`
Arcade RL CLI v${VERSION}

USAGE:
  arcade-rl <command> [options]

COMMANDS:
  bridge    Start the environment bridge server (WebSocket)

OPTIONS:
  -h, --help      Show this help message
  -v, --version   Show version number

EXAMPLES:
  arcade-rl bridge --wasm ./pkg/arcade.js --rom-dir ./roms
  arcade-rl bridge -w ./pkg/arcade.js -e arcade-v0-shaped -p 9999

For command-specific help:
  arcade-rl <command> --help
`);
}

function showVersion(): void {
  console.log(`arcade-rl v${VERSION}`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    showHelp();
    process.exit(0);
  }

  if (args[0] === '--version' || args[0] === '-v') {
    showVersion();
    process.exit(0);
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case 'bridge':
      await runBridge(commandArgs);
      break;

    default:
      console.error(`Unknown command: ${command}`);
      console.error('Run "arcade-rl --help" for usage information.');
      process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
