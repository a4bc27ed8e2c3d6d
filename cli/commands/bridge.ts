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
 * Arcade Bridge Server Command
 *
 * Loads the WebAssembly emulator and exposes one arcade environment to
 * training clients via WebSocket.
 */

import chalk from 'chalk';
import boxen from 'boxen';
import ora from 'ora';
import { EnvServer, type EnvServerOptions } from '../../bridge/server.js';
import { loadEmulatorWasm } from '../../emulator/EmulatorWasm.js';
import { ConfigurationError } from '../../core/errors.js';
import { isPresetName, PRESET_NAMES } from '../../env/config.js';

export interface BridgeOptions extends EnvServerOptions {
  wasmModule: string;
}

function numberArg(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || value.trim() === '' || !Number.isFinite(parsed)) {
    throw new ConfigurationError(`${flag} expects a number, got ${value ?? 'nothing'}`);
  }
  return parsed;
}

function intArg(flag: string, value: string | undefined): number {
  const parsed = numberArg(flag, value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${flag} expects an integer, got ${value}`);
  }
  return parsed;
}

function stringArg(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('-')) {
    throw new ConfigurationError(`${flag} expects a value`);
  }
  return value;
}

/**
 * Parse `bridge` arguments. Returns null when help was requested.
 * @throws ConfigurationError on unknown options or bad values
 */
export function parseBridgeArgs(args: string[]): BridgeOptions | null {
  let wasmModule: string | null = null;
  const options: EnvServerOptions = {
    port: 9999,
    host: '0.0.0.0',
    preset: 'arcade-v0',
    romDir: 'roms',
    verbose: false,
  };
  const envOptions: NonNullable<EnvServerOptions['envOptions']> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--help':
      case '-h':
        showHelp();
        return null;

      case '--wasm':
      case '-w':
        wasmModule = stringArg(arg, args[++i]);
        break;

      case '--rom-dir':
      case '-r':
        options.romDir = stringArg(arg, args[++i]);
        break;

      case '--preset':
      case '-e': {
        const preset = stringArg(arg, args[++i]);
        if (!isPresetName(preset)) {
          throw new ConfigurationError(`Unknown preset: "${preset}". Available: ${PRESET_NAMES.join(', ')}`);
        }
        options.preset = preset;
        break;
      }

      case '--port':
      case '-p':
        options.port = intArg(arg, args[++i]);
        break;

      case '--host':
        options.host = stringArg(arg, args[++i]);
        break;

      case '--verbose':
      case '-v':
        options.verbose = true;
        break;

      case '--seed':
      case '-s':
        envOptions.seed = intArg(arg, args[++i]);
        break;

      case '--frame-skip':
        envOptions.frameSkip = intArg(arg, args[++i]);
        break;

      case '--frame-stack':
        envOptions.frameStack = intArg(arg, args[++i]);
        break;

      case '--sticky':
        envOptions.repeatActionProbability = numberArg(arg, args[++i]);
        break;

      case '--max-steps':
        envOptions.maxEpisodeSteps = intArg(arg, args[++i]);
        break;

      case '--debug':
        envOptions.debug = true;
        break;

      case '--token':
      case '--api-token':
        options.apiToken = stringArg(arg, args[++i]);
        break;

      case '--max-connections':
      case '--max-conn':
        options.maxConnections = intArg(arg, args[++i]);
        break;

      default:
        throw new ConfigurationError(`Unknown option: ${arg}`);
    }
  }

  if (wasmModule === null) {
    throw new ConfigurationError('--wasm <module> is required');
  }

  return { ...options, envOptions, wasmModule };
}

function showHelp(): void {
  console.log(`
Arcade Bridge Server

USAGE:
  arcade-rl bridge --wasm <module> [options]

OPTIONS:
  -w, --wasm <path>       wasm-bindgen package exporting ArcadeMachine (required)
  -r, --rom-dir <dir>     Directory with invaders.h/g/f/e (default: ./roms)
  -e, --preset <name>     Environment preset (default: arcade-v0)
  -p, --port <port>       Port to listen on (default: 9999)
      --host <host>       Host to bind to (default: 0.0.0.0)
  -v, --verbose           Log every message
  -h, --help              Show this help message

ENVIRONMENT OPTIONS:
  -s, --seed <num>        Seed for sticky actions
      --frame-skip <n>    Frames each action is held for (default: 1)
      --frame-stack <n>   Frames per observation (default: 1)
      --sticky <p>        Repeat-action probability (default: 0)
      --max-steps <n>     Steps before truncation (default: 10000)
      --debug             Log episode boundaries

SECURITY OPTIONS:
      --token, --api-token <key>  Require API token for connections
      --max-connections <num>     Max concurrent connections (default: 10)

  Set ARCADE_RL_API_KEY env var as alternative to --token

PRESETS:
  arcade-v0               224x256 grayscale, discrete6, score delta
  arcade-v0-small         84x84 grayscale
  arcade-v0-ram           8192-byte RAM vector
  arcade-v0-shaped        Shaped reward (life penalty, survival bonus)

EXAMPLES:
  arcade-rl bridge --wasm ./pkg/arcade.js --rom-dir ./roms
  arcade-rl bridge -w ./pkg/arcade.js -e arcade-v0-small --frame-skip 4 --frame-stack 4
`);
}

export async function runBridge(args: string[]): Promise<void> {
  let options: BridgeOptions | null;
  try {
    options = parseBridgeArgs(args);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red('Error:'), message);
    console.error(chalk.gray('Run "arcade-rl bridge --help" for usage information.'));
    process.exit(1);
  }
  if (!options) {
    process.exit(0);
  }

  console.log(boxen(`${chalk.bold.cyan('🕹️  Arcade RL Bridge')} ${chalk.gray(`- ${options.preset}`)}`, {
    padding: 1,
    margin: 1,
    borderStyle: 'round',
    borderColor: 'cyan'
  }));

  const spinner = ora(`Loading emulator from ${options.wasmModule}...`).start();
  let server: EnvServer;
  try {
    const core = await loadEmulatorWasm(options.wasmModule, {
      romDir: options.romDir ?? 'roms',
      dipSwitches: options.dipSwitches,
    });
    spinner.succeed('Emulator loaded');
    server = new EnvServer({ ...options, core });
  } catch (error) {
    spinner.fail('Emulator failed to load');
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(chalk.red('[Bridge] Failed to start:'), message);
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = () => {
    console.log(chalk.cyan('\n[Bridge] Shutting down...'));
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(chalk.red('[Bridge] Shutdown failed:'), error);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  try {
    await server.start();
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(chalk.red('[Bridge] Failed to start:'), message);
    process.exit(1);
  }
}
