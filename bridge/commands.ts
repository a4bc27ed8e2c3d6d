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
/*
 * bridge/commands.ts
 * Wire message parsing and command dispatch against one ArcadeEnv.
 */

import { ArcadeEnvError } from "../core/errors.js";
import type { ArcadeAction, Observation } from "../core/types.js";
import type { Space } from "../interface/Gym.js";
import type { ArcadeEnv, ResetOptions } from "../env/ArcadeEnv.js";
import type { ResolvedArcadeEnvConfig } from "../env/config.js";
import type { StepInfo } from "../env/RewardPolicy.js";
import type {
  Command,
  ErrorResponse,
  Response,
  ResetCommand,
  WireObservation,
  WireSpace,
  WireStepInfo,
} from "./protocol.js";

/** Message that does not decode to a known command. */
export class ProtocolError extends ArcadeEnvError {}

// ============================================================================
// Parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireString(msg: Record<string, unknown>, key: string): string {
  const value = msg[key];
  if (typeof value !== "string" || value.length === 0) {
    throw new ProtocolError(`"${key}" must be a non-empty string`);
  }
  return value;
}

function optionalInteger(msg: Record<string, unknown>, key: string): number | undefined {
  const value = msg[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ProtocolError(`"${key}" must be an integer`);
  }
  return value;
}

function optionalString(msg: Record<string, unknown>, key: string): string | undefined {
  const value = msg[key];
  if (value === undefined || value === null) return undefined;
  return requireString(msg, key);
}

/**
 * Shape check only; range checks belong to the environment's encoder.
 */
function parseAction(value: unknown): ArcadeAction {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (Array.isArray(value) && value.length === 2) {
    const [move, fire]: unknown[] = value;
    if (typeof move === "number" && typeof fire === "number") {
      return [move, fire];
    }
  }
  throw new ProtocolError(`"action" must be a number or a [move, fire] pair, got ${JSON.stringify(value)}`);
}

/**
 * Decode one text frame into a command.
 * @throws ProtocolError on malformed JSON, unknown commands or bad fields
 */
export function parseCommand(raw: string): Command {
  let msg: unknown;
  try {
    msg = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ProtocolError(`Malformed JSON: ${reason}`, { cause: error });
  }

  if (!isRecord(msg) || typeof msg.cmd !== "string") {
    throw new ProtocolError('Message must be an object with a string "cmd" field');
  }

  const name = msg.cmd;
  switch (name) {
    case "reset": {
      const cmd: ResetCommand = { cmd: "reset" };
      const seed = optionalInteger(msg, "seed");
      const stateFile = optionalString(msg, "state_file");
      if (seed !== undefined) cmd.seed = seed;
      if (stateFile !== undefined) cmd.state_file = stateFile;
      return cmd;
    }
    case "step":
      return { cmd: "step", action: parseAction(msg.action) };
    case "save_state":
      return { cmd: "save_state", path: requireString(msg, "path") };
    case "load_state":
      return { cmd: "load_state", path: requireString(msg, "path") };
    case "env_info":
      return { cmd: "env_info" };
    case "ping":
      return { cmd: "ping" };
    case "close":
      return { cmd: "close" };
    default:
      throw new ProtocolError(`Unknown command: ${name}`);
  }
}

// ============================================================================
// Wire conversion
// ============================================================================

export function toWireObservation(observation: Observation): WireObservation {
  return {
    shape: [...observation.shape],
    data: Array.from(observation.data),
  };
}

export function toWireStepInfo(info: StepInfo): WireStepInfo {
  return {
    score: info.score,
    total_score: info.totalScore,
    score_delta: info.scoreDelta,
    lives: info.lives,
    lives_lost: info.livesLost,
    level: info.level,
    frame_count: info.frameCount,
    steps: info.steps,
    terminated: info.terminated,
  };
}

/** Observation bounds are uniform, so the first element stands for all. */
export function toWireSpace(space: Space): WireSpace {
  const wire: WireSpace = { shape: [...space.shape] };
  if (space.low && space.low.length > 0) wire.low = space.low[0];
  if (space.high && space.high.length > 0) wire.high = space.high[0];
  if (space.n !== undefined) wire.n = space.n;
  if (space.nvec) wire.nvec = [...space.nvec];
  if (space.dtype) wire.dtype = space.dtype;
  return wire;
}

export function describeConfig(config: ResolvedArcadeEnvConfig): Record<string, string | number | boolean | null> {
  return {
    obs_type: config.obsType,
    action_type: config.actionType,
    reward_type: config.rewardType,
    max_episode_steps: config.maxEpisodeSteps,
    frame_skip: config.frameSkip,
    frame_stack: config.frameStack,
    repeat_action_probability: config.repeatActionProbability,
    seed: config.seed,
  };
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof Error) {
    return { error: error.message, type: error.name };
  }
  return { error: String(error), type: "Error" };
}

// ============================================================================
// Dispatch
// ============================================================================

/**
 * Run one command against the environment. Errors propagate; the caller
 * turns them into an ErrorResponse.
 */
export function handleCommand(env: ArcadeEnv, cmd: Command, envType: string): Response {
  switch (cmd.cmd) {
    case "reset": {
      const options: ResetOptions = cmd.state_file === undefined ? {} : { stateFile: cmd.state_file };
      const { observation, info } = env.reset(cmd.seed, options);
      return {
        observation: toWireObservation(observation),
        info: {
          score: info.score,
          lives: info.lives,
          level: info.level,
          frame_count: info.frameCount,
        },
      };
    }

    case "step": {
      const result = env.step(cmd.action);
      return {
        observation: toWireObservation(result.observation),
        reward: result.reward,
        terminated: result.terminated,
        truncated: result.truncated,
        info: toWireStepInfo(result.info),
      };
    }

    case "save_state":
      env.saveState(cmd.path);
      return { ok: true };

    case "load_state":
      env.loadState(cmd.path);
      return { ok: true };

    case "env_info":
      return {
        env_type: envType,
        env_options: describeConfig(env.config),
        observation_space: toWireSpace(env.observationSpace),
        action_space: toWireSpace(env.actionSpace),
      };

    case "ping":
      return { pong: Date.now() };

    case "close":
      env.close();
      return { ok: true };
  }
}
