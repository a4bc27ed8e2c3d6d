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
 * env/config.ts
 * Environment configuration: validation, defaults and named presets.
 */

import { ConfigurationError } from "../core/errors.js";
import type { StepInfo } from "./RewardPolicy.js";

export const OBS_TYPES = ["grayscale", "rgb", "downscaled", "ram"] as const;
export const ACTION_TYPES = ["discrete6", "discrete4", "multi_discrete"] as const;
export const REWARD_TYPES = ["score_delta", "shaped", "terminal", "custom"] as const;

export type ObsType = typeof OBS_TYPES[number];
export type ActionType = typeof ACTION_TYPES[number];
export type RewardType = typeof REWARD_TYPES[number];

export type RewardFn = (info: Readonly<StepInfo>) => number;

export interface ArcadeEnvConfig {
  /** Observation type (default: "grayscale") */
  obsType?: ObsType;
  /** Action space variant (default: "discrete6") */
  actionType?: ActionType;
  /** Reward calculation (default: "score_delta") */
  rewardType?: RewardType;
  /** Required when rewardType is "custom" */
  rewardFn?: RewardFn;
  /** Steps before truncation (default: unlimited) */
  maxEpisodeSteps?: number;
  /** Hardware frames each action is held for (default: 1) */
  frameSkip?: number;
  /** Frames stacked into one observation (default: 1) */
  frameStack?: number;
  /** Probability of repeating the previous action (default: 0) */
  repeatActionProbability?: number;
  /** Seed for the sticky-action generator (default: time based) */
  seed?: number;
  /** Log episode boundaries (default: false) */
  debug?: boolean;
}

export interface ResolvedArcadeEnvConfig {
  readonly obsType: ObsType;
  readonly actionType: ActionType;
  readonly rewardType: RewardType;
  readonly rewardFn: RewardFn | null;
  readonly maxEpisodeSteps: number | null;
  readonly frameSkip: number;
  readonly frameStack: number;
  readonly repeatActionProbability: number;
  readonly seed: number | null;
  readonly debug: boolean;
}

function oneOf<T extends string>(name: string, value: unknown, allowed: readonly T[]): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigurationError(`Invalid ${name}: ${String(value)}. Must be one of ${allowed.join(", ")}`);
  }
  return match;
}

function positiveInt(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be an integer >= 1, got ${value}`);
  }
  return value;
}

/**
 * Validate a config and fill in defaults. Throws ConfigurationError.
 */
export function resolveConfig(config: ArcadeEnvConfig = {}): ResolvedArcadeEnvConfig {
  const rewardType = oneOf("rewardType", config.rewardType ?? "score_delta", REWARD_TYPES);
  const rewardFn = config.rewardFn ?? null;
  if (rewardType === "custom" && rewardFn === null) {
    throw new ConfigurationError('rewardFn must be provided when rewardType is "custom"');
  }

  const repeatActionProbability = config.repeatActionProbability ?? 0;
  if (!(repeatActionProbability >= 0 && repeatActionProbability <= 1)) {
    throw new ConfigurationError(`repeatActionProbability must be in [0, 1], got ${repeatActionProbability}`);
  }

  const maxEpisodeSteps =
    config.maxEpisodeSteps === undefined ? null : positiveInt("maxEpisodeSteps", config.maxEpisodeSteps);

  return Object.freeze({
    obsType: oneOf("obsType", config.obsType ?? "grayscale", OBS_TYPES),
    actionType: oneOf("actionType", config.actionType ?? "discrete6", ACTION_TYPES),
    rewardType,
    rewardFn,
    maxEpisodeSteps,
    frameSkip: positiveInt("frameSkip", config.frameSkip ?? 1),
    frameStack: positiveInt("frameStack", config.frameStack ?? 1),
    repeatActionProbability,
    seed: config.seed ?? null,
    debug: config.debug ?? false,
  });
}

// ============================================================================
// Presets
// ============================================================================

export const PRESET_NAMES = ["arcade-v0", "arcade-v0-small", "arcade-v0-ram", "arcade-v0-shaped"] as const;
export type PresetName = typeof PRESET_NAMES[number];

/**
 * Build a fresh config for a named preset. Overrides win over preset values.
 */
export function presetConfig(name: PresetName, overrides: ArcadeEnvConfig = {}): ArcadeEnvConfig {
  const base: ArcadeEnvConfig = {
    obsType: "grayscale",
    actionType: "discrete6",
    rewardType: "score_delta",
    maxEpisodeSteps: 10000,
  };

  switch (name) {
    case "arcade-v0":
      break;
    case "arcade-v0-small":
      base.obsType = "downscaled";
      break;
    case "arcade-v0-ram":
      base.obsType = "ram";
      break;
    case "arcade-v0-shaped":
      base.rewardType = "shaped";
      break;
  }

  return { ...base, ...overrides };
}

export function isPresetName(value: string): value is PresetName {
  return PRESET_NAMES.some((name) => name === value);
}
