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
 * index.ts
 * Barrel exports for the arcade RL environment
 */

// Gym interface (single-agent)
export {
  GymEnvironment,
  type StepResult,
  type ResetResult,
  type Space,
} from "./interface/Gym.js";

// Environment
export {
  ArcadeEnv,
  withArcadeEnv,
  type EnvPhase,
  type ResetInfo,
  type ResetOptions,
  type EpisodeState,
  type ArcadeResetResult,
  type ArcadeStepResult,
} from "./env/ArcadeEnv.js";
export { ActionEncoder, DISCRETE6_TABLE, DISCRETE4_TABLE } from "./env/ActionEncoder.js";
export { ObservationComposer, DOWNSCALED_SIZE, RAM_SIZE } from "./env/ObservationComposer.js";
export {
  createRewardPolicy,
  ScoreDeltaReward,
  ShapedReward,
  TerminalReward,
  CustomReward,
  LIFE_LOST_PENALTY,
  SURVIVAL_BONUS,
  type RewardPolicy,
  type StepInfo,
} from "./env/RewardPolicy.js";
export {
  resolveConfig,
  presetConfig,
  isPresetName,
  OBS_TYPES,
  ACTION_TYPES,
  REWARD_TYPES,
  PRESET_NAMES,
  type ArcadeEnvConfig,
  type ResolvedArcadeEnvConfig,
  type ObsType,
  type ActionType,
  type RewardType,
  type RewardFn,
  type PresetName,
} from "./env/config.js";

// Emulator boundary
export {
  Emulator,
  Buttons,
  SCREEN_WIDTH,
  SCREEN_HEIGHT,
  type EmulatorCore,
} from "./emulator/Emulator.js";
export {
  EmulatorWasm,
  loadEmulatorWasm,
  DEFAULT_DIP_SWITCHES,
  type ArcadeWasmModule,
  type WasmArcadeMachine,
  type DipSwitches,
  type EmulatorWasmOptions,
} from "./emulator/EmulatorWasm.js";

// Replay
export { PrioritizedReplayBuffer, type PrioritizedReplayConfig, type PrioritizedBatch } from "./replay/PrioritizedReplayBuffer.js";
export { NStepAccumulator, type NStepConfig } from "./replay/NStepAccumulator.js";

// Shared types, errors, randomness
export {
  makeTransition,
  type Observation,
  type ArcadeAction,
  type Transition,
  type ReplayEntry,
} from "./core/types.js";
export {
  ArcadeEnvError,
  ConfigurationError,
  InvalidActionError,
  EmulatorFailure,
  EmptyBufferError,
  InsufficientPopulationError,
  StaleEpisodeError,
  type EmulatorOperation,
} from "./core/errors.js";
export { mulberry32, type Rng } from "./core/random.js";

// Bridge server
export { EnvServer, type EnvServerOptions } from "./bridge/server.js";
