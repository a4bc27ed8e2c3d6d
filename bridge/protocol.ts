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
 * Arcade Bridge Protocol
 *
 * Type definitions for the WebSocket message protocol between
 * learner clients and the Node.js environment server.
 * Wire keys are snake_case.
 */

import type { Space } from "../interface/Gym.js";
import type { ArcadeAction } from "../core/types.js";

// ============================================================================
// Command Types - Client -> Server
// ============================================================================

export interface ResetCommand {
  cmd: "reset";
  seed?: number;
  state_file?: string;
}

export interface StepCommand {
  cmd: "step";
  action: ArcadeAction;
}

export interface SaveStateCommand {
  cmd: "save_state";
  path: string;
}

export interface LoadStateCommand {
  cmd: "load_state";
  path: string;
}

export interface EnvInfoCommand {
  cmd: "env_info";
}

export interface PingCommand {
  cmd: "ping";
}

export interface CloseCommand {
  cmd: "close";
}

export type Command =
  | ResetCommand
  | StepCommand
  | SaveStateCommand
  | LoadStateCommand
  | EnvInfoCommand
  | PingCommand
  | CloseCommand;

// ============================================================================
// Response Types - Server -> Client
// ============================================================================

export interface WireObservation {
  shape: number[];
  data: number[];
}

export interface WireResetInfo {
  score: number;
  lives: number;
  level: number;
  frame_count: number;
}

export interface WireStepInfo {
  score: number;
  total_score: number;
  score_delta: number;
  lives: number;
  lives_lost: number;
  level: number;
  frame_count: number;
  steps: number;
  terminated: boolean;
}

export interface OkResponse {
  ok: true;
}

export interface ErrorResponse {
  error: string;
  /** Error class name, e.g. "InvalidActionError" */
  type: string;
}

export interface ResetResponse {
  observation: WireObservation;
  info: WireResetInfo;
}

export interface StepResponse {
  observation: WireObservation;
  reward: number;
  terminated: boolean;
  truncated: boolean;
  info: WireStepInfo;
}

export interface PongResponse {
  pong: number;
}

/** Space with uniform bounds sent as scalars. */
export interface WireSpace {
  shape: number[];
  low?: number;
  high?: number;
  n?: number;
  nvec?: number[];
  dtype?: Space["dtype"];
}

export interface EnvInfoResponse {
  env_type: string;
  env_options: Record<string, string | number | boolean | null>;
  observation_space: WireSpace;
  action_space: WireSpace;
}

export type Response =
  | OkResponse
  | ErrorResponse
  | ResetResponse
  | StepResponse
  | PongResponse
  | EnvInfoResponse;

// ============================================================================
// Helper type guard
// ============================================================================

export function isErrorResponse(response: Response): response is ErrorResponse {
  return "error" in response;
}
