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
 * interface/Gym.ts
 * A standardized Reinforcement Learning interface for arcade environments.
 * Follows the Gymnasium reset/step contract, synchronously.
 */

export interface StepResult<O, I> {
  observation: O;
  reward: number;
  terminated: boolean; // Game over
  truncated: boolean;  // Max steps reached
  info: I;
}

export interface ResetResult<O, I> {
  observation: O;
  info: I;
}

export interface Space {
  shape: number[];
  low?: number[];
  high?: number[];
  n?: number;       // Discrete spaces
  nvec?: number[];  // MultiDiscrete spaces
  dtype?: "uint8" | "int64";
}

/**
 * Abstract base class for environments.
 * Subclasses wrap a simulator and convert its state -> numeric tensors.
 */
export abstract class GymEnvironment<O, A, ResetInfo, StepInfo, ResetOptions = Record<string, never>> {
  abstract get observationSpace(): Space;
  abstract get actionSpace(): Space;

  /**
   * Resets the simulator to an initial state.
   * @param seed - Reseeds the environment's own generator when given.
   */
  abstract reset(seed?: number, options?: ResetOptions): ResetResult<O, ResetInfo>;

  /**
   * Executes one time-step within the environment.
   */
  abstract step(action: A): StepResult<O, StepInfo>;

  /**
   * Releases the underlying simulator.
   */
  abstract close(): void;
}
