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
 * core/types.ts
 * Shared value types for the environment and the replay layer.
 */

/**
 * Dense uint8 tensor, row-major.
 */
export interface Observation {
  readonly data: Uint8Array;
  readonly shape: readonly number[];
}

/** Index for discrete action spaces, [move, fire] for multi_discrete. */
export type ArcadeAction = number | readonly [number, number];

/**
 * One step of experience. Frozen once created.
 */
export interface Transition<S = Observation, A = ArcadeAction> {
  readonly state: S;
  readonly action: A;
  readonly reward: number;
  readonly nextState: S;
  readonly done: boolean;
}

export function makeTransition<S, A>(
  state: S,
  action: A,
  reward: number,
  nextState: S,
  done: boolean
): Transition<S, A> {
  return Object.freeze({ state, action, reward, nextState, done });
}

/**
 * Stored transition plus its sampling priority and ring slot.
 */
export interface ReplayEntry<S = Observation, A = ArcadeAction> {
  readonly transition: Transition<S, A>;
  readonly priority: number;
  readonly index: number;
}

export function shapeSize(shape: readonly number[]): number {
  return shape.reduce((acc, dim) => acc * dim, 1);
}
