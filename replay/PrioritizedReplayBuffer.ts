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
 * Prioritized Experience Replay
 *
 * Fixed-capacity ring buffer. Entry i is sampled with probability
 * P(i) = p_i^alpha / sum_k p_k^alpha and returned with importance weight
 * (N * P(i))^-beta, normalized by the batch maximum. Beta is annealed
 * toward 1 after every sample() call.
 *
 * New transitions get the current maximum priority (1.0 when empty), so
 * each is drawn with top priority until the learner reports its TD error.
 */

import {
  ConfigurationError,
  EmptyBufferError,
  InsufficientPopulationError,
} from "../core/errors.js";
import { mulberry32, entropySeed, type Rng } from "../core/random.js";
import type { ArcadeAction, Observation, ReplayEntry, Transition } from "../core/types.js";

export interface PrioritizedReplayConfig {
  /** Maximum stored transitions (default: 50000) */
  capacity?: number;
  /** Priority exponent, 0 = uniform (default: 0.6) */
  alpha?: number;
  /** Initial importance-sampling exponent (default: 0.4) */
  betaStart?: number;
  /** Beta increase per sample() call (default: 0.001) */
  betaIncrement?: number;
  /** Floor added to |td error| (default: 1e-6) */
  epsilon?: number;
  /** Seed for the sampling generator (default: time based) */
  seed?: number;
}

export interface PrioritizedBatch<S, A> {
  transitions: Transition<S, A>[];
  /** Ring slots, for updatePriorities() */
  indices: number[];
  /** Importance-sampling weights in (0, 1] */
  weights: Float64Array;
}

export class PrioritizedReplayBuffer<S = Observation, A = ArcadeAction> {
  readonly capacity: number;
  readonly alpha: number;
  readonly betaIncrement: number;
  readonly epsilon: number;

  private storage: Transition<S, A>[] = [];
  private priorities: Float64Array;
  private insertions = 0;
  private _beta: number;
  private rng: Rng;

  constructor(config: PrioritizedReplayConfig = {}) {
    this.capacity = config.capacity ?? 50000;
    this.alpha = config.alpha ?? 0.6;
    this._beta = config.betaStart ?? 0.4;
    this.betaIncrement = config.betaIncrement ?? 0.001;
    this.epsilon = config.epsilon ?? 1e-6;

    if (!Number.isInteger(this.capacity) || this.capacity < 1) {
      throw new ConfigurationError(`capacity must be an integer >= 1, got ${this.capacity}`);
    }
    if (!(this.alpha >= 0)) {
      throw new ConfigurationError(`alpha must be >= 0, got ${this.alpha}`);
    }
    if (!(this._beta >= 0 && this._beta <= 1)) {
      throw new ConfigurationError(`betaStart must be in [0, 1], got ${this._beta}`);
    }
    if (!(this.betaIncrement >= 0)) {
      throw new ConfigurationError(`betaIncrement must be >= 0, got ${this.betaIncrement}`);
    }
    if (!(this.epsilon > 0)) {
      throw new ConfigurationError(`epsilon must be > 0, got ${this.epsilon}`);
    }

    this.priorities = new Float64Array(this.capacity);
    this.rng = mulberry32(config.seed ?? entropySeed());
  }

  get size(): number {
    return this.storage.length;
  }

  get beta(): number {
    return this._beta;
  }

  /** Total add() calls since construction or clear(). */
  get insertionCount(): number {
    return this.insertions;
  }

  /**
   * Store a transition at slot insertionCount mod capacity.
   * @returns the slot written
   */
  add(transition: Transition<S, A>): number {
    const priority = this.size > 0 ? this.maxPriority() : 1.0;
    const slot = this.insertions % this.capacity;

    if (slot === this.storage.length) {
      this.storage.push(transition);
    } else {
      this.storage[slot] = transition;
    }
    this.priorities[slot] = priority;
    this.insertions++;

    return slot;
  }

  get(index: number): ReplayEntry<S, A> {
    this.checkIndex(index);
    return { transition: this.storage[index], priority: this.priorities[index], index };
  }

  priorityAt(index: number): number {
    this.checkIndex(index);
    return this.priorities[index];
  }

  /** Current sampling distribution over stored slots. */
  probabilities(): Float64Array {
    const probs = new Float64Array(this.size);
    let total = 0;
    for (let i = 0; i < this.size; i++) {
      probs[i] = Math.pow(this.priorities[i], this.alpha);
      total += probs[i];
    }
    for (let i = 0; i < this.size; i++) {
      probs[i] /= total;
    }
    return probs;
  }

  /**
   * Draw `batchSize` distinct transitions, priority-weighted, without replacement.
   */
  sample(batchSize: number): PrioritizedBatch<S, A> {
    if (this.size === 0) {
      throw new EmptyBufferError();
    }
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`batchSize must be an integer >= 1, got ${batchSize}`);
    }
    if (batchSize > this.size) {
      throw new InsufficientPopulationError(batchSize, this.size);
    }

    const probs = this.probabilities();
    const indices = this.drawWithoutReplacement(probs, batchSize);

    const weights = new Float64Array(batchSize);
    let maxWeight = 0;
    for (let i = 0; i < batchSize; i++) {
      weights[i] = Math.pow(this.size * probs[indices[i]], -this._beta);
      maxWeight = Math.max(maxWeight, weights[i]);
    }
    for (let i = 0; i < batchSize; i++) {
      weights[i] /= maxWeight;
    }

    this._beta = Math.min(1.0, this._beta + this.betaIncrement);

    return {
      transitions: indices.map((i) => this.storage[i]),
      indices,
      weights,
    };
  }

  /**
   * Set priority_i = |tdError_i| + epsilon for each sampled slot.
   */
  updatePriorities(indices: readonly number[], tdErrors: ArrayLike<number>): void {
    if (indices.length !== tdErrors.length) {
      throw new RangeError(`Got ${indices.length} indices but ${tdErrors.length} TD errors`);
    }
    for (let i = 0; i < indices.length; i++) {
      this.checkIndex(indices[i]);
      if (!Number.isFinite(tdErrors[i])) {
        throw new RangeError(`TD error for slot ${indices[i]} is not finite: ${tdErrors[i]}`);
      }
    }

    for (let i = 0; i < indices.length; i++) {
      this.priorities[indices[i]] = Math.abs(tdErrors[i]) + this.epsilon;
    }
  }

  clear(): void {
    this.storage = [];
    this.priorities.fill(0);
    this.insertions = 0;
  }

  // --- Helper Methods ---

  private maxPriority(): number {
    let max = 0;
    for (let i = 0; i < this.size; i++) {
      if (this.priorities[i] > max) max = this.priorities[i];
    }
    return max;
  }

  /**
   * Sequential weighted draws; each pick is removed from the pool and the
   * remaining mass renormalized.
   */
  private drawWithoutReplacement(probs: Float64Array, count: number): number[] {
    const taken = new Uint8Array(probs.length);
    let remaining = probs.reduce((acc, p) => acc + p, 0);
    const picked: number[] = [];

    for (let draw = 0; draw < count; draw++) {
      const target = this.rng() * remaining;
      let cumulative = 0;
      let choice = -1;

      for (let i = 0; i < probs.length; i++) {
        if (taken[i]) continue;
        cumulative += probs[i];
        choice = i;
        if (target < cumulative) break;
      }

      // Rounding can leave target past the sum; choice is then the last free slot
      picked.push(choice);
      taken[choice] = 1;
      remaining -= probs[choice];
    }

    return picked;
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new RangeError(`Index ${index} outside stored range [0, ${this.size})`);
    }
  }
}
