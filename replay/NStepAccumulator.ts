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
 * replay/NStepAccumulator.ts
 * Sliding window that folds n consecutive transitions into one n-step transition.
 */

import { ConfigurationError } from "../core/errors.js";
import { makeTransition, type Observation, type ArcadeAction, type Transition } from "../core/types.js";

export interface NStepConfig {
  /** Window length (default: 3) */
  n?: number;
  /** Discount factor (default: 0.99) */
  gamma?: number;
}

export class NStepAccumulator<S = Observation, A = ArcadeAction> {
  readonly n: number;
  readonly gamma: number;
  private window: Transition<S, A>[] = [];

  constructor(config: NStepConfig = {}) {
    this.n = config.n ?? 3;
    this.gamma = config.gamma ?? 0.99;

    if (!Number.isInteger(this.n) || this.n < 1) {
      throw new ConfigurationError(`n must be an integer >= 1, got ${this.n}`);
    }
    if (!(this.gamma >= 0 && this.gamma <= 1)) {
      throw new ConfigurationError(`gamma must be in [0, 1], got ${this.gamma}`);
    }
  }

  get length(): number {
    return this.window.length;
  }

  get ready(): boolean {
    return this.window.length >= this.n;
  }

  /** Push a transition; the oldest is evicted once the window is full. */
  add(transition: Transition<S, A>): void {
    this.window.push(transition);
    if (this.window.length > this.n) {
      this.window.shift();
    }
  }

  /**
   * The n-step transition for the window's first state, or null while the
   * window is not full. The return stops at the first done transition; the
   * bootstrap state and done flag come from that transition.
   */
  get(): Transition<S, A> | null {
    if (!this.ready) return null;

    const first = this.window[0];
    let last = this.window[this.window.length - 1];
    let ret = 0;

    for (let i = 0; i < this.window.length; i++) {
      const t = this.window[i];
      ret += Math.pow(this.gamma, i) * t.reward;
      if (t.done) {
        last = t;
        break;
      }
    }

    return makeTransition(first.state, first.action, ret, last.nextState, last.done);
  }

  /** Drop the window. Call at every episode boundary. */
  clear(): void {
    this.window = [];
  }
}
