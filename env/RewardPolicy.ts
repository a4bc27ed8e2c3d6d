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
 * Reward policies for arcade environments
 *
 * A policy is chosen once at construction and maps the per-step info
 * record to a scalar reward:
 * - score_delta: raw change in score
 * - shaped: score change, minus 100 per life lost, plus 0.1 per step
 * - terminal: 0 until game over, then the episode's total score
 * - custom: caller-supplied pure function of the info record
 */

import { ConfigurationError } from "../core/errors.js";
import type { RewardFn, RewardType } from "./config.js";

/**
 * Per-step info record
 */
export interface StepInfo {
  score: number;
  totalScore: number;
  scoreDelta: number;
  lives: number;
  livesLost: number;
  level: number;
  frameCount: number;
  steps: number;
  terminated: boolean;
}

export interface RewardPolicy {
  readonly kind: RewardType;
  compute(info: Readonly<StepInfo>): number;
}

export const LIFE_LOST_PENALTY = 100;
export const SURVIVAL_BONUS = 0.1;

export class ScoreDeltaReward implements RewardPolicy {
  readonly kind = "score_delta";

  compute(info: Readonly<StepInfo>): number {
    return info.scoreDelta;
  }
}

export class ShapedReward implements RewardPolicy {
  readonly kind = "shaped";

  compute(info: Readonly<StepInfo>): number {
    let reward = info.scoreDelta;

    if (info.livesLost > 0) {
      reward -= LIFE_LOST_PENALTY * info.livesLost;
    }

    return reward + SURVIVAL_BONUS;
  }
}

export class TerminalReward implements RewardPolicy {
  readonly kind = "terminal";

  compute(info: Readonly<StepInfo>): number {
    return info.terminated ? info.totalScore : 0;
  }
}

export class CustomReward implements RewardPolicy {
  readonly kind = "custom";
  private readonly fn: RewardFn;

  constructor(fn: RewardFn) {
    this.fn = fn;
  }

  compute(info: Readonly<StepInfo>): number {
    return Number(this.fn({ ...info }));
  }
}

/**
 * Build the policy for a reward type.
 * @throws ConfigurationError for "custom" without a function
 */
export function createRewardPolicy(type: RewardType, fn?: RewardFn | null): RewardPolicy {
  switch (type) {
    case "score_delta":
      return new ScoreDeltaReward();
    case "shaped":
      return new ShapedReward();
    case "terminal":
      return new TerminalReward();
    case "custom":
      if (!fn) {
        throw new ConfigurationError('rewardFn must be provided when rewardType is "custom"');
      }
      return new CustomReward(fn);
  }
}
