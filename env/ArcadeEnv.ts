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
 * env/ArcadeEnv.ts
 * Gym environment over a deterministic arcade emulator.
 *
 * Features:
 * - Observation types: grayscale, rgb, downscaled (84x84), ram
 * - Action spaces: discrete6, discrete4, multi_discrete
 * - Reward policies: score_delta, shaped, terminal, custom
 * - Frame skip, frame stacking, sticky actions, step-count truncation
 * - Save/load of opaque emulator states (curriculum starts)
 */

import { GymEnvironment, type ResetResult, type Space, type StepResult } from "../interface/Gym.js";
import { Buttons, Emulator, type EmulatorCore } from "../emulator/Emulator.js";
import { StaleEpisodeError } from "../core/errors.js";
import { mulberry32, entropySeed, type Rng } from "../core/random.js";
import type { ArcadeAction, Observation } from "../core/types.js";
import { ActionEncoder } from "./ActionEncoder.js";
import { ObservationComposer } from "./ObservationComposer.js";
import { createRewardPolicy, type RewardPolicy, type StepInfo } from "./RewardPolicy.js";
import { resolveConfig, type ArcadeEnvConfig, type ResolvedArcadeEnvConfig } from "./config.js";

export type EnvPhase = "ready" | "active" | "done" | "closed";

export interface ResetInfo {
  score: number;
  lives: number;
  level: number;
  frameCount: number;
}

export interface ResetOptions {
  /** Start from a saved emulator state instead of a cold reset */
  stateFile?: string;
}

export interface EpisodeState {
  steps: number;
  episodeScore: number;
  prevScore: number;
  prevLives: number;
  lastAction: ArcadeAction;
  frameBuffer: Observation[];
}

export type ArcadeResetResult = ResetResult<Observation, ResetInfo>;
export type ArcadeStepResult = StepResult<Observation, StepInfo>;

export class ArcadeEnv extends GymEnvironment<Observation, ArcadeAction, ResetInfo, StepInfo, ResetOptions> {
  readonly config: ResolvedArcadeEnvConfig;
  readonly encoder: ActionEncoder;
  readonly composer: ObservationComposer;
  readonly rewardPolicy: RewardPolicy;

  private readonly emulator: Emulator;
  private rng: Rng;
  private episode: EpisodeState;
  private _phase: EnvPhase = "ready";
  private _episodeCount = 0;

  /**
   * Takes exclusive ownership of `core`. Configuration is validated before
   * the core is initialized.
   */
  constructor(core: EmulatorCore, config: ArcadeEnvConfig = {}) {
    super();

    this.config = resolveConfig(config);
    this.encoder = new ActionEncoder(this.config.actionType);
    this.composer = new ObservationComposer(this.config.obsType, this.config.frameStack);
    this.rewardPolicy = createRewardPolicy(this.config.rewardType, this.config.rewardFn);
    this.rng = mulberry32(this.config.seed ?? entropySeed());
    this.episode = this.freshEpisode(0);

    this.emulator = new Emulator(core);
  }

  get observationSpace(): Space {
    return this.composer.space;
  }

  get actionSpace(): Space {
    return this.encoder.space;
  }

  get phase(): EnvPhase {
    return this._phase;
  }

  get episodeCount(): number {
    return this._episodeCount;
  }

  /** Read-only snapshot of the current episode counters. */
  get episodeState(): Readonly<Omit<EpisodeState, "frameBuffer">> & { frameBufferLength: number } {
    const { frameBuffer, ...counters } = this.episode;
    return { ...counters, frameBufferLength: frameBuffer.length };
  }

  reset(seed?: number, options: ResetOptions = {}): ArcadeResetResult {
    this.assertOpen("reset");

    if (seed !== undefined) {
      this.rng = mulberry32(seed);
    }

    if (options.stateFile !== undefined) {
      this.emulator.loadState(options.stateFile);
    } else {
      this.emulator.reset();
      this.bringUp();
    }

    this.episode = this.freshEpisode(this.emulator.readLives());
    this._phase = "active";
    this._episodeCount++;

    const observation = this.composer.compose(this.emulator, this.episode.frameBuffer);
    const info: ResetInfo = {
      score: 0,
      lives: this.episode.prevLives,
      level: 1,
      frameCount: this.emulator.frameCount(),
    };

    if (this.config.debug) {
      const origin = options.stateFile ? `state ${options.stateFile}` : "cold reset";
      console.log(`[ArcadeEnv] 🎮 Episode ${this._episodeCount} started (${origin}, lives=${info.lives})`);
    }

    return { observation, info };
  }

  step(action: ArcadeAction): ArcadeStepResult {
    this.assertOpen("step");
    if (this._phase === "ready") {
      throw new StaleEpisodeError("step() called before reset()");
    }
    if (this._phase === "done") {
      throw new StaleEpisodeError("step() called on a finished episode; call reset() first");
    }

    const episode = this.episode;

    // The requested action is validated even when a sticky repeat replaces it
    let buttons = this.encoder.encode(action);

    // Sticky actions
    if (this.config.repeatActionProbability > 0 && this.rng() < this.config.repeatActionProbability) {
      action = episode.lastAction;
      buttons = this.encoder.encode(action);
    }
    episode.lastAction = typeof action === "number" ? action : [action[0], action[1]];

    for (let i = 0; i < this.config.frameSkip; i++) {
      this.emulator.setInput(buttons);
      this.emulator.stepFrame();
    }

    // Counters are read once, after the skip window
    const score = this.emulator.readScore();
    const lives = this.emulator.readLives();
    const gameOver = this.emulator.isGameOver();
    const level = this.emulator.readLevel();

    const scoreDelta = score - episode.prevScore;
    const livesLost = episode.prevLives - lives;

    episode.prevScore = score;
    episode.prevLives = lives;
    episode.episodeScore = score;
    episode.steps++;

    const observation = this.composer.compose(this.emulator, episode.frameBuffer);

    const info: StepInfo = {
      score,
      totalScore: episode.episodeScore,
      scoreDelta,
      lives,
      livesLost,
      level,
      frameCount: this.emulator.frameCount(),
      steps: episode.steps,
      terminated: gameOver,
    };

    const reward = this.rewardPolicy.compute(info);

    const terminated = gameOver;
    const truncated = this.config.maxEpisodeSteps !== null && episode.steps >= this.config.maxEpisodeSteps;

    if (terminated || truncated) {
      this._phase = "done";
      if (this.config.debug) {
        const reason = terminated ? "game over" : "step limit";
        console.log(`[ArcadeEnv] 🏁 Episode ${this._episodeCount} ended (${reason}): score=${score}, steps=${episode.steps}`);
      }
    }

    return { observation, reward, terminated, truncated, info };
  }

  /**
   * Write the emulator state to `path` as an opaque blob.
   */
  saveState(path: string): void {
    this.assertOpen("saveState");
    this.emulator.saveState(path);
  }

  /**
   * Restore an opaque emulator state. Episode counters are left untouched;
   * use reset(undefined, { stateFile }) to start an episode from a state.
   */
  loadState(path: string): void {
    this.assertOpen("loadState");
    this.emulator.loadState(path);
  }

  close(): void {
    if (this._phase === "closed") return;
    this._phase = "closed";
    this.emulator.release();
  }

  // --- Helper Methods ---

  /** Coin, start, release: one hardware frame each. */
  private bringUp(): void {
    this.emulator.pulse(Buttons.COIN);
    this.emulator.pulse(Buttons.P1_START);
    this.emulator.pulse(0);
  }

  private freshEpisode(lives: number): EpisodeState {
    return {
      steps: 0,
      episodeScore: 0,
      prevScore: 0,
      prevLives: lives,
      lastAction: this.encoder.noop,
      frameBuffer: [],
    };
  }

  private assertOpen(operation: string): void {
    if (this._phase === "closed") {
      throw new StaleEpisodeError(`${operation}() called on a closed environment`);
    }
  }
}

/**
 * Run `fn` with an environment that is closed on every exit path.
 */
export function withArcadeEnv<T>(core: EmulatorCore, config: ArcadeEnvConfig, fn: (env: ArcadeEnv) => T): T {
  const env = new ArcadeEnv(core, config);
  try {
    return fn(env);
  } finally {
    env.close();
  }
}
