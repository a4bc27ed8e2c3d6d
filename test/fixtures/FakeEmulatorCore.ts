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
 * In-process emulator core for tests.
 *
 * Deterministic and scriptable: counters are plain fields, `onFrame` runs
 * after every hardware frame, every call is recorded in `calls` and every
 * frame's held input in `inputs`. Save states live in memory, keyed by path.
 *
 * Framebuffer contents encode the frame count at the last
 * updateFramebuffer(): every gray pixel is `frame & 0xff`, every ARGB
 * pixel is [frame & 0xff, 10, 20, 255].
 */

import { FRAMEBUFFER_BYTES, GRAY_FRAMEBUFFER_BYTES, type EmulatorCore } from '../../emulator/Emulator.js';

interface Snapshot {
  score: number;
  lives: number;
  level: number;
  gameOver: boolean;
  frames: number;
}

export interface FakeEmulatorOptions {
  /** Lives after a reset (default: 3) */
  lives?: number;
  initCode?: number;
  onFrame?: (core: FakeEmulatorCore) => void;
}

export class FakeEmulatorCore implements EmulatorCore {
  score = 0;
  lives: number;
  level = 1;
  gameOver = false;
  frames = 0;

  /** Status codes returned by the corresponding calls */
  initCode: number;
  saveCode = 0;
  loadCode = 0;
  /** Thrown from stepFrame() when set */
  stepError: Error | null = null;

  onFrame: ((core: FakeEmulatorCore) => void) | null;

  readonly calls: string[] = [];
  readonly inputs: number[] = [];
  readonly states = new Map<string, Snapshot>();
  destroyed = false;

  private readonly startLives: number;
  private input = 0;
  private shownFrame = 0;

  constructor(options: FakeEmulatorOptions = {}) {
    this.startLives = options.lives ?? 3;
    this.lives = this.startLives;
    this.initCode = options.initCode ?? 0;
    this.onFrame = options.onFrame ?? null;
  }

  /** Number of recorded calls to `method`. */
  count(method: string): number {
    return this.calls.filter((call) => call === method).length;
  }

  get currentInput(): number {
    return this.input;
  }

  init(): number {
    this.calls.push('init');
    return this.initCode;
  }

  destroy(): void {
    this.calls.push('destroy');
    this.destroyed = true;
  }

  reset(): void {
    this.calls.push('reset');
    this.score = 0;
    this.lives = this.startLives;
    this.level = 1;
    this.gameOver = false;
    this.frames = 0;
    this.input = 0;
  }

  stepFrame(): number {
    this.calls.push('stepFrame');
    if (this.stepError) throw this.stepError;
    this.inputs.push(this.input);
    this.frames++;
    this.onFrame?.(this);
    return 33333;
  }

  setInput(buttons: number): void {
    this.calls.push('setInput');
    this.input = buttons;
  }

  readScore(): number {
    this.calls.push('readScore');
    return this.score;
  }

  readLives(): number {
    this.calls.push('readLives');
    return this.lives;
  }

  readLevel(): number {
    this.calls.push('readLevel');
    return this.level;
  }

  isGameOver(): boolean {
    this.calls.push('isGameOver');
    return this.gameOver;
  }

  frameCount(): number {
    return this.frames;
  }

  updateFramebuffer(): void {
    this.calls.push('updateFramebuffer');
    this.shownFrame = this.frames;
  }

  framebuffer(): Uint8Array {
    const out = new Uint8Array(FRAMEBUFFER_BYTES);
    for (let i = 0; i < out.length; i += 4) {
      out[i] = this.shownFrame & 0xff;
      out[i + 1] = 10;
      out[i + 2] = 20;
      out[i + 3] = 255;
    }
    return out;
  }

  framebufferGray(): Uint8Array {
    return new Uint8Array(GRAY_FRAMEBUFFER_BYTES).fill(this.shownFrame & 0xff);
  }

  saveState(path: string): number {
    this.calls.push('saveState');
    if (this.saveCode !== 0) return this.saveCode;
    this.states.set(path, {
      score: this.score,
      lives: this.lives,
      level: this.level,
      gameOver: this.gameOver,
      frames: this.frames,
    });
    return 0;
  }

  loadState(path: string): number {
    this.calls.push('loadState');
    if (this.loadCode !== 0) return this.loadCode;
    const snapshot = this.states.get(path);
    if (!snapshot) return -2;
    this.score = snapshot.score;
    this.lives = snapshot.lives;
    this.level = snapshot.level;
    this.gameOver = snapshot.gameOver;
    this.frames = snapshot.frames;
    return 0;
  }
}
