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
 * Emulator: scoped handle over an arcade emulator core
 *
 * The core is an opaque, deterministic state-transition engine reached
 * through a narrow call interface. It reports failures as status codes;
 * this handle turns them into EmulatorFailure and owns the core's lifetime:
 * acquired on construction, released exactly once.
 */

import { EmulatorFailure, type EmulatorOperation } from "../core/errors.js";

// Input bitmask (matches the cabinet's input port)
export const Buttons = {
  COIN: 1 << 0,
  P2_START: 1 << 1,
  P1_START: 1 << 2,
  P1_FIRE: 1 << 4,
  LEFT: 1 << 5,
  RIGHT: 1 << 6,
} as const;

export const SCREEN_WIDTH = 256;
export const SCREEN_HEIGHT = 224;

/** ARGB framebuffer bytes: SCREEN_HEIGHT * SCREEN_WIDTH * 4. */
export const FRAMEBUFFER_BYTES = SCREEN_WIDTH * SCREEN_HEIGHT * 4;
export const GRAY_FRAMEBUFFER_BYTES = SCREEN_WIDTH * SCREEN_HEIGHT;

/**
 * Raw emulator collaborator. Status-returning calls use 0 for success.
 */
export interface EmulatorCore {
  init(): number;
  destroy(): void;
  reset(): void;
  /** Runs one video frame; returns CPU cycles executed. */
  stepFrame(): number;
  setInput(buttons: number): void;
  readScore(): number;
  readLives(): number;
  readLevel(): number;
  isGameOver(): boolean;
  frameCount(): number;
  /** Refresh the framebuffer from video RAM. */
  updateFramebuffer(): void;
  /** ARGB pixels, row-major, FRAMEBUFFER_BYTES long. */
  framebuffer(): Uint8Array;
  /** Grayscale pixels, row-major, GRAY_FRAMEBUFFER_BYTES long. */
  framebufferGray(): Uint8Array;
  saveState(path: string): number;
  loadState(path: string): number;
}

export class Emulator {
  private core: EmulatorCore | null;

  /**
   * Initializes `core`. On failure the core is destroyed before the error
   * propagates.
   */
  constructor(core: EmulatorCore) {
    let code: number;
    try {
      code = guard("init", () => core.init());
    } catch (error) {
      core.destroy();
      throw error;
    }
    if (code !== 0) {
      core.destroy();
      throw new EmulatorFailure("init", code, `Failed to initialize emulator (error code: ${code})`);
    }
    this.core = core;
  }

  get released(): boolean {
    return this.core === null;
  }

  reset(): void {
    const core = this.acquired("reset");
    guard("reset", () => core.reset());
  }

  stepFrame(): number {
    const core = this.acquired("step");
    return guard("step", () => core.stepFrame());
  }

  setInput(buttons: number): void {
    const core = this.acquired("step");
    core.setInput(buttons);
  }

  /** Hold `buttons` for exactly one hardware frame. */
  pulse(buttons: number): void {
    this.setInput(buttons);
    this.stepFrame();
  }

  readScore(): number {
    return this.acquired("read").readScore();
  }

  readLives(): number {
    return this.acquired("read").readLives();
  }

  readLevel(): number {
    return this.acquired("read").readLevel();
  }

  isGameOver(): boolean {
    return this.acquired("read").isGameOver();
  }

  frameCount(): number {
    return this.acquired("read").frameCount();
  }

  updateFramebuffer(): void {
    this.acquired("read").updateFramebuffer();
  }

  framebuffer(): Uint8Array {
    return checkLength(this.acquired("read").framebuffer(), FRAMEBUFFER_BYTES, "framebuffer");
  }

  framebufferGray(): Uint8Array {
    return checkLength(this.acquired("read").framebufferGray(), GRAY_FRAMEBUFFER_BYTES, "grayscale framebuffer");
  }

  saveState(path: string): void {
    const core = this.acquired("save_state");
    const code = guard("save_state", () => core.saveState(path));
    if (code !== 0) {
      throw new EmulatorFailure("save_state", code, `Failed to save state to ${path} (error code: ${code})`);
    }
  }

  loadState(path: string): void {
    const core = this.acquired("load_state");
    const code = guard("load_state", () => core.loadState(path));
    if (code !== 0) {
      throw new EmulatorFailure("load_state", code, `Failed to load state from ${path} (error code: ${code})`);
    }
  }

  /**
   * Destroy the core. Safe to call more than once.
   */
  release(): void {
    const core = this.core;
    if (!core) return;
    this.core = null;
    core.destroy();
  }

  private acquired(operation: EmulatorOperation): EmulatorCore {
    if (!this.core) {
      throw new EmulatorFailure(operation, null, `Emulator already released (during ${operation})`);
    }
    return this.core;
  }
}

function guard<T>(operation: EmulatorOperation, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof EmulatorFailure) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new EmulatorFailure(operation, null, `Emulator ${operation} failed: ${reason}`, error);
  }
}

function checkLength(buffer: Uint8Array, expected: number, label: string): Uint8Array {
  if (buffer.length !== expected) {
    throw new EmulatorFailure("read", null, `Unexpected ${label} size: ${buffer.length} (expected ${expected})`);
  }
  return buffer;
}
