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
 * EmulatorWasm: WebAssembly-backed emulator core
 *
 * Wraps a wasm-bindgen package that exports an `ArcadeMachine` class.
 * ROM images are read from disk and handed to the machine on init;
 * save states are opaque blobs written to / read from disk unchanged.
 */

import { readFileSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { EmulatorFailure } from "../core/errors.js";
import type { EmulatorCore } from "./Emulator.js";

/**
 * Surface of the wasm-bindgen `ArcadeMachine` class.
 * Status-returning methods use 0 for success.
 */
export interface WasmArcadeMachine {
  init_headless(romH: Uint8Array, romG: Uint8Array, romF: Uint8Array, romE: Uint8Array, dip: Uint8Array): number;
  reset(): void;
  step_frame(): number;
  set_input(buttons: number): void;
  score(): number;
  lives(): number;
  level(): number;
  is_game_over(): boolean;
  frame_count(): number;
  update_framebuffer(): void;
  framebuffer(): Uint8Array;
  framebuffer_gray(): Uint8Array;
  /** Empty array on failure. */
  save_state(): Uint8Array;
  load_state(blob: Uint8Array): number;
  free(): void;
}

export interface ArcadeWasmModule {
  ArcadeMachine: new () => WasmArcadeMachine;
}

export type DipSwitches = readonly [number, number, number];

export const DEFAULT_DIP_SWITCHES: DipSwitches = [0x0e, 0x08, 0x00];

/** ROM image file names, in load order. */
export const ROM_FILES = ["invaders.h", "invaders.g", "invaders.f", "invaders.e"] as const;

export interface EmulatorWasmOptions {
  /** Directory holding the ROM images */
  romDir: string;
  /** DIP switch bytes (default: 0x0E, 0x08, 0x00) */
  dipSwitches?: DipSwitches;
}

export function isArcadeWasmModule(mod: unknown): mod is ArcadeWasmModule {
  return (
    typeof mod === "object" &&
    mod !== null &&
    "ArcadeMachine" in mod &&
    typeof mod.ArcadeMachine === "function"
  );
}

export class EmulatorWasm implements EmulatorCore {
  private readonly wasm: ArcadeWasmModule;
  private readonly romDir: string;
  private readonly dipSwitches: DipSwitches;
  private machine: WasmArcadeMachine | null = null;

  constructor(wasm: ArcadeWasmModule, options: EmulatorWasmOptions) {
    this.wasm = wasm;
    this.romDir = resolve(options.romDir);
    this.dipSwitches = options.dipSwitches ?? DEFAULT_DIP_SWITCHES;
  }

  init(): number {
    const [h, g, f, e] = ROM_FILES.map((name) => new Uint8Array(readFileSync(join(this.romDir, name))));
    const machine = new this.wasm.ArcadeMachine();
    let code: number;
    try {
      code = machine.init_headless(h, g, f, e, Uint8Array.from(this.dipSwitches));
    } catch (error) {
      machine.free();
      throw error;
    }
    if (code !== 0) {
      machine.free();
      return code;
    }
    this.machine = machine;
    return 0;
  }

  destroy(): void {
    this.machine?.free();
    this.machine = null;
  }

  reset(): void {
    this.live().reset();
  }

  stepFrame(): number {
    return this.live().step_frame();
  }

  setInput(buttons: number): void {
    this.live().set_input(buttons & 0xff);
  }

  readScore(): number {
    return this.live().score();
  }

  readLives(): number {
    return this.live().lives();
  }

  readLevel(): number {
    return this.live().level();
  }

  isGameOver(): boolean {
    return this.live().is_game_over();
  }

  frameCount(): number {
    return this.live().frame_count();
  }

  updateFramebuffer(): void {
    this.live().update_framebuffer();
  }

  framebuffer(): Uint8Array {
    return this.live().framebuffer();
  }

  framebufferGray(): Uint8Array {
    return this.live().framebuffer_gray();
  }

  saveState(path: string): number {
    const blob = this.live().save_state();
    if (blob.length === 0) return -1;
    writeFileSync(path, blob);
    return 0;
  }

  loadState(path: string): number {
    const blob = new Uint8Array(readFileSync(path));
    return this.live().load_state(blob);
  }

  private live(): WasmArcadeMachine {
    if (!this.machine) {
      throw new EmulatorFailure("read", null, "Wasm machine is not initialized");
    }
    return this.machine;
  }
}

/**
 * Import a wasm-bindgen package (nodejs target) and build a core from it.
 */
export async function loadEmulatorWasm(modulePath: string, options: EmulatorWasmOptions): Promise<EmulatorWasm> {
  const mod: unknown = await import(pathToFileURL(resolve(modulePath)).href);
  if (!isArcadeWasmModule(mod)) {
    throw new EmulatorFailure("init", null, `Module ${modulePath} does not export an ArcadeMachine class`);
  }
  return new EmulatorWasm(mod, options);
}
