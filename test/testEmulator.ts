#!/usr/bin/env node
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
 * Test suite for the emulator boundary
 * Tests: Emulator handle (status codes, lifetime, buffer checks) and the
 * WebAssembly adapter against an in-process ArcadeMachine stand-in
 */

import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Emulator, Buttons } from '../emulator/Emulator.js';
import {
  EmulatorWasm,
  isArcadeWasmModule,
  loadEmulatorWasm,
  ROM_FILES,
  type ArcadeWasmModule,
  type WasmArcadeMachine,
} from '../emulator/EmulatorWasm.js';
import { EmulatorFailure } from '../core/errors.js';
import { FakeEmulatorCore } from './fixtures/FakeEmulatorCore.js';
import {
  test,
  testAsync,
  assert,
  assertEquals,
  assertArrayEquals,
  assertThrows,
  assertRejects,
  section,
  finish,
} from './harness.js';

console.log('\n🧪 Testing Emulator Boundary\n');
console.log('═'.repeat(60));

const workDir = mkdtempSync(join(tmpdir(), 'arcade-rl-test-'));
const romDir = join(workDir, 'roms');

function writeRoms(dir: string): void {
  mkdirSync(dir, { recursive: true });
  // Each ROM image holds one byte naming its load position
  ROM_FILES.forEach((name, i) => {
    writeFileSync(join(dir, name), new Uint8Array([i + 1]));
  });
}

// ============================================================================
// ArcadeMachine stand-in
// ============================================================================

class FakeMachine implements WasmArcadeMachine {
  static created: FakeMachine[] = [];
  static initCode = 0;
  static initTrap: Error | null = null;

  roms: number[] = [];
  dip: number[] = [];
  input = 0;
  frames = 0;
  freed = false;
  saveBlob = new Uint8Array([7, 7, 7]);
  loadedBlob: number[] = [];

  constructor() {
    FakeMachine.created.push(this);
  }

  init_headless(romH: Uint8Array, romG: Uint8Array, romF: Uint8Array, romE: Uint8Array, dip: Uint8Array): number {
    this.roms = [romH[0], romG[0], romF[0], romE[0]];
    this.dip = Array.from(dip);
    if (FakeMachine.initTrap) throw FakeMachine.initTrap;
    return FakeMachine.initCode;
  }
  reset(): void {
    this.frames = 0;
  }
  step_frame(): number {
    this.frames++;
    return 33333;
  }
  set_input(buttons: number): void {
    this.input = buttons;
  }
  score(): number {
    return 120;
  }
  lives(): number {
    return 3;
  }
  level(): number {
    return 1;
  }
  is_game_over(): boolean {
    return false;
  }
  frame_count(): number {
    return this.frames;
  }
  update_framebuffer(): void {}
  framebuffer(): Uint8Array {
    return new Uint8Array(0);
  }
  framebuffer_gray(): Uint8Array {
    return new Uint8Array(0);
  }
  save_state(): Uint8Array {
    return this.saveBlob;
  }
  load_state(blob: Uint8Array): number {
    this.loadedBlob = Array.from(blob);
    return 0;
  }
  free(): void {
    this.freed = true;
  }
}

const fakeModule: ArcadeWasmModule = { ArcadeMachine: FakeMachine };

function lastMachine(): FakeMachine {
  const machine = FakeMachine.created[FakeMachine.created.length - 1];
  if (!machine) throw new Error('No machine was created');
  return machine;
}

// ============================================================================
// Emulator handle
// ============================================================================

section('🔌 Emulator Handle');

test('pulse holds the buttons for exactly one frame', () => {
  const core = new FakeEmulatorCore();
  const emulator = new Emulator(core);

  emulator.pulse(Buttons.COIN);

  assertArrayEquals(core.inputs, [Buttons.COIN]);
  assertEquals(core.frames, 1);
});

test('nonzero init status raises EmulatorFailure and destroys the core', () => {
  const core = new FakeEmulatorCore({ initCode: -1 });
  const error = assertThrows(() => new Emulator(core), EmulatorFailure);

  assertEquals(error.operation, 'init');
  assertEquals(error.code, -1);
  assertEquals(core.destroyed, true);
});

test('release is idempotent and later calls fail', () => {
  const core = new FakeEmulatorCore();
  const emulator = new Emulator(core);

  emulator.release();
  emulator.release();

  assertEquals(core.count('destroy'), 1);
  assertEquals(emulator.released, true);
  const error = assertThrows(() => emulator.reset(), EmulatorFailure);
  assertEquals(error.operation, 'reset');
  assertEquals(error.code, null);
});

test('a wrongly sized framebuffer raises EmulatorFailure', () => {
  class ShortFrames extends FakeEmulatorCore {
    framebufferGray(): Uint8Array {
      return new Uint8Array(10);
    }
  }
  const emulator = new Emulator(new ShortFrames());

  const error = assertThrows(() => emulator.framebufferGray(), EmulatorFailure);
  assertEquals(error.operation, 'read');
});

// ============================================================================
// EmulatorWasm
// ============================================================================

section('🧩 EmulatorWasm');

writeRoms(romDir);

test('isArcadeWasmModule recognizes the module shape', () => {
  assert(isArcadeWasmModule(fakeModule), 'Fake module should match');
  assert(!isArcadeWasmModule({}), 'Empty object should not match');
  assert(!isArcadeWasmModule(null), 'null should not match');
  assert(!isArcadeWasmModule({ ArcadeMachine: 1 }), 'Non-constructor should not match');
});

test('init loads the ROM images in h, g, f, e order with default DIP switches', () => {
  const core = new EmulatorWasm(fakeModule, { romDir });

  assertEquals(core.init(), 0);
  const machine = lastMachine();
  assertArrayEquals(machine.roms, [1, 2, 3, 4]);
  assertArrayEquals(machine.dip, [0x0e, 0x08, 0x00]);
});

test('custom DIP switches reach the machine', () => {
  const core = new EmulatorWasm(fakeModule, { romDir, dipSwitches: [0x0f, 0x00, 0x01] });
  core.init();
  assertArrayEquals(lastMachine().dip, [0x0f, 0x00, 0x01]);
});

test('failed init frees the machine and returns its code', () => {
  FakeMachine.initCode = 4;
  try {
    const core = new EmulatorWasm(fakeModule, { romDir });
    assertEquals(core.init(), 4);
    assertEquals(lastMachine().freed, true);
  } finally {
    FakeMachine.initCode = 0;
  }
});

test('a trapping init frees the machine and surfaces as EmulatorFailure', () => {
  const trap = new Error('unreachable executed');
  FakeMachine.initTrap = trap;
  try {
    const core = new EmulatorWasm(fakeModule, { romDir });
    const error = assertThrows(() => new Emulator(core), EmulatorFailure);

    assertEquals(error.operation, 'init');
    assertEquals(error.cause, trap);
    assertEquals(lastMachine().freed, true);
  } finally {
    FakeMachine.initTrap = null;
  }
});

test('missing ROMs surface as EmulatorFailure through the handle', () => {
  const core = new EmulatorWasm(fakeModule, { romDir: join(workDir, 'no-roms') });
  const error = assertThrows(() => new Emulator(core), EmulatorFailure);

  assertEquals(error.operation, 'init');
  assert(error.cause instanceof Error, 'The file error should be the cause');
});

test('inputs are masked to the 8-bit port', () => {
  const core = new EmulatorWasm(fakeModule, { romDir });
  core.init();
  core.setInput(0x1ff);
  assertEquals(lastMachine().input, 0xff);
});

test('saveState writes the blob to disk unchanged', () => {
  const core = new EmulatorWasm(fakeModule, { romDir });
  core.init();
  const path = join(workDir, 'slot.state');

  assertEquals(core.saveState(path), 0);
  assertArrayEquals(new Uint8Array(readFileSync(path)), [7, 7, 7]);
});

test('an empty blob is a failed save and writes nothing', () => {
  const core = new EmulatorWasm(fakeModule, { romDir });
  core.init();
  lastMachine().saveBlob = new Uint8Array(0);
  const path = join(workDir, 'empty.state');

  assertEquals(core.saveState(path), -1);
  assertEquals(existsSync(path), false);
});

test('loadState hands the file contents to the machine', () => {
  const core = new EmulatorWasm(fakeModule, { romDir });
  core.init();
  const path = join(workDir, 'load.state');
  writeFileSync(path, new Uint8Array([9, 8, 7, 6]));

  assertEquals(core.loadState(path), 0);
  assertArrayEquals(lastMachine().loadedBlob, [9, 8, 7, 6]);
});

test('destroy frees the machine; later calls fail', () => {
  const core = new EmulatorWasm(fakeModule, { romDir });
  core.init();
  core.destroy();

  assertEquals(lastMachine().freed, true);
  assertThrows(() => core.stepFrame(), EmulatorFailure);
});

// ============================================================================
// loadEmulatorWasm()
// ============================================================================

section('📦 loadEmulatorWasm()');

await testAsync('loads a module exporting ArcadeMachine', async () => {
  const modulePath = join(workDir, 'machine.mjs');
  writeFileSync(
    modulePath,
    'export class ArcadeMachine { init_headless() { return 0; } free() {} }\n'
  );

  const core = await loadEmulatorWasm(modulePath, { romDir });
  assert(core instanceof EmulatorWasm, 'Should build an EmulatorWasm');
  assertEquals(core.init(), 0);
});

await testAsync('rejects a module without ArcadeMachine', async () => {
  const modulePath = join(workDir, 'empty.mjs');
  writeFileSync(modulePath, 'export const version = "0";\n');

  const error = await assertRejects(() => loadEmulatorWasm(modulePath, { romDir }), EmulatorFailure);
  assertEquals(error.operation, 'init');
});

rmSync(workDir, { recursive: true, force: true });

finish('emulator boundary');
