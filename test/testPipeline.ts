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
 * Test suite for the collection loop
 * Tests: env steps -> transitions -> n-step window -> prioritized replay,
 * including the episode boundary
 */

import { ArcadeEnv } from '../env/ArcadeEnv.js';
import { presetConfig } from '../env/config.js';
import { Buttons } from '../emulator/Emulator.js';
import { NStepAccumulator } from '../replay/NStepAccumulator.js';
import { PrioritizedReplayBuffer } from '../replay/PrioritizedReplayBuffer.js';
import { makeTransition, type ArcadeAction, type Observation } from '../core/types.js';
import { FakeEmulatorCore } from './fixtures/FakeEmulatorCore.js';
import { test, assert, assertEquals, assertArrayEquals, section, finish } from './harness.js';

console.log('\n🧪 Testing Collection Pipeline\n');
console.log('═'.repeat(60));

function collector() {
  const core = new FakeEmulatorCore({
    onFrame: (c) => {
      if (c.currentInput & Buttons.P1_FIRE) c.score += 10;
    },
  });
  const env = new ArcadeEnv(core, presetConfig('arcade-v0-small', { maxEpisodeSteps: 4, seed: 1 }));
  const nstep = new NStepAccumulator({ n: 2, gamma: 0.5 });
  const replay = new PrioritizedReplayBuffer({ capacity: 16, seed: 7 });

  let observation: Observation = env.reset().observation;

  /** One env step pushed through the window into replay. Returns true at episode end. */
  function collect(action: ArcadeAction): boolean {
    const result = env.step(action);
    const done = result.terminated || result.truncated;

    nstep.add(makeTransition(observation, action, result.reward, result.observation, done));
    const folded = nstep.get();
    if (folded) replay.add(folded);

    if (done) {
      nstep.clear();
      observation = env.reset().observation;
    } else {
      observation = result.observation;
    }
    return done;
  }

  return { env, nstep, replay, collect, current: () => observation };
}

// ============================================================================
// ONE EPISODE
// ============================================================================

section('🔁 Episode to Replay');

test('every full window lands in replay as an n-step transition', () => {
  const { replay, collect } = collector();

  // FIRE, FIRE, NOOP, FIRE; the fourth step hits the step limit
  const ends = [1, 1, 0, 1].map((action) => collect(action));

  assertArrayEquals(ends.map(Number), [0, 0, 0, 1]);
  assertEquals(replay.size, 3);

  const rewards = [0, 1, 2].map((i) => replay.get(i).transition.reward);
  assertArrayEquals(rewards, [15, 10, 5], '10 + 0.5*10, 10 + 0.5*0, 0 + 0.5*10');

  const dones = [0, 1, 2].map((i) => Number(replay.get(i).transition.done));
  assertArrayEquals(dones, [0, 0, 1]);
});

test('the window is empty after the episode boundary', () => {
  const { nstep, collect } = collector();
  for (const action of [1, 1, 0, 1]) collect(action);

  assertEquals(nstep.length, 0);
});

test('the first window of a new episode starts from the reset observation', () => {
  const { replay, collect, current } = collector();
  for (const action of [1, 1, 0, 1]) collect(action);

  const start = current();
  collect(0);
  assertEquals(replay.size, 3, 'A single step of the new episode is not folded yet');

  collect(0);
  assertEquals(replay.size, 4);
  const folded = replay.get(3).transition;
  assert(folded.state === start, 'State should be the observation returned by reset()');
  assertEquals(folded.reward, 0);
  assertEquals(folded.done, false);
});

// ============================================================================
// SAMPLING
// ============================================================================

section('🎲 Sampling Collected Experience');

test('sampling the collected episode returns every slot once', () => {
  const { replay, collect } = collector();
  for (const action of [1, 1, 0, 1]) collect(action);

  const batch = replay.sample(3);

  assertArrayEquals([...batch.indices].sort((a, b) => a - b), [0, 1, 2]);
  assertEquals(Math.max(...batch.weights), 1);
  const total = batch.transitions.reduce((sum, t) => sum + t.reward, 0);
  assertEquals(total, 30);
});

test('reported TD errors reshape the next draw', () => {
  const { replay, collect } = collector();
  for (const action of [1, 1, 0, 1]) collect(action);

  const batch = replay.sample(3);
  replay.updatePriorities(batch.indices, [0, 0, 5]);

  const boosted = batch.indices[2];
  const probs = replay.probabilities();
  for (let i = 0; i < probs.length; i++) {
    if (i !== boosted) assert(probs[boosted] > probs[i], `Slot ${boosted} should outrank slot ${i}`);
  }
});

finish('collection pipeline');
