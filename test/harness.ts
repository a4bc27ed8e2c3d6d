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
 * Minimal test harness shared by the test scripts.
 * Each script registers tests, then calls finish() to print results and exit.
 */

let testCount = 0;
let passCount = 0;
let failCount = 0;

export function test(name: string, fn: () => void): void {
  testCount++;
  try {
    fn();
    passCount++;
    console.log(`✓ ${name}`);
  } catch (err) {
    failCount++;
    console.error(`✗ ${name}`);
    console.error(`  ${err instanceof Error ? err.message : String(err)}`);
  }
}

export async function testAsync(name: string, fn: () => Promise<void>): Promise<void> {
  testCount++;
  try {
    await fn();
    passCount++;
    console.log(`✓ ${name}`);
  } catch (err) {
    failCount++;
    console.error(`✗ ${name}`);
    console.error(`  ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function assert(condition: boolean, message: string): void {
  if (!condition) {
    throw new Error(message || 'Assertion failed');
  }
}

export function assertEquals<T>(actual: T, expected: T, message?: string): void {
  if (actual !== expected) {
    throw new Error(message || `Expected ${String(expected)}, got ${String(actual)}`);
  }
}

export function assertClose(actual: number, expected: number, tolerance = 1e-9, message?: string): void {
  if (!(Math.abs(actual - expected) <= tolerance)) {
    throw new Error(message || `Expected ${expected} ± ${tolerance}, got ${actual}`);
  }
}

export function assertArrayEquals(actual: ArrayLike<number>, expected: ArrayLike<number>, message?: string): void {
  const label = message ?? 'Arrays differ';
  if (actual.length !== expected.length) {
    throw new Error(`${label}: length ${actual.length} !== ${expected.length}`);
  }
  for (let i = 0; i < actual.length; i++) {
    if (actual[i] !== expected[i]) {
      throw new Error(`${label}: index ${i}: ${actual[i]} !== ${expected[i]}`);
    }
  }
}

type ErrorClass<E extends Error> = abstract new (...args: never[]) => E;

/**
 * Run `fn` and require it to throw an instance of `errorClass`.
 */
export function assertThrows<E extends Error>(fn: () => unknown, errorClass: ErrorClass<E>, message?: string): E {
  try {
    fn();
  } catch (err) {
    if (err instanceof errorClass) return err;
    const got = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
    throw new Error(`${message ?? 'Wrong error'}: expected ${errorClass.name}, got ${got}`);
  }
  throw new Error(`${message ?? 'No error'}: expected ${errorClass.name} to be thrown`);
}

export async function assertRejects<E extends Error>(
  fn: () => Promise<unknown>,
  errorClass: ErrorClass<E>,
  message?: string
): Promise<E> {
  try {
    await fn();
  } catch (err) {
    if (err instanceof errorClass) return err;
    const got = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
    throw new Error(`${message ?? 'Wrong error'}: expected ${errorClass.name}, got ${got}`);
  }
  throw new Error(`${message ?? 'No error'}: expected ${errorClass.name} to be thrown`);
}

export function section(title: string): void {
  console.log(`\n${title}\n`);
}

export function finish(suite: string): never {
  console.log('\n' + '═'.repeat(60));
  console.log(`\n📊 Test Results: ${passCount}/${testCount} passed\n`);

  if (failCount === 0) {
    console.log(`🎉 All ${suite} tests passed!\n`);
    process.exit(0);
  } else {
    console.log(`❌ ${failCount} tests failed\n`);
    process.exit(1);
  }
}
