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
 * core/errors.ts
 * Error taxonomy. Every error surfaces to the immediate caller; none is retried.
 */

export class ArcadeEnvError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid option at construction time. */
export class ConfigurationError extends ArcadeEnvError {}

/** Action outside the configured action space. */
export class InvalidActionError extends ArcadeEnvError {
  readonly action: unknown;

  constructor(action: unknown, message: string) {
    super(message);
    this.action = action;
  }
}

export type EmulatorOperation = "init" | "reset" | "step" | "save_state" | "load_state" | "read";

/**
 * Nonzero result (or thrown error) from the emulator core. Fatal.
 */
export class EmulatorFailure extends ArcadeEnvError {
  readonly operation: EmulatorOperation;
  readonly code: number | null;

  constructor(operation: EmulatorOperation, code: number | null, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.operation = operation;
    this.code = code;
  }
}

export class EmptyBufferError extends ArcadeEnvError {
  constructor() {
    super("Cannot sample from an empty replay buffer");
  }
}

export class InsufficientPopulationError extends ArcadeEnvError {
  readonly requested: number;
  readonly available: number;

  constructor(requested: number, available: number) {
    super(`Cannot draw ${requested} distinct samples from ${available} stored transitions`);
    this.requested = requested;
    this.available = available;
  }
}

/** step() called with no active episode. */
export class StaleEpisodeError extends ArcadeEnvError {}
