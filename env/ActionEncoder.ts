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
 * env/ActionEncoder.ts
 * Abstract action -> cabinet input bitmask.
 */

import { Buttons } from "../emulator/Emulator.js";
import { InvalidActionError } from "../core/errors.js";
import type { ArcadeAction } from "../core/types.js";
import type { Space } from "../interface/Gym.js";
import type { ActionType } from "./config.js";

const { P1_FIRE, LEFT, RIGHT } = Buttons;

// NOOP, FIRE, LEFT, RIGHT, LEFT+FIRE, RIGHT+FIRE
export const DISCRETE6_TABLE: readonly number[] = [0, P1_FIRE, LEFT, RIGHT, LEFT | P1_FIRE, RIGHT | P1_FIRE];

// NOOP, FIRE, LEFT, RIGHT
export const DISCRETE4_TABLE: readonly number[] = [0, P1_FIRE, LEFT, RIGHT];

// move: 0 = none, 1 = left, 2 = right
const MOVE_BITS: readonly number[] = [0, LEFT, RIGHT];
const FIRE_BITS: readonly number[] = [0, P1_FIRE];

const ACTION_NAMES: Record<ActionType, readonly string[]> = {
  discrete6: ["NOOP", "FIRE", "LEFT", "RIGHT", "LEFT+FIRE", "RIGHT+FIRE"],
  discrete4: ["NOOP", "FIRE", "LEFT", "RIGHT"],
  multi_discrete: [],
};

export class ActionEncoder {
  readonly actionType: ActionType;

  constructor(actionType: ActionType) {
    this.actionType = actionType;
  }

  get space(): Space {
    switch (this.actionType) {
      case "discrete6":
        return { shape: [], n: DISCRETE6_TABLE.length, dtype: "int64" };
      case "discrete4":
        return { shape: [], n: DISCRETE4_TABLE.length, dtype: "int64" };
      case "multi_discrete":
        return { shape: [2], nvec: [MOVE_BITS.length, FIRE_BITS.length], dtype: "int64" };
    }
  }

  /** The do-nothing action for this space. */
  get noop(): ArcadeAction {
    return this.actionType === "multi_discrete" ? [0, 0] : 0;
  }

  /**
   * Encode an action into an input bitmask.
   * @throws InvalidActionError when the action is outside the space
   */
  encode(action: ArcadeAction): number {
    switch (this.actionType) {
      case "discrete6":
        return lookup(DISCRETE6_TABLE, action, this.actionType);
      case "discrete4":
        return lookup(DISCRETE4_TABLE, action, this.actionType);
      case "multi_discrete": {
        if (typeof action === "number" || action.length !== 2) {
          throw new InvalidActionError(action, `multi_discrete expects a [move, fire] pair, got ${describe(action)}`);
        }
        const [move, fire] = action;
        if (!inRange(move, MOVE_BITS.length) || !inRange(fire, FIRE_BITS.length)) {
          throw new InvalidActionError(action, `Action ${describe(action)} out of range for multi_discrete [3, 2]`);
        }
        return MOVE_BITS[move] | FIRE_BITS[fire];
      }
    }
  }

  /** Human-readable label, e.g. "LEFT+FIRE". */
  describe(action: ArcadeAction): string {
    const buttons = this.encode(action);
    if (typeof action === "number") {
      return ACTION_NAMES[this.actionType][action] ?? "UNKNOWN";
    }
    const parts: string[] = [];
    if (buttons & LEFT) parts.push("LEFT");
    if (buttons & RIGHT) parts.push("RIGHT");
    if (buttons & P1_FIRE) parts.push("FIRE");
    return parts.length > 0 ? parts.join("+") : "NOOP";
  }
}

function inRange(value: number, size: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < size;
}

function lookup(table: readonly number[], action: ArcadeAction, actionType: ActionType): number {
  if (typeof action !== "number") {
    throw new InvalidActionError(action, `${actionType} expects an integer index, got ${describe(action)}`);
  }
  if (!inRange(action, table.length)) {
    throw new InvalidActionError(action, `Action ${action} out of range for ${actionType} (0-${table.length - 1})`);
  }
  return table[action];
}

function describe(action: ArcadeAction): string {
  return typeof action === "number" ? String(action) : `[${action.join(", ")}]`;
}
