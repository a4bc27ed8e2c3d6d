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
 * env/ObservationComposer.ts
 * Framebuffer reads -> observation tensors (resize + frame stacking).
 *
 * Observation shapes:
 * - grayscale:  [224, 256]
 * - rgb:        [224, 256, 3]
 * - downscaled: [84, 84]
 * - ram:        [8192]
 * With frameStack > 1 (all but ram): [frameStack, ...shape]
 */

import { SCREEN_HEIGHT, SCREEN_WIDTH, type Emulator } from "../emulator/Emulator.js";
import { shapeSize, type Observation } from "../core/types.js";
import type { Space } from "../interface/Gym.js";
import type { ObsType } from "./config.js";

export const DOWNSCALED_SIZE = 84;
export const RAM_SIZE = 8192;

export type FrameSource = Pick<Emulator, "updateFramebuffer" | "framebuffer" | "framebufferGray">;

export class ObservationComposer {
  readonly obsType: ObsType;
  readonly frameStack: number;

  constructor(obsType: ObsType, frameStack: number) {
    this.obsType = obsType;
    this.frameStack = frameStack;
  }

  /** Shape of a single composed frame. */
  get frameShape(): number[] {
    switch (this.obsType) {
      case "grayscale":
        return [SCREEN_HEIGHT, SCREEN_WIDTH];
      case "rgb":
        return [SCREEN_HEIGHT, SCREEN_WIDTH, 3];
      case "downscaled":
        return [DOWNSCALED_SIZE, DOWNSCALED_SIZE];
      case "ram":
        return [RAM_SIZE];
    }
  }

  get stacks(): boolean {
    return this.frameStack > 1 && this.obsType !== "ram";
  }

  get space(): Space {
    const shape = this.stacks ? [this.frameStack, ...this.frameShape] : this.frameShape;
    const size = shapeSize(shape);
    return {
      shape,
      low: new Array<number>(size).fill(0),
      high: new Array<number>(size).fill(255),
      dtype: "uint8",
    };
  }

  /**
   * Read and convert the current frame. Always returns fresh memory.
   */
  readFrame(source: FrameSource): Observation {
    source.updateFramebuffer();

    switch (this.obsType) {
      case "grayscale":
        return { data: source.framebufferGray().slice(), shape: this.frameShape };
      case "rgb":
        return { data: dropAlpha(source.framebuffer()), shape: this.frameShape };
      case "downscaled":
        return {
          data: resizeBilinear(source.framebufferGray(), SCREEN_WIDTH, SCREEN_HEIGHT, DOWNSCALED_SIZE, DOWNSCALED_SIZE),
          shape: this.frameShape,
        };
      case "ram":
        // Placeholder: no memory dump is exposed by the core yet.
        return { data: new Uint8Array(RAM_SIZE), shape: this.frameShape };
    }
  }

  /**
   * Compose the observation for the current frame.
   *
   * `frameBuffer` is the episode's frame history and is updated in place:
   * the new frame is appended, the oldest evicted past `frameStack`, and
   * during warm-up the front is padded with copies of the current frame.
   */
  compose(source: FrameSource, frameBuffer: Observation[]): Observation {
    const frame = this.readFrame(source);
    if (!this.stacks) return frame;

    frameBuffer.push(frame);
    while (frameBuffer.length > this.frameStack) {
      frameBuffer.shift();
    }
    while (frameBuffer.length < this.frameStack) {
      frameBuffer.unshift(frame);
    }

    return stackFrames(frameBuffer);
  }
}

export function stackFrames(frames: readonly Observation[]): Observation {
  const frameSize = frames[0].data.length;
  const data = new Uint8Array(frameSize * frames.length);
  frames.forEach((frame, i) => data.set(frame.data, i * frameSize));
  return { data, shape: [frames.length, ...frames[0].shape] };
}

/** ARGB8888 bytes -> 3 channels, dropping the 4th byte of each pixel. */
export function dropAlpha(argb: Uint8Array): Uint8Array {
  const pixels = argb.length / 4;
  const out = new Uint8Array(pixels * 3);
  for (let i = 0; i < pixels; i++) {
    out[i * 3] = argb[i * 4];
    out[i * 3 + 1] = argb[i * 4 + 1];
    out[i * 3 + 2] = argb[i * 4 + 2];
  }
  return out;
}

/**
 * Single-channel bilinear resize with pixel-center alignment.
 */
export function resizeBilinear(
  src: Uint8Array,
  srcWidth: number,
  srcHeight: number,
  dstWidth: number,
  dstHeight: number
): Uint8Array {
  const dst = new Uint8Array(dstWidth * dstHeight);
  const scaleX = srcWidth / dstWidth;
  const scaleY = srcHeight / dstHeight;

  for (let y = 0; y < dstHeight; y++) {
    const sy = clamp((y + 0.5) * scaleY - 0.5, 0, srcHeight - 1);
    const y0 = Math.floor(sy);
    const y1 = Math.min(y0 + 1, srcHeight - 1);
    const wy = sy - y0;

    for (let x = 0; x < dstWidth; x++) {
      const sx = clamp((x + 0.5) * scaleX - 0.5, 0, srcWidth - 1);
      const x0 = Math.floor(sx);
      const x1 = Math.min(x0 + 1, srcWidth - 1);
      const wx = sx - x0;

      const top = src[y0 * srcWidth + x0] * (1 - wx) + src[y0 * srcWidth + x1] * wx;
      const bottom = src[y1 * srcWidth + x0] * (1 - wx) + src[y1 * srcWidth + x1] * wx;
      dst[y * dstWidth + x] = Math.round(top * (1 - wy) + bottom * wy);
    }
  }

  return dst;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
