/**
 * Animation Driver State
 *
 * Pure state for stepping through one revolution in discrete frames.
 * The phase is the only thing that changes between frames; positions are
 * derived from it by the caller.
 */

import { InvalidParameterError } from '../model/errors';

export interface AnimationState {
  frameIndex: number;   // 0 .. frameCount-1
  frameCount: number;
  playing: boolean;
  phaseRadians: number; // 2π × frameIndex / frameCount
}

export function phaseForFrame(frameIndex: number, frameCount: number): number {
  return (2 * Math.PI * frameIndex) / frameCount;
}

function requireFrameCount(frameCount: number): void {
  if (!Number.isInteger(frameCount) || frameCount < 1) {
    throw new InvalidParameterError('frameCount', frameCount, 'must be an integer >= 1');
  }
}

export function createAnimationState(frameCount: number): AnimationState {
  requireFrameCount(frameCount);
  return {
    frameIndex: 0,
    frameCount,
    playing: false,
    phaseRadians: 0,
  };
}

/**
 * Jump to a frame; out-of-range indices wrap (negative ones too)
 */
export function seekFrame(state: AnimationState, frameIndex: number): AnimationState {
  if (!Number.isInteger(frameIndex)) {
    throw new InvalidParameterError('frameIndex', frameIndex, 'must be an integer');
  }
  const wrapped = ((frameIndex % state.frameCount) + state.frameCount) % state.frameCount;
  return {
    ...state,
    frameIndex: wrapped,
    phaseRadians: phaseForFrame(wrapped, state.frameCount),
  };
}

export function advanceFrame(state: AnimationState, steps: number = 1): AnimationState {
  return seekFrame(state, state.frameIndex + steps);
}

export function setPlaying(state: AnimationState, playing: boolean): AnimationState {
  return { ...state, playing };
}
