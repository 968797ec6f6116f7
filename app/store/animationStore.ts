/**
 * Zustand store for the orbit animation
 * Wraps the pure animation driver state; vanilla store so it runs outside React
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import type { AnimationState } from "../lib/sim/animationDriver";
import {
  advanceFrame,
  createAnimationState,
  seekFrame,
  setPlaying,
} from "../lib/sim/animationDriver";

export interface AnimationStore {
  state: AnimationState;
  play: () => void;
  pause: () => void;
  tick: (steps?: number) => void;
  seek: (frameIndex: number) => void;
  reset: () => void;
}

export type AnimationStoreApi = StoreApi<AnimationStore>;

export function createAnimationStore(frameCount: number): AnimationStoreApi {
  return createStore<AnimationStore>((set) => ({
    state: createAnimationState(frameCount),

    play: () => {
      set((store) => ({ state: setPlaying(store.state, true) }));
    },

    pause: () => {
      set((store) => ({ state: setPlaying(store.state, false) }));
    },

    tick: (steps: number = 1) => {
      set((store) => ({ state: advanceFrame(store.state, steps) }));
    },

    seek: (frameIndex: number) => {
      set((store) => ({ state: seekFrame(store.state, frameIndex) }));
    },

    reset: () => {
      set({ state: createAnimationState(frameCount) });
    },
  }));
}

/**
 * Advance the store every frameDurationMs while it is playing.
 * Returns a stop function that pauses and clears the timer.
 */
export function startPlayback(store: AnimationStoreApi, frameDurationMs: number): () => void {
  store.getState().play();
  const timer = setInterval(() => {
    const { state, tick } = store.getState();
    if (state.playing) {
      tick();
    }
  }, frameDurationMs);

  return () => {
    clearInterval(timer);
    store.getState().pause();
  };
}

/**
 * Step synchronously through one full revolution starting at frame 0.
 * onFrame sees every frame exactly once; the store ends back at frame 0.
 */
export function runRevolution(
  store: AnimationStoreApi,
  onFrame: (state: AnimationState) => void
): void {
  const { seek } = store.getState();
  seek(0);
  const { frameCount } = store.getState().state;
  for (let i = 0; i < frameCount; i++) {
    onFrame(store.getState().state);
    store.getState().tick();
  }
}
