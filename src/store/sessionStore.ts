import { createStore } from "zustand/vanilla";

import { DEFAULT_BOUND, DEFAULT_DIRECTION } from "@/lib/config";
import { schedule, type Direction, type DiskAlgorithm, type SeekResult } from "@/lib/disk";
import { getErrorMessage } from "@/lib/disk/errors";
import { getReplayMax } from "@/lib/replay";

export type PlaybackRate = 0.5 | 1 | 2 | 4;

export type SessionInput = {
  algorithm: DiskAlgorithm;
  requests: number[];
  head: number;
  direction: Direction;
  bound: number;
};

type SessionState = {
  input: SessionInput;
  result: SeekResult | null;
  lastError: string | null;
  replayT: number;
  replayMax: number;
  isPlaying: boolean;
  playbackRate: PlaybackRate;
  configure: (patch: Partial<SessionInput>) => void;
  run: () => SeekResult | null;
  setPlaying: (playing: boolean) => void;
  setPlaybackRate: (rate: PlaybackRate) => void;
  stepReplay: (delta: number) => void;
  jumpTo: (time: number) => void;
  reset: () => void;
};

export type SessionStore = ReturnType<typeof createSessionStore>;

const INITIAL_INPUT: SessionInput = {
  algorithm: "FCFS",
  requests: [],
  head: 0,
  direction: DEFAULT_DIRECTION,
  bound: DEFAULT_BOUND,
};

function clamp(value: number, min: number, max: number) {
  return Math.max(min, Math.min(value, max));
}

export function createSessionStore(initial: Partial<SessionInput> = {}) {
  const startInput: SessionInput = { ...INITIAL_INPUT, ...initial, requests: [...(initial.requests ?? [])] };

  return createStore<SessionState>((set, get) => ({
    input: startInput,
    result: null,
    lastError: null,
    replayT: 0,
    replayMax: 0,
    isPlaying: false,
    playbackRate: 1,
    // a new input invalidates the previous run
    configure: (patch) =>
      set((state) => ({
        input: {
          ...state.input,
          ...patch,
          requests: patch.requests ? [...patch.requests] : state.input.requests,
        },
        result: null,
        lastError: null,
        replayT: 0,
        replayMax: 0,
        isPlaying: false,
      })),
    run: () => {
      try {
        const result = schedule(get().input);
        set({
          result,
          lastError: null,
          replayT: 0,
          replayMax: getReplayMax(result),
          isPlaying: false,
        });
        return result;
      } catch (error) {
        set({ result: null, lastError: getErrorMessage(error), replayT: 0, replayMax: 0, isPlaying: false });
        return null;
      }
    },
    setPlaying: (playing) => set((state) => ({ isPlaying: playing && state.result !== null })),
    setPlaybackRate: (rate) => set({ playbackRate: rate }),
    stepReplay: (delta) =>
      set((state) => {
        const replayT = clamp(state.replayT + Math.floor(delta), 0, state.replayMax);
        return {
          replayT,
          isPlaying: state.isPlaying && replayT < state.replayMax,
        };
      }),
    jumpTo: (time) =>
      set((state) => ({
        replayT: clamp(Math.floor(time), 0, state.replayMax),
      })),
    reset: () =>
      set({
        input: { ...startInput, requests: [...startInput.requests] },
        result: null,
        lastError: null,
        replayT: 0,
        replayMax: 0,
        isPlaying: false,
        playbackRate: 1,
      }),
  }));
}
