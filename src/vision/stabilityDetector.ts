import type { FullViewConfig, InitialScanConfig } from '../configLoader';
import { Detection } from '../types/detection';

export interface FullViewState {
  positionHistory: Detection[][];
  stableFrames: number;
}

export interface InitialScanState {
  /** Set externally once the initial-scan action has finished. */
  hasScannedOnce: boolean;
  /** Set when readiness fired; nothing else is evaluated until completion. */
  awaitingCompletion: boolean;
  countHistory: number[];
  maxCountSeen: number;
  stableCountFrames: number;
  growthStoppedFrames: number;
  cooldown: number;
}

export interface FrameSize {
  width: number;
  height: number;
}

export interface Readiness<S> {
  state: S;
  ready: boolean;
}

export function createFullViewState(): FullViewState {
  return { positionHistory: [], stableFrames: 0 };
}

export function createInitialScanState(): InitialScanState {
  return {
    hasScannedOnce: false,
    awaitingCompletion: false,
    countHistory: [],
    maxCountSeen: 0,
    stableCountFrames: 0,
    growthStoppedFrames: 0,
    cooldown: 0,
  };
}

function distance(a: Detection, b: Detection): number {
  return Math.hypot(a.center.x - b.center.x, a.center.y - b.center.y);
}

/**
 * Every current symbol needs a same-class symbol in the previous frame within
 * the threshold. Matching is nearest-neighbour per class, not by array index.
 */
function positionsStable(current: readonly Detection[], previous: readonly Detection[], thresholdPx: number): boolean {
  return current.every((symbol) => {
    let best = Number.POSITIVE_INFINITY;
    for (const candidate of previous) {
      if (candidate.class !== symbol.class) continue;
      best = Math.min(best, distance(symbol, candidate));
    }
    return best <= thresholdPx;
  });
}

/**
 * Full-page-view readiness: a run of frames in which the symbol count holds and
 * no symbol moved further than the threshold. Any instability resets the run.
 */
export function detectFullPageView(
  state: FullViewState,
  detections: readonly Detection[],
  config: FullViewConfig,
): Readiness<FullViewState> {
  const historySize = Math.max(2, config.historySize);
  const positionHistory = [...state.positionHistory, [...detections]].slice(-historySize);

  if (positionHistory.length < 2) {
    return { state: { ...state, positionHistory }, ready: false };
  }

  const previous = positionHistory[positionHistory.length - 2];
  if (previous.length !== detections.length) {
    return { state: { positionHistory, stableFrames: 0 }, ready: false };
  }

  const stableFrames = positionsStable(detections, previous, config.positionThresholdPx)
    ? state.stableFrames + 1
    : 0;

  return {
    state: { positionHistory, stableFrames },
    ready: stableFrames >= config.requiredStableFrames,
  };
}

function mostlyAtEdges(detections: readonly Detection[], frame: FrameSize, config: InitialScanConfig): boolean {
  if (detections.length === 0) return false;
  const margin = config.edgeMarginPx;
  const atEdge = detections.filter(({ center: { x, y } }) =>
    x < margin || x > frame.width - margin || y < margin || y > frame.height - margin).length;
  return atEdge / detections.length > config.edgeRatio;
}

/**
 * One-shot readiness for the first scan of a page: the symbol count stopped
 * growing, held steady, meets the minimum, and the symbols are not hugging the
 * frame edges (a partially visible sheet). Fires at most once until reset.
 */
export function detectInitialPageReady(
  state: InitialScanState,
  detections: readonly Detection[],
  frame: FrameSize,
  config: InitialScanConfig,
): Readiness<InitialScanState> {
  if (state.hasScannedOnce || state.awaitingCompletion) {
    return { state, ready: false };
  }

  if (state.cooldown > 0) {
    return { state: { ...state, cooldown: state.cooldown - 1 }, ready: false };
  }

  const count = detections.length;
  const next: InitialScanState = {
    ...state,
    countHistory: [...state.countHistory, count].slice(-config.historySize),
  };

  if (count > next.maxCountSeen) {
    next.maxCountSeen = count;
    next.growthStoppedFrames = 0;
  } else {
    next.growthStoppedFrames += 1;
  }

  if (next.countHistory.length < config.minHistory) {
    return { state: next, ready: false };
  }

  if (count < config.minSymbols) {
    next.stableCountFrames = 0;
    return { state: next, ready: false };
  }

  const recent = next.countHistory.slice(-config.recentWindow);
  next.stableCountFrames = new Set(recent).size <= config.maxDistinctCounts
    ? next.stableCountFrames + 1
    : 0;

  const ready = next.stableCountFrames >= config.requiredStableFrames
    && next.growthStoppedFrames >= config.growthStopFrames
    && !mostlyAtEdges(detections, frame, config);

  if (ready) {
    next.awaitingCompletion = true;
    next.cooldown = config.cooldownFrames;
  }

  return { state: next, ready };
}
