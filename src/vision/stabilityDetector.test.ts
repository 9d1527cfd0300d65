import type { FullViewConfig, InitialScanConfig } from '../configLoader';
import { Detection } from '../types/detection';
import { TaskStatus } from '../types/task';
import {
  createFullViewState,
  createInitialScanState,
  detectFullPageView,
  detectInitialPageReady,
  FullViewState,
  InitialScanState,
} from './stabilityDetector';

const fullViewConfig: FullViewConfig = {
  historySize: 20,
  requiredStableFrames: 2,
  positionThresholdPx: 30,
  maxWaitFrames: 300,
};

const initialConfig: InitialScanConfig = {
  historySize: 25,
  minHistory: 3,
  recentWindow: 3,
  maxDistinctCounts: 2,
  requiredStableFrames: 2,
  minSymbols: 3,
  growthStopFrames: 2,
  edgeMarginPx: 50,
  edgeRatio: 0.8,
  cooldownFrames: 5,
};

const frame = { width: 640, height: 480 };

function symbols(offset = 0, xs = [300, 300, 300]): Detection[] {
  const statuses = [TaskStatus.IN_PROGRESS, TaskStatus.NOT_STARTED, TaskStatus.COMPLETED];
  return xs.map((x, i) => ({ class: statuses[i % statuses.length], center: { x: x + offset, y: 150 + i * 60 }, confidence: 0.9 }));
}

function runFullView(frames: Detection[][]): { state: FullViewState; ready: boolean[] } {
  let state = createFullViewState();
  const ready: boolean[] = [];
  for (const detections of frames) {
    const result = detectFullPageView(state, detections, fullViewConfig);
    state = result.state;
    ready.push(result.ready);
  }
  return { state, ready };
}

describe('detectFullPageView', () => {
  it('becomes ready after the configured run of stable frames', () => {
    const { ready, state } = runFullView([symbols(), symbols(), symbols(5)]);

    expect(ready).toEqual([false, false, true]);
    expect(state.stableFrames).toBe(2);
  });

  it('is never ready when the symbol count differs from the previous frame', () => {
    const { ready, state } = runFullView([symbols(), symbols(), symbols().slice(0, 2)]);

    expect(ready[2]).toBe(false);
    expect(state.stableFrames).toBe(0);
  });

  it('resets the run when a symbol moves beyond the threshold', () => {
    const { ready, state } = runFullView([symbols(), symbols(), symbols(40)]);

    expect(ready).toEqual([false, false, false]);
    expect(state.stableFrames).toBe(0);
  });

  it('matches symbols by class, not by array position', () => {
    const reordered = [...symbols()].reverse();
    const { ready } = runFullView([symbols(), reordered, symbols()]);

    expect(ready).toEqual([false, false, true]);
  });

  it('treats a symbol whose class changed as unstable', () => {
    const changed = symbols().map((d, i) => (i === 0 ? { ...d, class: TaskStatus.MEETING } : d));
    const { state } = runFullView([symbols(), changed]);

    expect(state.stableFrames).toBe(0);
  });

  it('keeps a bounded position history', () => {
    const { state } = runFullView(Array.from({ length: 30 }, () => symbols()));

    expect(state.positionHistory).toHaveLength(fullViewConfig.historySize);
  });
});

function runInitial(
  frames: Detection[][],
  start: InitialScanState = createInitialScanState(),
): { state: InitialScanState; ready: boolean[] } {
  let state = start;
  const ready: boolean[] = [];
  for (const detections of frames) {
    const result = detectInitialPageReady(state, detections, frame, initialConfig);
    state = result.state;
    ready.push(result.ready);
  }
  return { state, ready };
}

describe('detectInitialPageReady', () => {
  it('fires once the count stopped growing and held steady', () => {
    const { ready, state } = runInitial(Array.from({ length: 4 }, () => symbols()));

    expect(ready).toEqual([false, false, false, true]);
    expect(state.awaitingCompletion).toBe(true);
    expect(state.cooldown).toBe(initialConfig.cooldownFrames);
  });

  it('does not fire again while awaiting completion or after the scan completed', () => {
    const first = runInitial(Array.from({ length: 4 }, () => symbols()));
    const pending = runInitial(Array.from({ length: 10 }, () => symbols()), first.state);
    const completed = runInitial(
      Array.from({ length: 40 }, () => symbols()),
      { ...pending.state, awaitingCompletion: false, hasScannedOnce: true },
    );

    expect(pending.ready.every((r) => !r)).toBe(true);
    expect(completed.ready.every((r) => !r)).toBe(true);
  });

  it('rejects a sheet whose symbols hug the frame edges', () => {
    const { ready } = runInitial(Array.from({ length: 6 }, () => symbols(0, [10, 10, 10])));

    expect(ready.every((r) => !r)).toBe(true);
  });

  it('waits for the minimum number of symbols', () => {
    const { ready, state } = runInitial(Array.from({ length: 8 }, () => symbols().slice(0, 2)));

    expect(ready.every((r) => !r)).toBe(true);
    expect(state.stableCountFrames).toBe(0);
  });

  it('waits while the count keeps growing', () => {
    const growing = [1, 2, 3, 4, 5, 6].map((n) => symbols(0, Array.from({ length: n }, () => 300)));
    const { ready } = runInitial(growing);

    expect(ready.every((r) => !r)).toBe(true);
  });

  it('counts down a running cooldown before evaluating', () => {
    const { ready, state } = runInitial([symbols(), symbols()], { ...createInitialScanState(), cooldown: 2 });

    expect(ready).toEqual([false, false]);
    expect(state.cooldown).toBe(0);
    expect(state.countHistory).toEqual([]);
  });
});
