import type { TriggerConfig } from '../configLoader';
import { log, LogLevel } from '../logger';
import { Detection } from '../types/detection';
import {
  createFullViewState,
  createInitialScanState,
  detectFullPageView,
  detectInitialPageReady,
  FrameSize,
  FullViewState,
  InitialScanState,
} from '../vision/stabilityDetector';

export enum TriggerDecision {
  INITIAL_SCAN = 'INITIAL_SCAN',
  TURBO = 'TURBO',
  WAIT_FOR_FULL_VIEW = 'WAIT_FOR_FULL_VIEW',
  FULL_OCR = 'FULL_OCR',
  NONE = 'NONE',
}

export type TriggerMode = 'IDLE' | 'AWAITING_INITIAL_SCAN' | 'AWAITING_FULL_VIEW';

/**
 * Everything the trigger logic remembers between frames. Frame evaluation
 * takes one of these and hands back the next one; nothing else is mutated.
 */
export interface OrchestratorState {
  autoModeEnabled: boolean;
  /** Last symbol count acted upon. 0 means unset. */
  baselineCount: number;
  countHistory: number[];
  turboCooldown: number;
  ocrCooldown: number;
  awaitingFullView: boolean;
  waitCounter: number;
  fullView: FullViewState;
  initialScan: InitialScanState;
}

export interface FrameObservation {
  detections: readonly Detection[];
  frame: FrameSize;
  /** Whether the snapshot cache currently holds an extraction. */
  hasSnapshot: boolean;
}

export interface FrameEvaluation {
  state: OrchestratorState;
  decision: TriggerDecision;
  /** Human-readable cause, set whenever the decision is not NONE. */
  reason?: string;
}

export function createOrchestratorState(autoModeEnabled = true): OrchestratorState {
  return {
    autoModeEnabled,
    baselineCount: 0,
    countHistory: [],
    turboCooldown: 0,
    ocrCooldown: 0,
    awaitingFullView: false,
    waitCounter: 0,
    fullView: createFullViewState(),
    initialScan: createInitialScanState(),
  };
}

export function modeOf(state: OrchestratorState): TriggerMode {
  if (state.initialScan.awaitingCompletion) return 'AWAITING_INITIAL_SCAN';
  if (state.awaitingFullView) return 'AWAITING_FULL_VIEW';
  return 'IDLE';
}

function none(state: OrchestratorState): FrameEvaluation {
  return { state, decision: TriggerDecision.NONE };
}

/**
 * Decides what to do with one frame.
 *
 * Count decreases are treated as a page turn and re-extracted immediately;
 * increases wait until the whole page is steadily in view; an unchanged count
 * goes to the fingerprint fast path when a snapshot is cached.
 */
export function evaluateFrame(
  state: OrchestratorState,
  observation: FrameObservation,
  config: TriggerConfig,
): FrameEvaluation {
  if (!state.autoModeEnabled) return none(state);

  const { detections, frame, hasSnapshot } = observation;
  let next: OrchestratorState = state;

  if (!next.initialScan.hasScannedOnce && !next.initialScan.awaitingCompletion) {
    const initial = detectInitialPageReady(next.initialScan, detections, frame, config.initialScan);
    next = { ...next, initialScan: initial.state };
    if (initial.ready) {
      return {
        state: next,
        decision: TriggerDecision.INITIAL_SCAN,
        reason: `page ready for first scan with ${detections.length} symbols`,
      };
    }
  }

  if (next.initialScan.awaitingCompletion) return none(next);

  const count = detections.length;
  next = {
    ...next,
    turboCooldown: Math.max(0, next.turboCooldown - 1),
    ocrCooldown: Math.max(0, next.ocrCooldown - 1),
    countHistory: [...next.countHistory, count].slice(-Math.max(config.countHistorySize, config.stabilityThreshold)),
  };

  if (next.countHistory.length < config.stabilityThreshold) return none(next);
  const recent = next.countHistory.slice(-config.stabilityThreshold);
  const stableCount = recent[0];
  if (recent.some((c) => c !== stableCount)) return none(next);

  if (next.baselineCount === 0) {
    return none({ ...next, baselineCount: stableCount });
  }

  if (next.awaitingFullView) {
    const waitCounter = next.waitCounter + 1;
    const fullView = detectFullPageView(next.fullView, detections, config.fullView);
    const timedOut = waitCounter >= config.fullView.maxWaitFrames;

    if (fullView.ready || timedOut) {
      return {
        state: { ...next, fullView: fullView.state, awaitingFullView: false, waitCounter: 0, baselineCount: stableCount },
        decision: TriggerDecision.FULL_OCR,
        reason: fullView.ready ? 'page is stable and fully in view' : 'timed out waiting for a stable view',
      };
    }
    return {
      state: { ...next, fullView: fullView.state, waitCounter },
      decision: TriggerDecision.WAIT_FOR_FULL_VIEW,
      reason: `waiting for full view (${waitCounter}/${config.fullView.maxWaitFrames})`,
    };
  }

  const baseline = next.baselineCount;

  if (stableCount === baseline && stableCount > 0) {
    if (next.turboCooldown === 0 && hasSnapshot) {
      return {
        state: { ...next, turboCooldown: config.turboCooldownFrames },
        decision: TriggerDecision.TURBO,
        reason: `same symbol count (${stableCount})`,
      };
    }
    return none(next);
  }

  if (stableCount > baseline) {
    if (next.ocrCooldown === 0) {
      return {
        state: {
          ...next,
          awaitingFullView: true,
          waitCounter: 0,
          fullView: createFullViewState(),
          ocrCooldown: config.increaseOcrCooldownFrames,
        },
        decision: TriggerDecision.WAIT_FOR_FULL_VIEW,
        reason: `more symbols detected (${baseline} → ${stableCount})`,
      };
    }
    return none(next);
  }

  if (stableCount > 0 && next.ocrCooldown === 0) {
    return {
      state: { ...next, baselineCount: stableCount, ocrCooldown: config.decreaseOcrCooldownFrames },
      decision: TriggerDecision.FULL_OCR,
      reason: `fewer symbols detected (${baseline} → ${stableCount})`,
    };
  }

  return none(next);
}

export function markInitialScanComplete(state: OrchestratorState): OrchestratorState {
  return { ...state, initialScan: { ...state.initialScan, hasScannedOnce: true, awaitingCompletion: false } };
}

/** Re-arms the one-shot initial scan. A running detector cooldown is kept. */
export function resetInitialScan(state: OrchestratorState): OrchestratorState {
  return { ...state, initialScan: { ...createInitialScanState(), cooldown: state.initialScan.cooldown } };
}

export function setAutoMode(state: OrchestratorState, enabled: boolean): OrchestratorState {
  if (enabled) return { ...state, autoModeEnabled: true };
  return { ...state, autoModeEnabled: false, awaitingFullView: false, waitCounter: 0, turboCooldown: 0, ocrCooldown: 0 };
}

/** A manual action re-arms the cooldown of the matching automatic action. */
export function armCooldown(state: OrchestratorState, kind: 'turbo' | 'ocr', config: TriggerConfig): OrchestratorState {
  return kind === 'turbo'
    ? { ...state, turboCooldown: config.turboCooldownFrames }
    : { ...state, ocrCooldown: config.increaseOcrCooldownFrames };
}

export interface TriggerStatus {
  mode: TriggerMode;
  autoModeEnabled: boolean;
  baselineCount: number;
  turboCooldown: number;
  ocrCooldown: number;
  waitCounter: number;
  maxWaitFrames: number;
  initialScan: {
    hasScannedOnce: boolean;
    stableCountFrames: number;
    requiredStableFrames: number;
  };
}

/**
 * Owns the orchestrator state for the running process. All mutation goes
 * through the pure functions above.
 */
export class TriggerStateMachine {
  private state: OrchestratorState;

  constructor(private readonly config: TriggerConfig, autoModeEnabled = true) {
    this.state = createOrchestratorState(autoModeEnabled);
  }

  evaluate(observation: FrameObservation): TriggerDecision {
    const previousMode = modeOf(this.state);
    const result = evaluateFrame(this.state, observation, this.config);
    this.state = result.state;

    if (result.decision !== TriggerDecision.NONE) {
      // Waiting is re-emitted every stable frame; only log entering it.
      const quiet = result.decision === TriggerDecision.WAIT_FOR_FULL_VIEW && previousMode === 'AWAITING_FULL_VIEW';
      log(quiet ? LogLevel.DEBUG : LogLevel.INFO, `[Trigger] ${result.decision}: ${result.reason ?? ''}`);
    }
    return result.decision;
  }

  markInitialScanComplete(): void {
    this.state = markInitialScanComplete(this.state);
    log(LogLevel.INFO, '[Trigger] Initial scan completed - switching to normal auto mode');
  }

  resetInitialScan(): void {
    this.state = resetInitialScan(this.state);
    log(LogLevel.INFO, '[Trigger] Initial scan detector reset - ready for a new first scan');
  }

  toggleAutoMode(): boolean {
    this.state = setAutoMode(this.state, !this.state.autoModeEnabled);
    log(LogLevel.INFO, `[Trigger] AUTO mode ${this.state.autoModeEnabled ? 'enabled' : 'disabled'}`);
    return this.state.autoModeEnabled;
  }

  noteManualTrigger(kind: 'turbo' | 'ocr'): void {
    this.state = armCooldown(this.state, kind, this.config);
  }

  getStatus(): TriggerStatus {
    const { initialScan } = this.state;
    return {
      mode: modeOf(this.state),
      autoModeEnabled: this.state.autoModeEnabled,
      baselineCount: this.state.baselineCount,
      turboCooldown: this.state.turboCooldown,
      ocrCooldown: this.state.ocrCooldown,
      waitCounter: this.state.waitCounter,
      maxWaitFrames: this.config.fullView.maxWaitFrames,
      initialScan: {
        hasScannedOnce: initialScan.hasScannedOnce,
        stableCountFrames: initialScan.stableCountFrames,
        requiredStableFrames: this.config.initialScan.requiredStableFrames,
      },
    };
  }
}
