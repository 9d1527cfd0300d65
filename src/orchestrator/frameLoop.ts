import { ActionKind, ActionOutcome } from '../errors';
import { log, LogLevel } from '../logger';
import { DetectionFilter, Frame } from '../types/detection';
import { toActionableDetections } from '../vision/detections';
import { extractOrderFingerprint, OrderFingerprint } from '../vision/orderFingerprint';
import { BackgroundTaskQueue } from './backgroundTaskQueue';
import { SheetPipeline } from './pipelineService';
import { SnapshotCache } from './snapshotCache';
import { TriggerDecision, TriggerStateMachine, TriggerStatus } from './triggerStateMachine';

export interface FrameLoopDependencies {
  trigger: TriggerStateMachine;
  cache: SnapshotCache;
  pipeline: SheetPipeline;
  queue: BackgroundTaskQueue;
  filter: DetectionFilter;
}

interface LastFrame {
  index: number;
  imagePath?: string;
  fingerprint: OrderFingerprint;
  symbolCount: number;
}

export interface LoopStatus extends TriggerStatus {
  lastFrameIndex: number | null;
  symbolCount: number;
  hasSnapshot: boolean;
  queuedActions: number;
}

/**
 * Feeds detector frames to the trigger state machine and dispatches the
 * resulting actions onto the background queue. Never waits on an action.
 */
export class FrameLoop {
  private lastFrame: LastFrame | null = null;

  constructor(private readonly deps: FrameLoopDependencies) {}

  processFrame(frame: Frame): TriggerDecision {
    const { trigger, cache, filter } = this.deps;
    const detections = toActionableDetections(frame.detections, filter);
    const fingerprint = extractOrderFingerprint(detections);
    this.lastFrame = { index: frame.index, imagePath: frame.imagePath, fingerprint, symbolCount: detections.length };

    const decision = trigger.evaluate({
      detections,
      frame: { width: frame.width, height: frame.height },
      hasSnapshot: cache.has(),
    });

    switch (decision) {
      case TriggerDecision.INITIAL_SCAN:
        // The latch is released whatever the outcome.
        void this.dispatchFullExtraction('initial_scan', frame.imagePath, fingerprint, () => trigger.markInitialScanComplete());
        break;
      case TriggerDecision.FULL_OCR:
        void this.dispatchFullExtraction('full_ocr', frame.imagePath, fingerprint);
        break;
      case TriggerDecision.TURBO:
        void this.dispatchTurbo(frame.imagePath, fingerprint);
        break;
      default:
        break;
    }
    return decision;
  }

  private dispatchFullExtraction(
    action: 'initial_scan' | 'full_ocr',
    imagePath: string | undefined,
    fingerprint: OrderFingerprint,
    onSettled?: () => void,
  ): Promise<ActionOutcome> {
    return this.deps.queue.enqueue(action, async () => {
      try {
        if (!imagePath) return noImage(action);
        return await this.deps.pipeline.runFullExtraction(action, imagePath, fingerprint);
      } finally {
        onSettled?.();
      }
    });
  }

  private dispatchTurbo(imagePath: string | undefined, fingerprint: OrderFingerprint): Promise<ActionOutcome> {
    return this.deps.queue.enqueue('turbo', () => this.deps.pipeline.runTurbo(imagePath, fingerprint));
  }

  /** Manual OCR of the latest frame; nothing is written. */
  runOcr(): Promise<ActionOutcome> {
    const imagePath = this.lastFrame?.imagePath;
    return this.deps.queue.enqueue('ocr_only', async () => {
      if (!imagePath) return noImage('ocr_only');
      return this.deps.pipeline.runOcrOnly(imagePath);
    });
  }

  /** Manual slow path on the latest frame. */
  runFullReconcile(): Promise<ActionOutcome> {
    this.deps.trigger.noteManualTrigger('ocr');
    return this.dispatchFullExtraction('full_ocr', this.lastFrame?.imagePath, this.lastFrame?.fingerprint ?? []);
  }

  /** Manual fast path on the latest frame. */
  runTurbo(): Promise<ActionOutcome> {
    this.deps.trigger.noteManualTrigger('turbo');
    if (!this.lastFrame) {
      log(LogLevel.WARN, '[Turbo] No frame received yet');
    }
    return this.dispatchTurbo(this.lastFrame?.imagePath, this.lastFrame?.fingerprint ?? []);
  }

  toggleAutoMode(): boolean {
    return this.deps.trigger.toggleAutoMode();
  }

  resetInitialScan(): void {
    this.deps.trigger.resetInitialScan();
  }

  status(): LoopStatus {
    return {
      ...this.deps.trigger.getStatus(),
      lastFrameIndex: this.lastFrame?.index ?? null,
      symbolCount: this.lastFrame?.symbolCount ?? 0,
      hasSnapshot: this.deps.cache.has(),
      queuedActions: this.deps.queue.size,
    };
  }

  whenIdle(): Promise<void> {
    return this.deps.queue.whenIdle();
  }
}

function noImage(action: ActionKind): ActionOutcome {
  return { action, status: 'skipped', message: 'No frame image available' };
}
