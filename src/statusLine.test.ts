import chalk from 'chalk';
import type { LoopStatus } from './orchestrator/frameLoop';
import { formatStatus } from './statusLine';

const idle: LoopStatus = {
  mode: 'IDLE',
  autoModeEnabled: true,
  baselineCount: 4,
  turboCooldown: 12,
  ocrCooldown: 0,
  waitCounter: 0,
  maxWaitFrames: 300,
  initialScan: { hasScannedOnce: true, stableCountFrames: 0, requiredStableFrames: 20 },
  lastFrameIndex: 1042,
  symbolCount: 4,
  hasSnapshot: true,
  queuedActions: 1,
};

describe('formatStatus', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('summarizes normal operation', () => {
    expect(formatStatus(idle)).toBe(
      'AUTO ON | baseline 4, 4 symbols | turbo cd 12, ocr cd 0 | snapshot cached | 1 queued | frame 1042',
    );
  });

  it('shows initial scan progress before the first scan', () => {
    const status: LoopStatus = {
      ...idle,
      autoModeEnabled: false,
      initialScan: { hasScannedOnce: false, stableCountFrames: 7, requiredStableFrames: 20 },
      symbolCount: 3,
      hasSnapshot: false,
      lastFrameIndex: null,
    };

    expect(formatStatus(status)).toBe(
      'AUTO OFF | INITIAL SCAN: 3 symbols, stable 7/20 | turbo cd 12, ocr cd 0 | no snapshot | 1 queued | no frames yet',
    );
  });

  it('shows the full-view wait', () => {
    expect(formatStatus({ ...idle, mode: 'AWAITING_FULL_VIEW', waitCounter: 9 })).toContain('WAITING FOR FULL VIEW 9/300');
  });

  it('shows a running initial scan', () => {
    const status: LoopStatus = {
      ...idle,
      mode: 'AWAITING_INITIAL_SCAN',
      initialScan: { hasScannedOnce: false, stableCountFrames: 20, requiredStableFrames: 20 },
    };

    expect(formatStatus(status)).toContain('| INITIAL SCAN RUNNING |');
  });
});
