import chalk from 'chalk';
import type { LoopStatus } from './orchestrator/frameLoop';

/** One-line summary of the watcher for the `status` command. */
export function formatStatus(status: LoopStatus): string {
  const auto = status.autoModeEnabled ? chalk.green('AUTO ON') : chalk.yellow('AUTO OFF');

  let mode: string;
  if (!status.initialScan.hasScannedOnce) {
    mode = status.mode === 'AWAITING_INITIAL_SCAN'
      ? chalk.cyan('INITIAL SCAN RUNNING')
      : chalk.cyan(`INITIAL SCAN: ${status.symbolCount} symbols, stable ${status.initialScan.stableCountFrames}/${status.initialScan.requiredStableFrames}`);
  } else if (status.mode === 'AWAITING_FULL_VIEW') {
    mode = chalk.magenta(`WAITING FOR FULL VIEW ${status.waitCounter}/${status.maxWaitFrames}`);
  } else {
    mode = `baseline ${status.baselineCount}, ${status.symbolCount} symbols`;
  }

  const cooldowns = chalk.dim(`turbo cd ${status.turboCooldown}, ocr cd ${status.ocrCooldown}`);
  const snapshot = status.hasSnapshot ? 'snapshot cached' : chalk.dim('no snapshot');
  const frame = status.lastFrameIndex === null ? 'no frames yet' : `frame ${status.lastFrameIndex}`;

  return `${auto} | ${mode} | ${cooldowns} | ${snapshot} | ${status.queuedActions} queued | ${frame}`;
}
