#!/usr/bin/env node
import 'dotenv/config'; // Load .env file into process.env
import readline from 'readline';

import { bootstrapLogger, applyLoggerConfig, describeError, log, LogLevel } from './logger';
import { loadConfig, getConfig } from './configLoader';
import { JsonlFrameSource } from './frames/jsonlFrameSource';
import { LangChainOcrClient } from './ocr/ocrClient';
import { buildOcrPrompt, TASK_SHEET_PROMPT } from './ocr/ocrPrompt';
import { BackgroundTaskQueue } from './orchestrator/backgroundTaskQueue';
import { FrameLoop } from './orchestrator/frameLoop';
import { SheetPipeline } from './orchestrator/pipelineService';
import { SnapshotCache } from './orchestrator/snapshotCache';
import { TriggerStateMachine } from './orchestrator/triggerStateMachine';
import { TaskReconciler } from './reconciliation/taskReconciler';
import { DailyRepository } from './store/dailyRepository';
import { SqliteDocumentStore } from './store/sqliteDocumentStore';
import { formatStatus } from './statusLine';

const HELP = 'Commands: ocr | full | turbo | auto | reset | status | exit';

function createRepl(loop: FrameLoop, shutdown: () => void): readline.Interface {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: '> ',
  });

  rl.on('line', (line: string) => {
    const command = line.trim().toLowerCase();
    switch (command) {
      case '':
        break;
      case 'ocr':
        void loop.runOcr();
        break;
      case 'full':
        void loop.runFullReconcile();
        break;
      case 'turbo':
        void loop.runTurbo();
        break;
      case 'auto': {
        const enabled = loop.toggleAutoMode();
        log(LogLevel.RESPONSE, `AUTO mode ${enabled ? 'enabled' : 'disabled'}`);
        break;
      }
      case 'reset':
        loop.resetInitialScan();
        break;
      case 'status':
        console.log(formatStatus(loop.status()));
        break;
      case 'exit':
        rl.close();
        return;
      default:
        log(LogLevel.RESPONSE, `Unknown command '${command}'. ${HELP}`);
    }
    rl.prompt();
  });
  rl.on('close', shutdown);
  return rl;
}

// --- Main Application ---
async function main() {
  bootstrapLogger();
  loadConfig();
  const appConfig = getConfig();
  applyLoggerConfig(appConfig.logging);
  log(LogLevel.INFO, `${appConfig.appName} starting up... v${appConfig.version}`);

  if (!appConfig.ocr.apiKey && !process.env.OPENAI_API_KEY) {
    log(LogLevel.WARN, 'OCR API key is not set. OCR actions will fail until one is configured.');
  }

  const store = SqliteDocumentStore.open(appConfig.store.dbPath);
  const repository = new DailyRepository(store);

  const promptProvider = async (): Promise<string> => {
    try {
      return buildOcrPrompt(await repository.listProjects());
    } catch (error) {
      log(LogLevel.WARN, 'Could not list projects for the OCR prompt', describeError(error));
      return `${TASK_SHEET_PROMPT.trim()}\nThe project list could not be loaded.`;
    }
  };

  const cache = new SnapshotCache();
  const queue = new BackgroundTaskQueue();
  const pipeline = new SheetPipeline({
    ocr: new LangChainOcrClient(appConfig.ocr, promptProvider),
    repository,
    reconciler: new TaskReconciler(repository),
    cache,
  });
  const loop = new FrameLoop({
    trigger: new TriggerStateMachine(appConfig.trigger, appConfig.autoModeEnabled),
    cache,
    pipeline,
    queue,
    filter: appConfig.detector,
  });

  const frameSource = new JsonlFrameSource(appConfig.frames.source ?? process.stdin);

  let shuttingDown = false;
  const shutdown = () => {
    if (shuttingDown) return;
    shuttingDown = true;
    log(LogLevel.INFO, 'Shutting down; waiting for queued actions...');
    frameSource.stop();
    queue.whenIdle()
      .then(() => {
        store.close();
        log(LogLevel.INFO, 'Goodbye!');
        process.exit(0);
      })
      .catch((error: unknown) => {
        log(LogLevel.ERROR, 'Error during shutdown', describeError(error));
        process.exit(1);
      });
  };

  console.log(`\n--------------------------------------------------`);
  console.log(`  OCR models:   ${appConfig.ocr.fullModelName} (full), ${appConfig.ocr.fastModelName} (fast)`);
  console.log(`  Store:        ${appConfig.store.dbPath}`);
  console.log(`  Frames:       ${appConfig.frames.source ?? 'stdin'}`);
  console.log(`  AUTO mode:    ${appConfig.autoModeEnabled ? 'on' : 'off'}`);
  console.log(`--------------------------------------------------\n`);

  // Controls share stdin with the frame stream only when frames come from a file or FIFO.
  if (appConfig.frames.source) {
    console.log(HELP);
    createRepl(loop, shutdown).prompt();
  }

  process.on('SIGINT', shutdown);

  await frameSource.start((frame) => loop.processFrame(frame));
  log(LogLevel.INFO, 'Frame source ended.');
  if (!appConfig.frames.source) shutdown();
}

main().catch((error: unknown) => {
  log(LogLevel.ERROR, 'Unhandled error in main execution:', describeError(error));
  process.exit(1);
});
