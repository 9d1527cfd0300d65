import config from 'config';
import { z } from 'zod';
import { log, LogLevel } from './logger';

// Environment variables arrive as strings; booleans need an explicit mapping
// because z.coerce.boolean() treats "false" as true.
const envBoolean = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toLowerCase() === 'true' : value),
  z.boolean(),
);

const nullableString = z.string().nullable().default(null);

const LoggingConfigSchema = z.object({
  consoleLogLevel: z.nativeEnum(LogLevel).default(LogLevel.INFO),
  fileLogLevel: z.nativeEnum(LogLevel).default(LogLevel.INFO),
  logFile: nullableString,
  consoleQuietMode: envBoolean.default(false),
});

const OcrConfigSchema = z.object({
  apiKey: nullableString,
  baseUrl: nullableString,
  fullModelName: z.string(),
  fastModelName: z.string(),
  temperature: z.coerce.number().min(0).max(2),
  timeoutMs: z.coerce.number().int().positive(),
});

const StoreConfigSchema = z.object({
  dbPath: z.string(),
});

const DetectorConfigSchema = z.object({
  labels: z.array(z.string()).min(1),
  confidenceThreshold: z.coerce.number().min(0).max(1),
  nonActionableLabel: z.string(),
});

const frameCount = z.coerce.number().int().nonnegative();

const FullViewConfigSchema = z.object({
  historySize: frameCount,
  requiredStableFrames: frameCount,
  positionThresholdPx: z.coerce.number().nonnegative(),
  maxWaitFrames: frameCount,
});

const InitialScanConfigSchema = z.object({
  historySize: frameCount,
  minHistory: frameCount,
  recentWindow: frameCount,
  maxDistinctCounts: frameCount,
  requiredStableFrames: frameCount,
  minSymbols: frameCount,
  growthStopFrames: frameCount,
  edgeMarginPx: z.coerce.number().nonnegative(),
  edgeRatio: z.coerce.number().min(0).max(1),
  cooldownFrames: frameCount,
});

const TriggerConfigSchema = z.object({
  countHistorySize: frameCount,
  stabilityThreshold: frameCount,
  turboCooldownFrames: frameCount,
  increaseOcrCooldownFrames: frameCount,
  decreaseOcrCooldownFrames: frameCount,
  fullView: FullViewConfigSchema,
  initialScan: InitialScanConfigSchema,
});

const FramesConfigSchema = z.object({
  source: nullableString,
});

const AppConfigSchema = z.object({
  env: z.string().default('development'),
  appName: z.string(),
  version: z.string(),
  autoModeEnabled: envBoolean.default(true),
  logging: LoggingConfigSchema,
  ocr: OcrConfigSchema,
  store: StoreConfigSchema,
  detector: DetectorConfigSchema,
  trigger: TriggerConfigSchema,
  frames: FramesConfigSchema,
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type OcrConfig = z.infer<typeof OcrConfigSchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type DetectorConfig = z.infer<typeof DetectorConfigSchema>;
export type FullViewConfig = z.infer<typeof FullViewConfigSchema>;
export type InitialScanConfig = z.infer<typeof InitialScanConfigSchema>;
export type TriggerConfig = z.infer<typeof TriggerConfigSchema>;
export type FramesConfig = z.infer<typeof FramesConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

let currentConfig: AppConfig | null = null;

/**
 * Validates a raw configuration object (as produced by the 'config' package)
 * and coerces environment-provided strings into their declared types.
 */
export function parseAppConfig(raw: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

/**
 * Loads the application configuration using the 'config' package.
 * This function reads from config files (default.json, etc.) and merges
 * environment variables according to the rules in custom-environment-variables.json.
 * @returns The fully resolved application configuration.
 */
export function loadConfig(): AppConfig {
  const loadedConfig: unknown = config.util.toObject();
  currentConfig = parseAppConfig(loadedConfig);
  log(LogLevel.DEBUG, 'Application Config Loaded:', { appName: currentConfig.appName, env: currentConfig.env });
  return currentConfig;
}

/**
 * Returns the currently loaded application configuration.
 */
export function getConfig(): AppConfig {
  if (!currentConfig) {
    return loadConfig();
  }
  return currentConfig;
}
