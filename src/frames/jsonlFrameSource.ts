import fs from 'fs';
import readline from 'readline';
import { z } from 'zod';
import { describeError, log, LogLevel } from '../logger';
import { Frame } from '../types/detection';

const RawDetectionSchema = z.object({
  box: z.tuple([z.number(), z.number(), z.number(), z.number()]),
  classId: z.number().int().nonnegative(),
  confidence: z.number(),
});

const FrameLineSchema = z.object({
  index: z.number().int().nonnegative().optional(),
  width: z.number().positive(),
  height: z.number().positive(),
  imagePath: z.string().min(1).optional(),
  detections: z.array(RawDetectionSchema),
});

/**
 * Parses one detector line. Returns null (after logging) for blank or
 * invalid lines; a missing index is filled from `fallbackIndex`.
 */
export function parseFrameLine(line: string, fallbackIndex: number): Frame | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch (error) {
    log(LogLevel.WARN, `[Frames] Skipping line ${fallbackIndex}: not JSON`, describeError(error));
    return null;
  }

  const parsed = FrameLineSchema.safeParse(raw);
  if (!parsed.success) {
    log(LogLevel.WARN, `[Frames] Skipping line ${fallbackIndex}: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    return null;
  }
  const { index, ...frame } = parsed.data;
  return { index: index ?? fallbackIndex, ...frame };
}

/**
 * Reads detector output as JSON lines from a file, a FIFO or stdin and hands
 * each valid frame to the callback in order.
 */
export class JsonlFrameSource {
  private reader: readline.Interface | null = null;

  constructor(private readonly source: string | NodeJS.ReadableStream) {}

  /** Resolves when the input ends or `stop()` is called. */
  start(onFrame: (frame: Frame) => void): Promise<void> {
    const input: NodeJS.ReadableStream = typeof this.source === 'string' ? fs.createReadStream(this.source, { encoding: 'utf8' }) : this.source;
    const reader = readline.createInterface({ input, crlfDelay: Infinity });
    this.reader = reader;

    let lineNumber = 0;
    return new Promise<void>((resolve, reject) => {
      reader.on('line', (line) => {
        const frame = parseFrameLine(line, lineNumber);
        lineNumber += 1;
        if (frame) onFrame(frame);
      });
      reader.on('close', () => {
        log(LogLevel.INFO, `[Frames] Source closed after ${lineNumber} lines`);
        resolve();
      });
      input.on('error', (error) => {
        reader.close();
        reject(error);
      });
    });
  }

  stop(): void {
    this.reader?.close();
    this.reader = null;
  }
}
