import { z } from 'zod';
import { ParseFailure } from '../errors';
import { ExtractedTask, ExtractionResult, parseTaskStatus, TaskStatus } from '../types/task';

const nullableText = z.string().nullable().optional().catch(null);

const ExtractedTaskSchema: z.ZodType<ExtractedTask, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    name: z.string().nullish().transform((name) => name ?? ''),
    // Unreadable or unknown statuses count as not started.
    status: z.unknown().transform((raw) => parseTaskStatus(raw) ?? TaskStatus.NOT_STARTED),
    plannedAt: nullableText,
    startedAt: nullableText,
    completedAt: nullableText,
    order: z.number().int().optional().catch(undefined),
    projectRef: nullableText,
    subtasks: z.array(ExtractedTaskSchema).nullish().transform((subtasks) => subtasks ?? undefined),
  }),
);

export const ExtractionResultSchema: z.ZodType<ExtractionResult, z.ZodTypeDef, unknown> = z.object({
  tasks: z.array(ExtractedTaskSchema),
});

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Body of the first ``` or ```json fenced block, if any. */
function fencedBlock(text: string): string | null {
  const lines = text.split(/\r?\n/);
  const start = lines.findIndex((line) => {
    const fence = line.trim();
    return fence === '```json' || fence === '```';
  });
  if (start < 0) return null;

  const body: string[] = [];
  for (const line of lines.slice(start + 1)) {
    if (line.trim().startsWith('```')) return body.join('\n');
    body.push(line);
  }
  return null;
}

function locateJson(payload: string): unknown {
  const direct = tryParseJson(payload);
  if (direct !== undefined) return direct;

  const fenced = fencedBlock(payload);
  if (fenced !== null) {
    const parsed = tryParseJson(fenced);
    if (parsed !== undefined) return parsed;
  }

  for (const line of payload.split(/\r?\n/)) {
    const candidate = line.trim();
    if (candidate.startsWith('{') && candidate.endsWith('}')) {
      const parsed = tryParseJson(candidate);
      if (parsed !== undefined) return parsed;
    }
  }
  return undefined;
}

/**
 * Pulls the task list out of a model reply. Tries, in order, the whole reply,
 * a fenced code block, and a single line holding a JSON object.
 * @throws ParseFailure when no candidate parses or the JSON has no valid task list.
 */
export function parseOcrPayload(payload: string): ExtractionResult {
  const located = locateJson(payload);
  if (located === undefined) {
    throw new ParseFailure('No JSON object found in OCR output', payload);
  }

  const result = ExtractionResultSchema.safeParse(located);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ParseFailure(`OCR output is not a task list: ${issues.join('; ')}`, payload, { cause: result.error });
  }
  return result.data;
}
