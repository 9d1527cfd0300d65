/**
 * Failures that background actions can hit. None of them aborts the frame loop;
 * they end up in an ActionOutcome and in the log.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: 'ParseFailure' | 'CollaboratorFailure' | 'DocumentMissing' | 'DateParseFailure' | 'Unexpected';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = new.target.name;
    if (options && 'cause' in options) {
      Object.defineProperty(this, 'cause', { value: options.cause, enumerable: false });
    }
  }
}

/** The OCR payload did not contain a locatable, valid task-list JSON object. */
export class ParseFailure extends PipelineError {
  readonly kind = 'ParseFailure' as const;

  constructor(message: string, readonly rawPayload: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** The OCR service or the document store raised. */
export class CollaboratorFailure extends PipelineError {
  readonly kind = 'CollaboratorFailure' as const;

  constructor(readonly collaborator: 'ocr' | 'store', message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A field update targeted a document that does not exist. */
export class DocumentMissingError extends PipelineError {
  readonly kind = 'DocumentMissing' as const;

  constructor(readonly documentPath: string) {
    super(`No document to update: ${documentPath}`);
  }
}

/** A stored timestamp could not be parsed; callers treat the field as absent. */
export class DateParseFailure extends PipelineError {
  readonly kind = 'DateParseFailure' as const;

  constructor(readonly rawValue: string) {
    super(`Could not parse date '${rawValue}'`);
  }
}

/** A background action threw something outside the taxonomy above. */
export class UnexpectedActionError extends PipelineError {
  readonly kind = 'Unexpected' as const;
}

export type ActionKind = 'initial_scan' | 'full_ocr' | 'turbo' | 'ocr_only';

export type ActionStatus = 'success' | 'fallback' | 'failed' | 'skipped';

export interface ActionOutcome<T = unknown> {
  action: ActionKind;
  status: ActionStatus;
  message: string;
  data?: T;
  error?: PipelineError;
}

/**
 * Wraps anything thrown by a collaborator call into a CollaboratorFailure,
 * leaving pipeline errors untouched.
 */
export function asCollaboratorFailure(collaborator: 'ocr' | 'store', error: unknown): PipelineError {
  if (error instanceof PipelineError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new CollaboratorFailure(collaborator, message, { cause: error });
}
