import type { BatchReport } from './types';

export type IngestErrorCode =
  | 'NO_ARTIFACTS_FOUND'
  | 'ALL_TRANSFORMS_FAILED'
  | 'EMPTY_INPUT'
  | 'UNSUPPORTED_FORMAT'
  | 'MATRIX_UNAVAILABLE'
  | 'INVALID_DESTINATION';

export class IngestError extends Error {
  public readonly code: IngestErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly report?: BatchReport;

  constructor(
    message: string,
    code: IngestErrorCode,
    options: { details?: Record<string, unknown>; report?: BatchReport; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'IngestError';
    this.code = code;
    this.details = options.details;
    this.report = options.report;
  }
}

export class MetadataServiceError extends Error {
  public readonly status: number;
  public readonly url: string;
  public readonly body?: string;

  constructor(message: string, status: number, url: string, body?: string) {
    super(message);
    this.name = 'MetadataServiceError';
    this.status = status;
    this.url = url;
    this.body = body;
  }
}

export type TransformErrorKind =
  | 'DecodeFailed'
  | 'NoValueColumn'
  | 'EmptyAfterFilter'
  | 'SampleNotFound'
  | 'ClinicalRecordMissing'
  | 'FetchFailed'
  // the pool task threw instead of returning a result
  | 'TaskFailed';

export type TransformError = {
  kind: TransformErrorKind;
  message: string;
};

export function transformError(kind: TransformErrorKind, message: string): TransformError {
  return { kind, message };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function assertUnreachable(value: never): never {
  throw new Error(`Unhandled value: ${JSON.stringify(value)}`);
}
