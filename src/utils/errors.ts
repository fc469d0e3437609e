export class HttpError extends Error {
  status: number;

  code: string;

  details?: unknown;

  constructor(status: number, code: string, message: string, details?: unknown) {
    super(message);
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export const unauthorizedError = (message = 'Unauthorized'): HttpError =>
  new HttpError(401, 'UNAUTHORIZED', message);

export type TeslafiApiErrorKind = 'TRANSPORT' | 'UPSTREAM_REJECTED' | 'MALFORMED_RESPONSE';

/**
 * A failed call to the TeslaFi feed. `detail` carries what the upstream said:
 * status and body for transport failures, the envelope's result text for rejections.
 */
export class TeslafiApiError extends Error {
  readonly kind: TeslafiApiErrorKind;

  readonly detail: string;

  readonly status?: number;

  readonly command?: string;

  constructor(
    kind: TeslafiApiErrorKind,
    message: string,
    options: { detail?: string; status?: number; command?: string; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'TeslafiApiError';
    this.kind = kind;
    this.detail = options.detail ?? '';
    this.status = options.status;
    this.command = options.command;
  }
}

export type SnapshotFieldErrorReason = 'MISSING_FIELD' | 'INVALID_VALUE';

export class SnapshotFieldError extends Error {
  readonly reason: SnapshotFieldErrorReason;

  readonly field: string;

  readonly metric: string;

  readonly value?: unknown;

  constructor(
    reason: SnapshotFieldErrorReason,
    details: { field: string; metric: string; value?: unknown },
  ) {
    const message =
      reason === 'MISSING_FIELD'
        ? `Field "${details.field}" for metric ${details.metric} is absent from both the current and the fallback snapshot.`
        : `Field "${details.field}" for metric ${details.metric} holds unparseable value ${JSON.stringify(details.value)}.`;
    super(message);
    this.name = 'SnapshotFieldError';
    this.reason = reason;
    this.field = details.field;
    this.metric = details.metric;
    this.value = details.value;
  }
}
