export type ErrorKind =
  | 'ConfigurationError'
  | 'ValidationError'
  | 'AuthenticationError'
  | 'ApplianceUnreachableError'
  | 'ApplianceRejected'
  | 'ApplianceError'
  | 'InternalError';

export type ValidationReason = 'InvalidLimitType' | 'OutOfRange' | 'InvalidArgument' | 'UnknownTool';

export interface ActionableErrorFields {
  retryable: boolean;
  fixHint: string;
}

const ACTIONABLE_ERROR_DEFAULTS: Record<ErrorKind, ActionableErrorFields> = {
  ConfigurationError: {
    retryable: false,
    fixHint: 'Set OPENDTU_HOST to the IP address or hostname of the OpenDTU appliance and restart the server.'
  },
  ValidationError: {
    retryable: false,
    fixHint:
      'Fix the tool arguments: limit_type must be 0, 1, 256 or 257; relative limits take 0-100 %, absolute limits take watts >= 0.'
  },
  AuthenticationError: {
    retryable: false,
    fixHint: 'Check OPENDTU_USER and OPENDTU_PASSWORD against the OpenDTU admin credentials.'
  },
  ApplianceUnreachableError: {
    retryable: true,
    fixHint: 'Check that the OpenDTU appliance is powered and reachable on the local network, then retry.'
  },
  ApplianceRejected: {
    retryable: false,
    fixHint: 'Verify the inverter serial with opendtu_get_inverters and check the limit value before trying again.'
  },
  ApplianceError: {
    retryable: false,
    fixHint: 'The appliance answered unexpectedly; check the OpenDTU firmware version and its web UI.'
  },
  InternalError: {
    retryable: false,
    fixHint: 'Inspect the server logs for the underlying failure.'
  }
};

export function actionableErrorFields(kind: ErrorKind): ActionableErrorFields {
  const defaults = ACTIONABLE_ERROR_DEFAULTS[kind] ?? ACTIONABLE_ERROR_DEFAULTS.InternalError;
  return {
    retryable: defaults.retryable,
    fixHint: defaults.fixHint
  };
}

export class OpenDtuError extends Error {
  public readonly kind: ErrorKind;
  public readonly reason?: ValidationReason;
  public readonly statusCode?: number;
  public readonly details?: Record<string, unknown>;
  public readonly fixHint?: string;

  constructor(
    kind: ErrorKind,
    message: string,
    options?: {
      cause?: unknown;
      reason?: ValidationReason;
      statusCode?: number;
      details?: Record<string, unknown>;
      fixHint?: string;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = kind;
    this.kind = kind;
    this.reason = options?.reason;
    this.statusCode = options?.statusCode;
    this.details = options?.details;
    this.fixHint = options?.fixHint;
  }
}

export function validationError(
  reason: ValidationReason,
  message: string,
  details?: Record<string, unknown>
): OpenDtuError {
  return new OpenDtuError('ValidationError', message, { reason, details });
}

export function ensureError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}

export function asOpenDtuError(value: unknown): OpenDtuError {
  if (value instanceof OpenDtuError) {
    return value;
  }

  const err = ensureError(value);

  if (err.name === 'AbortError' || err.name === 'TimeoutError') {
    return new OpenDtuError('ApplianceUnreachableError', err.message, { cause: err });
  }

  return new OpenDtuError('InternalError', err.message, { cause: err });
}
