export type ProbeErrorCode =
  | 'INVALID_ADDRESS'
  | 'NO_ADDRESSES'
  | 'RANGE_FETCH'
  | 'RANGE_PARSE'
  | 'RANGE_READ'
  | 'INVALID_PATTERN';

export class ProbeError extends Error {
  readonly code: ProbeErrorCode;

  constructor(code: ProbeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProbeError';
    this.code = code;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
