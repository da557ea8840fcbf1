/**
 * Error taxonomy shared by every module.
 *
 * Resolution, bind and configuration failures are fatal at startup.
 * Send and receive failures stay inside the loop iteration that hit them.
 *
 * @module errors
 */

// ============================================================================
// Codes
// ============================================================================

export const ProbeErrorCode = {
  INVALID_ADDRESS: 'INVALID_ADDRESS',
  INTERFACE_NOT_FOUND: 'INTERFACE_NOT_FOUND',
  BIND_FAILED: 'BIND_FAILED',
  JOIN_FAILED: 'JOIN_FAILED',
  SEND_FAILED: 'SEND_FAILED',
  RECV_FAILED: 'RECV_FAILED',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type ProbeErrorCode = (typeof ProbeErrorCode)[keyof typeof ProbeErrorCode];

const FATAL_CODES: ReadonlySet<ProbeErrorCode> = new Set([
  ProbeErrorCode.INVALID_ADDRESS,
  ProbeErrorCode.INTERFACE_NOT_FOUND,
  ProbeErrorCode.BIND_FAILED,
  ProbeErrorCode.JOIN_FAILED,
  ProbeErrorCode.INVALID_CONFIG,
]);

// ============================================================================
// Error Class
// ============================================================================

export class ProbeError extends Error {
  readonly code: ProbeErrorCode;

  constructor(code: ProbeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProbeError';
    this.code = code;
  }
}

export function isFatalError(code: ProbeErrorCode): boolean {
  return FATAL_CODES.has(code);
}

/**
 * Message of an unknown thrown value, for log lines.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
