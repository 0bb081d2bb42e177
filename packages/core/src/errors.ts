export type GatewayErrorCode =
  | "handshake_failed"
  | "protocol_error"
  | "missing_credentials"
  | "gateway_lookup_failed"
  | "cancellation_timeout"
  | "decode_failed";

export class GatewayError extends Error {
  constructor(
    public readonly code: GatewayErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "GatewayError";
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function isGatewayError(error: unknown, code?: GatewayErrorCode): error is GatewayError {
  if (!(error instanceof GatewayError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

/**
 * Anything that escapes the handshake without a code of its own is a handshake
 * failure: transport errors while opening, timeouts waiting for Hello.
 */
export function toGatewayError(error: unknown, fallbackCode: GatewayErrorCode = "handshake_failed"): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }
  const normalized = toError(error);
  return new GatewayError(fallbackCode, normalized.message, { cause: normalized });
}
