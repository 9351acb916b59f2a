/**
 * Gateway error taxonomy.
 *
 * Every failure the gateway reports to a client is a GatewayError with a
 * stable `kind`. The protocol handler turns it into a JSON-RPC error object.
 */

import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";

export type GatewayErrorKind =
  | "ParseError"
  | "InvalidRequest"
  | "MethodNotFound"
  | "InvalidParams"
  | "InternalError"
  | "SessionNotFound"
  | "UnknownProvider"
  | "MissingCredential"
  | "UnknownCapability"
  | "AmbiguousCapability"
  | "BackendTimeout"
  | "BackendUnavailable"
  | "BackendRejected"
  | "BackendInvalidResponse"
  | "BackendError"
  | "AllBackendsUnavailable";

const ERROR_CODES: Record<GatewayErrorKind, number> = {
  ParseError: ErrorCode.ParseError,
  InvalidRequest: ErrorCode.InvalidRequest,
  MethodNotFound: ErrorCode.MethodNotFound,
  InvalidParams: ErrorCode.InvalidParams,
  InternalError: ErrorCode.InternalError,
  UnknownCapability: ErrorCode.InvalidParams,
  SessionNotFound: -32000,
  BackendTimeout: -32002,
  BackendUnavailable: -32003,
  BackendInvalidResponse: -32004,
  AmbiguousCapability: -32005,
  AllBackendsUnavailable: -32006,
  BackendRejected: -32007,
  UnknownProvider: -32010,
  MissingCredential: -32011,
  // Overridden by the backend's own code when one is known
  BackendError: -32008,
};

/**
 * JSON-RPC error object as it appears on the wire
 */
export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: Record<string, unknown>;
}

export interface GatewayErrorOptions {
  /** Backend provider the error relates to */
  provider?: string;
  /** Whether the retry policy may try the failed call again */
  retryable?: boolean;
  /** Overrides the kind's default JSON-RPC code (backend pass-through) */
  code?: number;
  /** Extra structured detail for the client */
  data?: Record<string, unknown>;
  cause?: unknown;
}

export class GatewayError extends Error {
  public readonly kind: GatewayErrorKind;
  public readonly provider?: string;
  public readonly retryable: boolean;
  public readonly code: number;
  public readonly data?: Record<string, unknown>;

  constructor(kind: GatewayErrorKind, message: string, options: GatewayErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "GatewayError";
    this.kind = kind;
    this.provider = options.provider;
    this.retryable = options.retryable ?? false;
    this.code = options.code ?? ERROR_CODES[kind];
    this.data = options.data;
  }

  public toJsonRpcError(): JsonRpcErrorObject {
    const data: Record<string, unknown> = { kind: this.kind };
    if (this.provider !== undefined) {
      data["provider"] = this.provider;
    }
    return {
      code: this.code,
      message: this.message,
      data: { ...data, ...this.data },
    };
  }
}

export function isGatewayError(err: unknown): err is GatewayError {
  return err instanceof GatewayError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
