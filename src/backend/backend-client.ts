/**
 * Backend Client
 *
 * Performs one JSON-RPC call to one provider over HTTP. It knows nothing
 * about sessions, public names or merging: the caller hands it a provider
 * binding and credential material, it hands back the raw `result`.
 *
 * Each call carries a fresh correlation id. Bodies are accepted as plain
 * JSON or as an SSE stream (`data: {...}` events), the two shapes
 * streamable-HTTP MCP servers answer a POST with.
 */

import { ulid } from "ulid";
import { z } from "zod";
import { GatewayError, errorMessage } from "../errors.js";
import type { StructuredLogger } from "../logging.js";
import type { CredentialMaterial, OutgoingRequest, ProviderBinding } from "../types.js";
import { decorate } from "./auth-binder.js";
import { RetryPolicy } from "./retry-policy.js";

/**
 * Options for creating a BackendClient
 */
export interface BackendClientOptions {
  retryPolicy?: RetryPolicy;
  /** Per-attempt timeout in ms (default: 10000) */
  timeoutMs?: number;
  /** fetch implementation; defaults to the global one */
  fetch?: typeof fetch;
  logger?: StructuredLogger;
}

/**
 * Per-call options
 */
export interface BackendCallOptions {
  /** Additional headers for this call (e.g. captured session headers) */
  headers?: Record<string, string>;
}

export interface BackendCallResult {
  /** The backend's JSON-RPC `result`, untouched */
  result: unknown;
  /** Response headers, lowercased names */
  responseHeaders: Record<string, string>;
}

const DEFAULT_TIMEOUT_MS = 10_000;

const MAX_ERROR_DETAIL_LENGTH = 200;

const BackendResponseSchema = z.object({
  jsonrpc: z.string().optional(),
  id: z.union([z.string(), z.number()]).nullable().optional(),
  error: z
    .object({
      code: z.number().int(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

export class BackendClient {
  private readonly retryPolicy: RetryPolicy;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger?: StructuredLogger;

  constructor(options: BackendClientOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy({}, { logger: options.logger });
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger;
  }

  /**
   * Call `method` on a provider.
   *
   * @throws GatewayError: MissingCredential before any request is sent;
   *   BackendRejected for HTTP 4xx; BackendError when the backend answers with
   *   a JSON-RPC error; BackendInvalidResponse for unparseable bodies;
   *   BackendUnavailable once retries are exhausted
   */
  public async call(
    provider: ProviderBinding,
    credential: CredentialMaterial | undefined,
    method: string,
    params: Record<string, unknown> | undefined,
    options: BackendCallOptions = {}
  ): Promise<BackendCallResult> {
    const correlationId = ulid();
    const request = decorate(provider, credential, {
      url: provider.url,
      headers: {
        ...options.headers,
        "content-type": "application/json",
        accept: "application/json, text/event-stream",
      },
      body: {
        jsonrpc: "2.0",
        id: correlationId,
        method,
        ...(params !== undefined ? { params } : {}),
      },
    });

    this.logger?.debug("backend_call_start", {
      provider: provider.name,
      method,
      correlationId,
    });

    return this.retryPolicy.execute(
      () => this.send(provider.name, request),
      `${provider.name}:${method}`
    );
  }

  private async send(providerName: string, request: OutgoingRequest): Promise<BackendCallResult> {
    let response: Response;
    try {
      response = await this.fetchImpl(request.url, {
        method: "POST",
        headers: request.headers,
        body: JSON.stringify(request.body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      if (isTimeoutError(err)) {
        throw new GatewayError(
          "BackendTimeout",
          `Backend '${providerName}' timed out after ${String(this.timeoutMs)}ms`,
          { provider: providerName, retryable: true, cause: err }
        );
      }
      throw new GatewayError(
        "BackendUnavailable",
        `Backend '${providerName}' request failed: ${errorMessage(err)}`,
        { provider: providerName, retryable: true, cause: err }
      );
    }

    if (response.status >= 500) {
      await response.body?.cancel();
      throw new GatewayError(
        "BackendUnavailable",
        `Backend '${providerName}' returned HTTP ${String(response.status)}`,
        { provider: providerName, retryable: true, data: { status: response.status } }
      );
    }

    const text = await this.readBody(providerName, response);

    if (!response.ok) {
      throw new GatewayError(
        "BackendRejected",
        `Backend '${providerName}' returned HTTP ${String(response.status)}`,
        {
          provider: providerName,
          data: { status: response.status, detail: text.slice(0, MAX_ERROR_DETAIL_LENGTH) },
        }
      );
    }

    const payload = parseBody(
      providerName,
      text,
      response.headers.get("content-type") ?? "",
      request.body.id
    );
    const parsed = BackendResponseSchema.safeParse(payload);
    if (!parsed.success || !isRecord(payload)) {
      throw new GatewayError(
        "BackendInvalidResponse",
        `Backend '${providerName}' returned an invalid JSON-RPC response`,
        { provider: providerName }
      );
    }

    if (parsed.data.error) {
      const backendError = parsed.data.error;
      throw new GatewayError("BackendError", backendError.message, {
        provider: providerName,
        code: backendError.code,
        data: backendError.data !== undefined ? { detail: backendError.data } : undefined,
      });
    }

    if (!("result" in payload)) {
      throw new GatewayError(
        "BackendInvalidResponse",
        `Backend '${providerName}' response has neither result nor error`,
        { provider: providerName }
      );
    }

    if (parsed.data.id !== undefined && parsed.data.id !== request.body.id) {
      this.logger?.warn("backend_response_id_mismatch", {
        provider: providerName,
        expected: request.body.id,
        received: parsed.data.id,
      });
    }

    return {
      result: payload["result"],
      responseHeaders: headersToRecord(response.headers),
    };
  }

  private async readBody(providerName: string, response: Response): Promise<string> {
    try {
      return await response.text();
    } catch (err) {
      // Connection dropped mid-body: same class of failure as a refused connection
      throw new GatewayError(
        "BackendUnavailable",
        `Backend '${providerName}' response body could not be read: ${errorMessage(err)}`,
        { provider: providerName, retryable: true, cause: err }
      );
    }
  }
}

/**
 * Parse a response body as JSON, or as an SSE stream of events such as
 *
 *     event: message
 *     data: {...json...}
 *
 * Notifications may precede the response on a stream. The event carrying a
 * `result` or `error` for `correlationId` wins; failing that, the first
 * event carrying either.
 */
export function parseBody(
  providerName: string,
  body: string,
  contentType: string,
  correlationId?: string | number
): unknown {
  if (!contentType.startsWith("text/event-stream")) {
    return parseJson(providerName, body);
  }

  const events = sseDataPayloads(body);
  if (events.length === 0) {
    throw new GatewayError(
      "BackendInvalidResponse",
      `Backend '${providerName}' returned an SSE body without a data line`,
      { provider: providerName }
    );
  }

  const responses = events
    .map((data) => parseJson(providerName, data))
    .filter((message): message is Record<string, unknown> =>
      isRecord(message) && ("result" in message || "error" in message)
    );

  const response =
    responses.find((message) => correlationId !== undefined && message["id"] === correlationId) ??
    responses[0];
  if (response === undefined) {
    throw new GatewayError(
      "BackendInvalidResponse",
      `Backend '${providerName}' returned an SSE body without a JSON-RPC response`,
      { provider: providerName, data: { events: events.length } }
    );
  }
  return response;
}

/** Data payload of every SSE event; multi-line data is joined with newlines. */
function sseDataPayloads(body: string): string[] {
  const payloads: string[] = [];
  let lines: string[] = [];

  const flush = (): void => {
    if (lines.length > 0) {
      payloads.push(lines.join("\n"));
      lines = [];
    }
  };

  for (const raw of body.split(/\r?\n/)) {
    const line = raw.trim();
    if (line === "") {
      flush();
    } else if (line.startsWith("data:")) {
      lines.push(line.slice("data:".length).trim());
    }
  }
  flush();
  return payloads;
}

function parseJson(providerName: string, json: string): unknown {
  try {
    return JSON.parse(json);
  } catch (err) {
    throw new GatewayError(
      "BackendInvalidResponse",
      `Backend '${providerName}' returned invalid JSON`,
      { provider: providerName, cause: err }
    );
  }
}

function isTimeoutError(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "name" in err &&
    (err.name === "TimeoutError" || err.name === "AbortError")
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function headersToRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, key) => {
    record[key.toLowerCase()] = value;
  });
  return record;
}
