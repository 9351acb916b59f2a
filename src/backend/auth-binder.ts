/**
 * Auth Binder
 *
 * Applies a provider's authentication requirements to an outgoing request.
 * Pure: no I/O, never mutates its input.
 */

import { GatewayError } from "../errors.js";
import type { CredentialMaterial, OutgoingRequest, ProviderBinding } from "../types.js";

/**
 * Decorate an outgoing request with the provider's static headers and the
 * authentication header its auth kind calls for. Header names are lowercased
 * so an auth header always replaces a static one of the same name.
 *
 * @throws GatewayError (MissingCredential) when the credential the auth kind
 *   requires is absent or empty
 */
export function decorate(
  provider: ProviderBinding,
  credential: CredentialMaterial | undefined,
  request: OutgoingRequest
): OutgoingRequest {
  const headers: Record<string, string> = { ...request.headers };
  for (const [name, value] of Object.entries(provider.extraHeaders)) {
    headers[name.toLowerCase()] = value;
  }
  const auth = provider.auth;

  switch (auth.kind) {
    case "none":
      break;
    case "bearer": {
      const token = credential?.token;
      if (!token) {
        throw new GatewayError(
          "MissingCredential",
          `Missing 'token' for bearer auth (provider=${provider.name})`,
          { provider: provider.name }
        );
      }
      headers["authorization"] = `Bearer ${token}`;
      break;
    }
    case "api-key": {
      const key = credential?.key;
      if (!key) {
        throw new GatewayError(
          "MissingCredential",
          `Missing 'key' for api-key auth (provider=${provider.name})`,
          { provider: provider.name }
        );
      }
      headers[auth.headerName.toLowerCase()] = key;
      break;
    }
  }

  return { ...request, headers };
}
