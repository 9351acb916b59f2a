/**
 * Provider Registry
 *
 * Read-only registry of backend providers (name → URL + auth requirements),
 * loaded once at startup and shared by every session.
 */

import { readFileSync } from "fs";
import { z } from "zod";
import type { StructuredLogger } from "../logging.js";
import { PUBLIC_NAME_SEPARATOR } from "../session/name-mapper.js";
import type { ProviderAuth, ProviderBinding } from "../types.js";

const ProviderAuthSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("none") }),
  z.object({ kind: z.literal("bearer") }),
  z.object({
    kind: z.literal("api-key"),
    headerName: z.string().min(1).default("x-api-key"),
  }),
]);

const ProviderEntrySchema = z.object({
  url: z.string().url(),
  auth: ProviderAuthSchema.default({ kind: "none" }),
  extraHeaders: z.record(z.string()).default({}),
  persistResponseHeaders: z.array(z.string().min(1)).default([]),
});

/**
 * Registry file format
 */
export const RegistryFileSchema = z.object({
  providers: z.record(
    z
      .string()
      .min(1)
      .refine((name) => !name.includes(PUBLIC_NAME_SEPARATOR), {
        message: `Provider names must not contain '${PUBLIC_NAME_SEPARATOR}'`,
      }),
    ProviderEntrySchema
  ),
});

export type RegistryFile = z.input<typeof RegistryFileSchema>;

/**
 * Options for creating a ProviderRegistry
 */
export interface ProviderRegistryOptions {
  /** Logger for structured logging */
  logger?: StructuredLogger;
}

export class ProviderRegistry {
  private readonly providers: ReadonlyMap<string, ProviderBinding>;

  constructor(bindings: Iterable<ProviderBinding>, options: ProviderRegistryOptions = {}) {
    const providers = new Map<string, ProviderBinding>();
    for (const binding of bindings) {
      if (providers.has(binding.name)) {
        throw new Error(`Duplicate provider '${binding.name}' in registry`);
      }
      providers.set(binding.name, Object.freeze({ ...binding }));
    }
    this.providers = providers;

    options.logger?.info("provider_registry_loaded", {
      providers: Array.from(providers.keys()),
    });
  }

  /**
   * Build a registry from an already-parsed registry document.
   *
   * @throws Error naming the offending provider when the document is invalid
   */
  public static fromDocument(document: unknown, options: ProviderRegistryOptions = {}): ProviderRegistry {
    const parsed = RegistryFileSchema.safeParse(document);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? issue.path.join(".") : "";
      throw new Error(`Invalid provider registry at '${where}': ${issue?.message ?? "unknown error"}`);
    }

    const bindings: ProviderBinding[] = Object.entries(parsed.data.providers).map(
      ([name, entry]) => ({
        name,
        url: entry.url,
        auth: toProviderAuth(entry.auth),
        extraHeaders: entry.extraHeaders,
        persistResponseHeaders: entry.persistResponseHeaders.map((h) => h.toLowerCase()),
      })
    );

    return new ProviderRegistry(bindings, options);
  }

  /**
   * Load and validate a JSON registry file.
   */
  public static loadFile(path: string, options: ProviderRegistryOptions = {}): ProviderRegistry {
    const content = readFileSync(path, "utf-8");
    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (err) {
      throw new Error(`Registry file '${path}' is not valid JSON`, { cause: err });
    }
    return ProviderRegistry.fromDocument(document, options);
  }

  /**
   * Get a provider binding by name.
   */
  public get(name: string): ProviderBinding | undefined {
    return this.providers.get(name);
  }

  public has(name: string): boolean {
    return this.providers.has(name);
  }

  public list(): ProviderBinding[] {
    return Array.from(this.providers.values());
  }

  public get size(): number {
    return this.providers.size;
  }
}

function toProviderAuth(auth: z.output<typeof ProviderAuthSchema>): ProviderAuth {
  switch (auth.kind) {
    case "none":
      return { kind: "none" };
    case "bearer":
      return { kind: "bearer" };
    case "api-key":
      return { kind: "api-key", headerName: auth.headerName };
  }
}
