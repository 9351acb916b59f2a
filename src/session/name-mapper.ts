/**
 * Name Mapper
 *
 * Maps (provider, native capability name) to the public name a session's
 * client sees, `provider.nativeName`, and back.
 *
 * Each session holds one immutable snapshot. A merge builds a new snapshot
 * off to the side and swaps it in with a single assignment, so a concurrent
 * resolve sees either the previous catalog or the new one, never a mix.
 */

import { GatewayError } from "../errors.js";
import type { CapabilityDescriptor, ProviderCatalog } from "../types.js";

export const PUBLIC_NAME_SEPARATOR = ".";

/**
 * Where a public name points
 */
export interface CapabilityTarget {
  provider: string;
  nativeName: string;
}

export type NameMap = ReadonlyMap<string, CapabilityTarget>;

interface NameMapSnapshot {
  version: number;
  map: NameMap;
}

export interface BuiltCatalog {
  tools: CapabilityDescriptor[];
  nameMap: NameMap;
}

export function toPublicName(provider: string, nativeName: string): string {
  return `${provider}${PUBLIC_NAME_SEPARATOR}${nativeName}`;
}

export class NameMapper {
  private readonly snapshots = new Map<string, NameMapSnapshot>();

  /**
   * Rewrite every provider's catalog to public names and replace the
   * session's name map.
   *
   * Providers keep the order they are given in; capabilities keep their
   * order within a provider.
   *
   * @throws GatewayError (AmbiguousCapability) when one provider lists the
   *   same native name twice, or when two providers produce the same public
   *   name; the previous map is left in place
   */
  public buildCatalog(sessionId: string, catalogs: readonly ProviderCatalog[]): BuiltCatalog {
    const tools: CapabilityDescriptor[] = [];
    const map = new Map<string, CapabilityTarget>();

    for (const { provider, capabilities } of catalogs) {
      const seen = new Set<string>();
      for (const capability of capabilities) {
        const nativeName = capability.name;
        if (seen.has(nativeName)) {
          throw new GatewayError(
            "AmbiguousCapability",
            `Provider '${provider}' lists capability '${nativeName}' more than once`,
            { provider, data: { capability: nativeName } }
          );
        }
        seen.add(nativeName);

        const publicName = toPublicName(provider, nativeName);
        const clash = map.get(publicName);
        if (clash) {
          throw new GatewayError(
            "AmbiguousCapability",
            `Public name '${publicName}' is produced by both '${clash.provider}' and '${provider}'`,
            { provider, data: { capability: publicName, providers: [clash.provider, provider] } }
          );
        }
        map.set(publicName, { provider, nativeName });
        tools.push({ ...capability, name: publicName });
      }
    }

    const previous = this.snapshots.get(sessionId);
    this.snapshots.set(sessionId, {
      version: (previous?.version ?? 0) + 1,
      map,
    });

    return { tools, nameMap: map };
  }

  /**
   * Resolve a public name against the session's current map.
   *
   * @throws GatewayError (UnknownCapability) when the session has no map yet
   *   or the name is not in it
   */
  public resolve(sessionId: string, publicName: string): CapabilityTarget {
    const snapshot = this.snapshots.get(sessionId);
    if (!snapshot) {
      throw new GatewayError(
        "UnknownCapability",
        `Unknown tool: ${publicName}. Session has not been initialized.`,
        { data: { capability: publicName } }
      );
    }

    const target = snapshot.map.get(publicName);
    if (!target) {
      throw new GatewayError(
        "UnknownCapability",
        `Unknown tool: ${publicName}. Tool may not exist or session may need reinitialization.`,
        { data: { capability: publicName } }
      );
    }
    return target;
  }

  /**
   * Version of the session's current map; 0 when none has been built.
   */
  public version(sessionId: string): number {
    return this.snapshots.get(sessionId)?.version ?? 0;
  }

  /**
   * Drop the session's map (session deleted).
   */
  public forget(sessionId: string): void {
    this.snapshots.delete(sessionId);
  }
}
