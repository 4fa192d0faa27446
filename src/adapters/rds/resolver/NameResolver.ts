/**
 * rds-diagnostics-mcp - Name Resolver
 *
 * Maps a possibly-imprecise database name to one instance identifier,
 * memoizing successful resolutions by the exact raw input.
 */

import { LRUCache } from "lru-cache";
import { UpstreamError } from "../../../types/index.js";
import { logger } from "../../../utils/logger.js";
import type { InstanceDirectory } from "../directory/InstanceDirectory.js";
import type { MatchStrategy } from "./strategies.js";

export const DEFAULT_RESOLUTION_CACHE_SIZE = 1000;

export interface NameResolverOptions {
  cacheSize?: number;
}

export class NameResolver {
  private readonly cache: LRUCache<string, string>;

  constructor(
    private readonly directory: InstanceDirectory,
    private readonly strategy: MatchStrategy,
    options: NameResolverOptions = {},
  ) {
    this.cache = new LRUCache<string, string>({
      max: options.cacheSize ?? DEFAULT_RESOLUTION_CACHE_SIZE,
    });
  }

  get strategyKind(): MatchStrategy["kind"] {
    return this.strategy.kind;
  }

  /**
   * Resolve `rawName` to an instance identifier.
   *
   * Unresolved names are not cached and are retried on the next call.
   * @throws UpstreamError when the instance list cannot be fetched
   */
  async resolve(rawName: string): Promise<string | undefined> {
    const cached = this.cache.get(rawName);
    if (cached !== undefined) {
      logger.debug("Using cached instance resolution", { rawName, cached });
      return cached;
    }

    const listing = await this.directory.listInstances();
    if (listing.status === "error") {
      throw new UpstreamError(listing.message);
    }

    const candidates = listing.instances.map((entry) => entry.identifier);
    const identifier = await this.strategy.match(rawName, candidates);
    if (identifier === undefined) {
      logger.info("No matching RDS instance", {
        rawName,
        strategy: this.strategy.kind,
      });
      return undefined;
    }

    this.cache.set(rawName, identifier);
    return identifier;
  }

  /**
   * Number of memoized resolutions
   */
  get cachedCount(): number {
    return this.cache.size;
  }

  clearCache(): void {
    this.cache.clear();
  }
}
