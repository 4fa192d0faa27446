/**
 * rds-diagnostics-mcp - RDS Adapter
 *
 * Wires the AWS clients, the instance directory, the name resolver and
 * the slow-query pipeline together, and exposes the diagnostics tools.
 */

import { DatabaseAdapter } from "../DatabaseAdapter.js";
import type {
  ControlPlaneApi,
  DiagnosticsConfig,
  InferenceClient,
  LoadApi,
  MetricsApi,
  ResolverStrategy,
  ToolDefinition,
  ToolGroup,
} from "../../types/index.js";
import { ConfigurationError } from "../../types/index.js";
import { logger } from "../../utils/logger.js";
import {
  AwsClientManager,
  CloudWatchMetrics,
  PerformanceInsightsLoad,
  RdsControlPlane,
} from "../../aws/index.js";
import { AnthropicInferenceClient } from "../../inference/index.js";
import { InstanceDirectory } from "./directory/InstanceDirectory.js";
import { LogFetcher } from "./logs/LogFetcher.js";
import { SlowQueryCollector } from "./logs/SlowQueryCollector.js";
import { NameResolver } from "./resolver/NameResolver.js";
import {
  DeterministicMatchStrategy,
  InferenceMatchStrategy,
  type MatchStrategy,
} from "./resolver/strategies.js";
import { getRdsTools, type RdsToolServices } from "./tools/index.js";

/**
 * Upstream services to use instead of the AWS and Anthropic clients
 */
export interface RdsUpstreams {
  controlPlane?: ControlPlaneApi;
  metrics?: MetricsApi;
  load?: LoadApi;
  inference?: InferenceClient;
}

interface RdsServices {
  controlPlane: ControlPlaneApi;
  metrics: MetricsApi;
  load: LoadApi;
  directory: InstanceDirectory;
  resolver: NameResolver;
  collector: SlowQueryCollector;
}

/**
 * The strategy in effect: explicit, or inference whenever a key exists
 */
export function selectResolverStrategy(
  config: DiagnosticsConfig,
): ResolverStrategy {
  return config.resolver ?? (config.inference.apiKey ? "inference" : "match");
}

/**
 * RDS Diagnostics Adapter
 */
export class RdsAdapter extends DatabaseAdapter implements RdsToolServices {
  readonly type = "rds" as const;
  readonly name = "RDS Adapter";
  readonly version = "0.1.0";

  private clients: AwsClientManager | undefined;
  private services: RdsServices | undefined;

  constructor(
    private readonly config: DiagnosticsConfig,
    private readonly upstreams: RdsUpstreams = {},
    readonly now: () => number = Date.now,
  ) {
    super();
  }

  // =========================================================================
  // Lifecycle
  // =========================================================================

  async initialize(): Promise<void> {
    if (this.initialized) {
      logger.warn("Already initialized");
      return;
    }

    const clients = new AwsClientManager(this.config.aws);
    const controlPlane =
      this.upstreams.controlPlane ??
      new RdsControlPlane(clients.getRdsClient());
    const metrics =
      this.upstreams.metrics ??
      new CloudWatchMetrics(clients.getCloudWatchClient());
    const load =
      this.upstreams.load ?? new PerformanceInsightsLoad(clients.getPiClient());

    const directory = new InstanceDirectory(controlPlane, {
      ttlSeconds: this.config.cacheTtlSeconds,
      now: this.now,
    });
    const resolver = new NameResolver(directory, this.createStrategy(), {
      cacheSize: this.config.resolutionCacheSize,
    });
    const collector = new SlowQueryCollector(
      new LogFetcher(controlPlane),
      this.now,
    );

    this.clients = clients;
    this.services = {
      controlPlane,
      metrics,
      load,
      directory,
      resolver,
      collector,
    };
    this.initialized = true;

    logger.info("RDS adapter initialized", {
      region: clients.region,
      resolver: resolver.strategyKind,
      cacheTtlSeconds: this.config.cacheTtlSeconds,
    });
  }

  async shutdown(): Promise<void> {
    if (!this.initialized) {
      return;
    }
    this.clients?.destroy();
    this.clients = undefined;
    this.services = undefined;
    this.initialized = false;
    logger.info("RDS adapter shut down");
  }

  private createStrategy(): MatchStrategy {
    const strategy = selectResolverStrategy(this.config);
    if (strategy === "match") {
      return new DeterministicMatchStrategy();
    }

    const { apiKey, model } = this.config.inference;
    const client =
      this.upstreams.inference ??
      (apiKey ? new AnthropicInferenceClient(apiKey, model) : undefined);
    if (!client) {
      throw new ConfigurationError(
        "Inference name resolution requires an Anthropic API key",
      );
    }
    return new InferenceMatchStrategy(client);
  }

  private requireServices(): RdsServices {
    if (!this.services) {
      throw new ConfigurationError("RDS adapter is not initialized");
    }
    return this.services;
  }

  // =========================================================================
  // Tool services
  // =========================================================================

  get controlPlane(): ControlPlaneApi {
    return this.requireServices().controlPlane;
  }

  get metrics(): MetricsApi {
    return this.requireServices().metrics;
  }

  get load(): LoadApi {
    return this.requireServices().load;
  }

  get resolver(): NameResolver {
    return this.requireServices().resolver;
  }

  get collector(): SlowQueryCollector {
    return this.requireServices().collector;
  }

  get directory(): InstanceDirectory {
    return this.requireServices().directory;
  }

  // =========================================================================
  // MCP Registration
  // =========================================================================

  getSupportedToolGroups(): ToolGroup[] {
    return ["instance", "metrics", "logs", "load"];
  }

  getToolDefinitions(): ToolDefinition[] {
    return getRdsTools(this);
  }

  override getInfo(): Record<string, unknown> {
    return {
      ...super.getInfo(),
      region: this.config.aws.region,
      resolver: selectResolverStrategy(this.config),
    };
  }
}
