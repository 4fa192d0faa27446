import { DEFAULT_CONFIG } from "../server/McpServer.js";
import type {
  DiagnosticsConfig,
  McpServerConfig,
  ResolverStrategy,
} from "../types/index.js";
import { ConfigurationError } from "../types/index.js";
import { isLogLevel, type LogLevel } from "../utils/logger.js";
import { DEFAULT_INFERENCE_MODEL } from "../inference/index.js";
import { DEFAULT_DIRECTORY_TTL_SECONDS } from "../adapters/rds/directory/InstanceDirectory.js";
import { DEFAULT_RESOLUTION_CACHE_SIZE } from "../adapters/rds/resolver/NameResolver.js";

export const DEFAULT_REGION = "us-east-1";

export interface ParsedArgs {
  config: Partial<McpServerConfig>;
  diagnostics: DiagnosticsConfig;
  logLevel?: LogLevel;
  shouldExit: boolean;
}

function isResolverStrategy(value: string): value is ResolverStrategy {
  return value === "inference" || value === "match";
}

function parseResolver(value: string | undefined): ResolverStrategy | undefined {
  if (value === undefined) return undefined;
  if (!isResolverStrategy(value)) {
    throw new ConfigurationError(
      `Invalid resolver: ${value} (expected "inference" or "match")`,
    );
  }
  return value;
}

function parseCacheTtl(value: string | undefined): number {
  if (value === undefined) return DEFAULT_DIRECTORY_TTL_SECONDS;
  const seconds = Number(value);
  if (!Number.isInteger(seconds) || seconds < 0) {
    throw new ConfigurationError(`Invalid cache TTL: ${value}`);
  }
  return seconds;
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  if (!isLogLevel(value)) {
    throw new ConfigurationError(`Invalid log level: ${value}`);
  }
  return value;
}

/**
 * Parse command line arguments, falling back to environment variables
 *
 * @throws ConfigurationError for invalid values or inconsistent credentials
 */
export function parseArgs(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): ParsedArgs {
  const args = argv;
  const config: Partial<McpServerConfig> = {};

  let region: string | undefined;
  let accessKeyId: string | undefined;
  let secretAccessKey: string | undefined;
  let apiKey: string | undefined;
  let model: string | undefined;
  let resolver: string | undefined;
  let cacheTtl: string | undefined;
  let logLevel: string | undefined;

  const emptyResult = (): ParsedArgs => ({
    config,
    diagnostics: {
      aws: { region: DEFAULT_REGION },
      inference: { model: DEFAULT_INFERENCE_MODEL },
      cacheTtlSeconds: DEFAULT_DIRECTORY_TTL_SECONDS,
      resolutionCacheSize: DEFAULT_RESOLUTION_CACHE_SIZE,
    },
    shouldExit: true,
  });

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case "--region":
      case "-r":
        if (nextArg && !nextArg.startsWith("-")) {
          region = nextArg;
          i++;
        }
        break;

      case "--access-key":
        if (nextArg && !nextArg.startsWith("-")) {
          accessKeyId = nextArg;
          i++;
        }
        break;

      case "--secret-access-key":
        // Secret keys may legitimately start with '-'
        if (nextArg !== undefined) {
          secretAccessKey = nextArg;
          i++;
        }
        break;

      case "--anthropic-api-key":
        if (nextArg && !nextArg.startsWith("-")) {
          apiKey = nextArg;
          i++;
        }
        break;

      case "--model":
        if (nextArg && !nextArg.startsWith("-")) {
          model = nextArg;
          i++;
        }
        break;

      case "--resolver":
        if (nextArg && !nextArg.startsWith("-")) {
          resolver = nextArg;
          i++;
        }
        break;

      case "--cache-ttl":
        if (nextArg && !nextArg.startsWith("-")) {
          cacheTtl = nextArg;
          i++;
        }
        break;

      case "--tool-filter":
      case "-f":
        // Filter values start with '-' (e.g., "-logs,-load"), so any next
        // argument is taken
        if (nextArg !== undefined) {
          config.toolFilter = nextArg;
          i++;
        }
        break;

      case "--name":
        if (nextArg && !nextArg.startsWith("-")) {
          config.name = nextArg;
          i++;
        }
        break;

      case "--log-level":
        if (nextArg && !nextArg.startsWith("-")) {
          logLevel = nextArg;
          i++;
        }
        break;

      case "--version":
      case "-v":
        console.error(`rds-diagnostics-mcp version ${DEFAULT_CONFIG.version}`);
        return emptyResult();

      case "--help":
      case "-h":
        printHelp();
        return emptyResult();

      default:
        if (arg?.startsWith("-")) {
          console.error(`Unknown option: ${arg}`);
          printHelp();
          process.exit(1);
        }
    }
  }

  region ??= env["AWS_REGION"] ?? DEFAULT_REGION;
  accessKeyId ??= env["AWS_ACCESS_KEY_ID"];
  secretAccessKey ??= env["AWS_SECRET_ACCESS_KEY"];
  apiKey ??= env["ANTHROPIC_API_KEY"];
  model ??= env["RDS_MCP_MODEL"] ?? DEFAULT_INFERENCE_MODEL;
  resolver ??= env["RDS_MCP_RESOLVER"];
  cacheTtl ??= env["RDS_MCP_CACHE_TTL"];
  logLevel ??= env["LOG_LEVEL"];
  config.toolFilter ??= env["RDS_MCP_TOOL_FILTER"] ?? env["TOOL_FILTER"];

  if (Boolean(accessKeyId) !== Boolean(secretAccessKey)) {
    throw new ConfigurationError(
      "AWS access key and secret access key must be given together",
    );
  }

  const strategy = parseResolver(resolver);
  if (strategy === "inference" && !apiKey) {
    throw new ConfigurationError(
      "The inference resolver requires --anthropic-api-key or ANTHROPIC_API_KEY",
    );
  }

  return {
    config,
    diagnostics: {
      aws: { region, accessKeyId, secretAccessKey },
      inference: { apiKey, model },
      resolver: strategy,
      cacheTtlSeconds: parseCacheTtl(cacheTtl),
      resolutionCacheSize: DEFAULT_RESOLUTION_CACHE_SIZE,
    },
    logLevel: parseLogLevel(logLevel),
    shouldExit: false,
  };
}

/**
 * Print help message
 */
export function printHelp(): void {
  console.error(`
rds-diagnostics-mcp - Read-only Amazon RDS diagnostics MCP server

Usage: rds-diagnostics-mcp [options]

AWS Options:
  --region, -r <region>         AWS region (default: us-east-1)
  --access-key <id>             AWS access key id
  --secret-access-key <secret>  AWS secret access key
                                (both or neither; default credential chain otherwise)

Name Resolution Options:
  --anthropic-api-key <key>     API key for inference-based name matching
  --model <model>               Inference model (default: ${DEFAULT_INFERENCE_MODEL})
  --resolver <strategy>         inference or match
                                (default: inference when a key is set, else match)
  --cache-ttl <seconds>         Instance list cache TTL (default: ${DEFAULT_DIRECTORY_TTL_SECONDS})

Server Options:
  --tool-filter, -f <filter>    Tool filter string (e.g., "-logs,-load")
  --name <name>                 Server name (default: rds-diagnostics-mcp)
  --log-level <level>           debug, info, warn or error (default: info)

Other:
  --version, -v                 Show version
  --help, -h                    Show this help

Environment Variables:
  AWS_REGION                    AWS region
  AWS_ACCESS_KEY_ID             AWS access key id
  AWS_SECRET_ACCESS_KEY         AWS secret access key
  ANTHROPIC_API_KEY             Inference API key
  RDS_MCP_MODEL                 Inference model
  RDS_MCP_RESOLVER              Name resolution strategy
  RDS_MCP_CACHE_TTL             Instance list cache TTL in seconds
  RDS_MCP_TOOL_FILTER           Tool filter string
  LOG_LEVEL                     Log level (debug, info, warn, error)
`);
}
