/**
 * Instance Directory Types
 *
 * Snapshot types for the cached RDS instance list and the engine
 * classification used to pick a slow-query parser.
 */

/**
 * Engine family as far as log parsing is concerned
 */
export type EngineFamily = "mysql" | "postgres" | "other";

/**
 * Tagged engine variant. `unsupported` keeps the raw engine name for
 * error reporting.
 */
export type Engine =
  | { kind: "mysql" }
  | { kind: "postgres" }
  | { kind: "unsupported"; name: string };

/**
 * Network endpoint of an instance (absent while the instance is being created)
 */
export interface InstanceEndpoint {
  host: string;
  port: number;
}

/**
 * One managed database instance as seen by the control plane
 */
export interface InstanceDirectoryEntry {
  /** DBInstanceIdentifier, unique per account and region */
  identifier: string;

  /** Raw engine name (e.g. "mysql", "aurora-postgresql") */
  engine: string;

  engineFamily: EngineFamily;

  /** Raw instance status (e.g. "available", "backing-up") */
  status: string;

  endpoint?: InstanceEndpoint;

  /** DbiResourceId, used by Performance Insights */
  resourceId: string;

  /** Allocated storage as reported by the control plane (GiB) */
  allocatedStorage: number;
}

/**
 * Immutable directory snapshot. Replaced wholesale on refresh.
 */
export interface DirectorySnapshot {
  readonly entries: readonly InstanceDirectoryEntry[];

  /** Epoch milliseconds of the successful fetch */
  readonly fetchedAt: number;
}

/**
 * Result of listing the directory
 */
export type DirectoryListing =
  | {
      status: "success";
      instances: readonly InstanceDirectoryEntry[];
      fetchedAt: number;
      cached: boolean;
    }
  | { status: "error"; message: string };
