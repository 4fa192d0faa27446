/**
 * Upstream Service Interfaces
 *
 * The control plane, metrics, load and inference services are consumed
 * through these interfaces. The AWS and Anthropic implementations live
 * under src/aws and src/inference; tests substitute in-process fakes.
 */

import type { InstanceDirectoryEntry, LogFileInfo } from "../index.js";

/**
 * One page of a log file listing
 */
export interface LogFilePage {
  files: LogFileInfo[];
  nextCursor?: string;
}

/**
 * One portion of a log file
 */
export interface LogPortion {
  data: string;
  nextCursor?: string;
  morePending: boolean;
}

/**
 * Managed database control plane (read-only subset)
 */
export interface ControlPlaneApi {
  /** Complete instance list in a single call */
  describeInstances(): Promise<InstanceDirectoryEntry[]>;

  /** A single instance, or undefined when it does not exist */
  describeInstance(
    identifier: string,
  ): Promise<InstanceDirectoryEntry | undefined>;

  describeLogFiles(
    identifier: string,
    filenameContains: string,
    cursor?: string,
  ): Promise<LogFilePage>;

  downloadLogPortion(
    identifier: string,
    logFileName: string,
    cursor: string,
    numberOfLines: number,
  ): Promise<LogPortion>;
}

/**
 * Query for a single time-series metric
 */
export interface MetricQuery {
  namespace: string;
  metricName: string;
  dimensions: Record<string, string>;
  /** Seconds */
  period: number;
  stat: string;
  start: Date;
  end: Date;
}

/**
 * Time-series metrics service
 */
export interface MetricsApi {
  /** Samples in chronological order */
  getMetric(query: MetricQuery): Promise<number[]>;
}

/**
 * One dimension key with its aggregated load
 */
export interface LoadKey {
  dimensions: Record<string, string>;
  total: number;
}

/**
 * Database load (average active sessions) service
 */
export interface LoadApi {
  describeTopKeys(params: {
    resourceId: string;
    group: string;
    start: Date;
    end: Date;
    limit: number;
  }): Promise<LoadKey[]>;
}

/**
 * Options for a single completion request
 */
export interface CompletionOptions {
  system?: string;
  maxTokens: number;
  temperature: number;
}

/**
 * Natural-language inference service
 */
export interface InferenceClient {
  /** Returns the raw completion text */
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}
