export { AwsClientManager } from "./AwsClientManager.js";
export { RdsControlPlane, mapDbInstance } from "./RdsControlPlane.js";
export { CloudWatchMetrics } from "./CloudWatchMetrics.js";
export { PerformanceInsightsLoad, DB_LOAD_METRIC } from "./PerformanceInsightsLoad.js";
