export { MetricsCollector } from "./metrics-collector.js";
export type { MetricsCollectorConfig } from "./metrics-collector.js";
