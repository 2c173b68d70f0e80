export { MetricsCollector } from "./metrics-collector.js";
export type { MetricsCollectorConfig, MetricsSource } from "./metrics-collector.js";
