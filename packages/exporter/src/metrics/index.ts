/**
 * Metrics Module
 *
 * Renders probe statistics in the Prometheus text exposition format.
 */

export { MetricsBridge, lossRatio } from "./metrics-bridge.js";
export type { MetricsBridgeOptions } from "./metrics-bridge.js";
export { ScaledGauge, isRttUnit } from "./rtt-scale.js";
