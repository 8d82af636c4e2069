/**
 * @tradewire/telemetry - Metrics sidecar
 */

export * from './IngestionService';
export * from './MetricStore';
export * from './TradeAnalyzer';
export * from './server';
export { RunSidecarOptions, runSidecar } from './main';
