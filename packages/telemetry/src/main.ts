/**
 * Metrics sidecar - main entry point
 *
 * Binds the ingestion socket first so a bind failure ends the process before
 * anything else starts, then runs the receive loop, the HTTP server and the
 * optional self-monitor under one task supervisor.
 */

import { BenchmarkSelfMonitor } from '@tradewire/benchmark';
import { TradewireConfig, loadConfig } from '@tradewire/config';
import { Logger, ShutdownReport, TaskSupervisor, waitForAbort } from '@tradewire/utils';
import { IngestionService } from './IngestionService';
import { buildMetricsServer } from './server';

export interface RunSidecarOptions {
  /** Use this service instead of building one from the config */
  ingestion?: IngestionService;
  /** OS signals that trigger shutdown */
  signals?: NodeJS.Signals[];
}

export async function runSidecar(
  config: TradewireConfig,
  logger: Logger,
  options: RunSidecarOptions = {}
): Promise<ShutdownReport> {
  const ingestion =
    options.ingestion ??
    new IngestionService({
      bindAddress: config.sidecar.bindAddress,
      receiveTimeoutMs: config.sidecar.receiveTimeoutMs,
      receiveHighWaterMark: config.sidecar.receiveHighWaterMark,
      maxFrameBytes: config.transport.maxFrameBytes,
      logger: logger.child('ingestion')
    });

  // BindError propagates from here
  await ingestion.start();

  const server = buildMetricsServer(ingestion, logger.child('http'));
  const supervisor = new TaskSupervisor(logger.child('supervisor'), {
    shutdownTimeoutMs: config.sidecar.shutdownTimeoutMs
  });
  supervisor.installSignalHandlers(options.signals);

  supervisor.addTask('receive-loop', (signal) => ingestion.serve(signal));

  supervisor.addTask('http-server', async (signal) => {
    await server.listen({ host: config.sidecar.httpHost, port: config.sidecar.httpPort });
    logger.info(`Metrics server listening on ${config.sidecar.httpHost}:${config.sidecar.httpPort}`);
    try {
      await waitForAbort(signal);
    } finally {
      await server.close();
    }
  });

  if (config.sidecar.selfMonitor.enabled) {
    const monitor = new BenchmarkSelfMonitor({
      endpoint: config.producer.metricsAddress,
      intervalMs: config.sidecar.selfMonitor.intervalMs,
      maxSamples: config.benchmark.maxSamples,
      socket: {
        sendHighWaterMark: config.producer.sendHighWaterMark,
        reconnectIntervalMs: config.transport.reconnectIntervalMs,
        maxFrameBytes: config.transport.maxFrameBytes
      },
      logger: logger.child('self-monitor')
    });
    supervisor.addTask('self-monitor', (signal) => monitor.run(signal));
  }

  const report = await supervisor.run();
  await ingestion.stop();
  return report;
}

async function main(): Promise<number> {
  let config: TradewireConfig;
  try {
    config = loadConfig();
  } catch (error) {
    new Logger('sidecar').error('Invalid configuration', error);
    return 1;
  }

  const logger = new Logger('sidecar', { level: config.logLevel });
  logger.info('Starting metrics sidecar', { mode: config.mode, bindAddress: config.sidecar.bindAddress });

  try {
    const report = await runSidecar(config, logger);
    return report.faults.length > 0 || report.timedOut ? 1 : 0;
  } catch (error) {
    logger.error('Metrics sidecar failed to start', error);
    return 1;
  }
}

if (require.main === module) {
  main().then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error(error);
      process.exit(1);
    }
  );
}
