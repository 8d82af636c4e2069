import { describe, it, expect, afterEach } from '@jest/globals';
import { loadConfig } from '@tradewire/config';
import { TradeSide } from '@tradewire/types';
import { BindError, PullSocket, parseEndpoint } from '@tradewire/transport';
import { Logger, sleep } from '@tradewire/utils';
import { IngestionService, IngestionState, buildMetricsServer, runSidecar } from '../src';

describe('Metrics server', () => {
  const services: IngestionService[] = [];

  function service(): IngestionService {
    const ingestion = new IngestionService({ bindAddress: 'tcp://127.0.0.1:0', receiveTimeoutMs: 50 });
    services.push(ingestion);
    return ingestion;
  }

  afterEach(async () => {
    await Promise.all(services.splice(0).map((ingestion) => ingestion.stop()));
  });

  describe('GET /metrics', () => {
    it('should return the exposition with the Prometheus content type', async () => {
      const ingestion = service();
      ingestion.store.recordTrade(TradeSide.SELL, 4, 1700000000);
      const app = buildMetricsServer(ingestion);

      const response = await app.inject({ method: 'GET', url: '/metrics' });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('text/plain; version=0.0.4; charset=utf-8');
      expect(response.body.split('\n')).toContain('volume_total{side="sell"} 4');
      await app.close();
    });
  });

  describe('GET /health', () => {
    it('should return 503 before the receive loop runs', async () => {
      const app = buildMetricsServer(service());

      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toEqual({ running: false, bind_address: 'tcp://127.0.0.1:0' });
      await app.close();
    });

    it('should return 200 while running', async () => {
      const ingestion = service();
      await ingestion.start();
      const app = buildMetricsServer(ingestion);

      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ running: true, bind_address: 'tcp://127.0.0.1:0' });
      await app.close();
    });
  });

  describe('GET /analysis', () => {
    it('should return statistics over recent trades', async () => {
      const ingestion = service();
      ingestion.analyzer.add({ kind: 'trade', side: TradeSide.BUY, quantity: 3, timestamp: 1 });
      const app = buildMetricsServer(ingestion);

      const response = await app.inject({ method: 'GET', url: '/analysis' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        quantity: { mean: 3, std: 0, max: 3 },
        sides: { buyCount: 1, sellCount: 0, buyVolume: 3 },
        windowSize: 1
      });
      await app.close();
    });
  });

  it('should answer unknown routes with 404', async () => {
    const app = buildMetricsServer(service());
    const response = await app.inject({ method: 'GET', url: '/nope' });
    expect(response.statusCode).toBe(404);
    await app.close();
  });
});

describe('runSidecar', () => {
  it('should fail before serving when the bind address is taken', async () => {
    const holder = new PullSocket();
    await holder.bind('tcp://127.0.0.1:0');
    try {
      const config = loadConfig({ SIDECAR_BIND_ADDRESS: holder.endpoint ?? '', SIDECAR_HTTP_PORT: '0' });

      await expect(runSidecar(config, new Logger('sidecar-test'))).rejects.toBeInstanceOf(BindError);
    } finally {
      await holder.close();
    }
  });

  it('should shut down with a task fault when the HTTP port is taken', async () => {
    const holder = new PullSocket();
    await holder.bind('tcp://127.0.0.1:0');
    const ingestion = new IngestionService({ bindAddress: 'tcp://127.0.0.1:0', receiveTimeoutMs: 50 });
    try {
      const { port } = parseEndpoint(holder.endpoint ?? '');
      const config = loadConfig({
        SIDECAR_BIND_ADDRESS: 'tcp://127.0.0.1:0',
        SIDECAR_HTTP_HOST: '127.0.0.1',
        SIDECAR_HTTP_PORT: String(port),
        SIDECAR_SHUTDOWN_TIMEOUT_MS: '2000'
      });

      const report = await runSidecar(config, new Logger('sidecar-test'), { ingestion, signals: [] });

      expect(report.reason.kind).toBe('task_fault');
      expect(report.faults.map((fault) => fault.task)).toEqual(['http-server']);
      expect(report.timedOut).toBe(false);
      expect(ingestion.getState()).toBe(IngestionState.STOPPED);
    } finally {
      await ingestion.stop();
      await holder.close();
    }
  });

  it('should shut down cleanly on a termination signal', async () => {
    const ingestion = new IngestionService({ bindAddress: 'tcp://127.0.0.1:0', receiveTimeoutMs: 50 });
    const config = loadConfig({
      SIDECAR_BIND_ADDRESS: 'tcp://127.0.0.1:0',
      SIDECAR_HTTP_HOST: '127.0.0.1',
      SIDECAR_HTTP_PORT: '0',
      SIDECAR_SHUTDOWN_TIMEOUT_MS: '2000'
    });
    const listenersBefore = process.listenerCount('SIGUSR2');

    const running = runSidecar(config, new Logger('sidecar-test'), { ingestion, signals: ['SIGUSR2'] });
    for (let i = 0; i < 100 && process.listenerCount('SIGUSR2') === listenersBefore; i++) {
      await sleep(10);
    }
    expect(ingestion.isRunning).toBe(true);

    process.emit('SIGUSR2', 'SIGUSR2');
    const report = await running;

    expect(report.reason).toEqual({ kind: 'signal', signal: 'SIGUSR2' });
    expect(report.faults).toEqual([]);
    expect(report.timedOut).toBe(false);
    expect(report.pendingTasks).toEqual([]);
    expect(ingestion.getState()).toBe(IngestionState.STOPPED);
    expect(process.listenerCount('SIGUSR2')).toBe(listenersBefore);
  });
});
