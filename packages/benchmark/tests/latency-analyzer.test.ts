import { describe, it, expect, afterEach } from '@jest/globals';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { BenchmarkResult } from '@tradewire/types';
import { PublishClient, PullSocket } from '@tradewire/transport';
import { LatencyAnalyzer, LatencyProfile, PublishingBenchmark, formatDegradationAnalysis } from '../src';

function profile(rate: number, p95: number, queueFullCount = 0, totalCount = 100): LatencyProfile {
  const result: BenchmarkResult = {
    totalCount,
    okCount: totalCount - queueFullCount,
    queueFullCount,
    errorCount: 0,
    durationSeconds: 1,
    throughput: totalCount,
    latencyStats: { count: totalCount, min: 1, mean: p95 / 2, p50: p95 / 2, p95, p99: p95 * 2, max: p95 * 3 }
  };
  return { timestamp: 1700000000, testType: 'load_profile', config: { rate, durationSeconds: 1 }, result, environment: {} };
}

describe('LatencyAnalyzer', () => {
  const clients: PublishClient[] = [];
  const dirs: string[] = [];

  async function analyzer(): Promise<LatencyAnalyzer> {
    const placeholder = new PullSocket();
    await placeholder.bind('tcp://127.0.0.1:0');
    const endpoint = placeholder.endpoint ?? 'tcp://127.0.0.1:1';
    await placeholder.close();

    const client = PublishClient.connect(endpoint);
    clients.push(client);
    return new LatencyAnalyzer(new PublishingBenchmark({ client }), { endpoint, pauseMs: 10 });
  }

  afterEach(async () => {
    for (const c of clients.splice(0)) {
      c.close();
    }
    await Promise.all(dirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
  });

  describe('Degradation analysis', () => {
    it('should find the first rate whose p95 exceeds twice the baseline', async () => {
      const analysis = (await analyzer()).analyzeDegradation([
        profile(100, 10),
        profile(200, 20),
        profile(300, 21),
        profile(400, 50)
      ]);

      expect(analysis.rates).toEqual([100, 200, 300, 400]);
      expect(analysis.p95LatenciesUs).toEqual([10, 20, 21, 50]);
      expect(analysis.p95DegradationRate).toBe(300);
      expect(analysis.queueSaturationRate).toBeUndefined();
    });

    it('should find the first rate with more than 1% queue_full sends', async () => {
      const analysis = (await analyzer()).analyzeDegradation([
        profile(100, 10, 1),
        profile(200, 10, 2),
        profile(300, 10, 50)
      ]);

      expect(analysis.queueFullRatesPct).toEqual([1, 2, 50]);
      expect(analysis.queueSaturationRate).toBe(200);
      expect(analysis.p95DegradationRate).toBeUndefined();
    });

    it('should skip profiles without samples', async () => {
      const empty = profile(100, 0, 0, 0);
      const analysis = (await analyzer()).analyzeDegradation([empty, profile(200, 10)]);

      expect(analysis.rates).toEqual([200]);
      expect(analysis.p95DegradationRate).toBeUndefined();
    });

    it('should format the findings', async () => {
      const analysis = (await analyzer()).analyzeDegradation([profile(100, 10), profile(200, 25, 5)]);

      expect(formatDegradationAnalysis(analysis).split('\n')).toEqual([
        '=== Latency degradation analysis ===',
        'P95 latency degrades significantly at: 200 trades/sec',
        'Queue saturation begins at: 200 trades/sec',
        '   100 trades/sec: P95=  10.0μs, queue full= 0.0%',
        '   200 trades/sec: P95=  25.0μs, queue full= 5.0%'
      ]);
    });
  });

  describe('Profiling', () => {
    it('should run one sustained test per rate step', async () => {
      const subject = await analyzer();

      const profiles = await subject.profile(40, 20, 0.2);

      expect(profiles.map((p) => p.config)).toEqual([
        { rate: 20, durationSeconds: 0.2 },
        { rate: 40, durationSeconds: 0.2 }
      ]);
      expect(profiles.every((p) => p.testType === 'load_profile')).toBe(true);
      expect(profiles[0].environment.endpoint).toMatch(/^tcp:\/\/127\.0\.0\.1:\d+$/);
      expect(subject.getProfiles()).toHaveLength(2);
    });

    it('should reject a step larger than the maximum rate', async () => {
      await expect((await analyzer()).profile(10, 20)).rejects.toThrow(RangeError);
    });
  });

  describe('Persistence', () => {
    it('should load the profiles it saved', async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'latency-profiles-'));
      dirs.push(dir);
      const file = path.join(dir, 'profiles.json');

      const source = await analyzer();
      await source.profile(10, 10, 0.1);
      await source.saveProfiles(file);

      const target = await analyzer();
      const loaded = await target.loadProfiles(file);

      expect(loaded).toEqual(source.getProfiles());
      expect(target.getProfiles()).toHaveLength(1);
    });

    it('should reject a malformed profile file', async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'latency-profiles-'));
      dirs.push(dir);
      const file = path.join(dir, 'bad.json');
      await fs.writeFile(file, JSON.stringify([{ testType: 'burst' }]), 'utf8');

      await expect((await analyzer()).loadProfiles(file)).rejects.toThrow(/^Invalid profile file/);
    });
  });
});
