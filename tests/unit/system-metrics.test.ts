import { describe, it, expect } from 'vitest';
import { HostMetricsSource, cpuPercentBetween, formatStatusReport } from '../../src/metrics/system-metrics.js';
import { SAMPLE_METRICS, SAMPLE_REPORT } from '../helpers/test-fixtures.js';

describe('formatStatusReport', () => {
  it('should fill the report template', () => {
    expect(formatStatusReport(SAMPLE_METRICS)).toBe(SAMPLE_REPORT);
  });

  it('should round to one decimal place', () => {
    const report = formatStatusReport({ ...SAMPLE_METRICS, cpuPercent: 3.14159 });
    expect(report.split('\n')[1]).toBe('CPU: 3.1%');
  });
});

describe('cpuPercentBetween', () => {
  it('should compute the busy share between samples', () => {
    expect(cpuPercentBetween({ idle: 100, total: 400 }, { idle: 150, total: 600 })).toBe(75);
  });

  it('should return 0 when no time has passed', () => {
    expect(cpuPercentBetween({ idle: 10, total: 20 }, { idle: 10, total: 20 })).toBe(0);
  });
});

describe('HostMetricsSource', () => {
  it('should read consistent figures from this host', async () => {
    const source = new HostMetricsSource({ cpuSampleMs: 0, diskPath: '/' });

    const m = await source.read();

    expect(m.cpuPercent).toBeGreaterThanOrEqual(0);
    expect(m.cpuPercent).toBeLessThanOrEqual(100);
    expect(m.memory.total).toBeGreaterThan(0);
    expect(m.memory.used).toBeLessThanOrEqual(m.memory.total);
    expect(m.disk.path).toBe('/');
    expect(m.disk.used).toBeLessThanOrEqual(m.disk.total);
  });

  it('should reject when the disk path does not exist', async () => {
    const source = new HostMetricsSource({ cpuSampleMs: 0, diskPath: '/definitely/not/a/real/path' });

    await expect(source.read()).rejects.toThrow();
  });
});
