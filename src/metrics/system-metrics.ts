import { cpus, totalmem, freemem } from 'node:os';
import { statfs } from 'node:fs/promises';

export interface UsageFigure {
  used: number;
  total: number;
  percent: number;
}

export interface MetricsSnapshot {
  cpuPercent: number;
  memory: UsageFigure;
  disk: UsageFigure & { path: string };
}

export interface MetricsSource {
  read(): Promise<MetricsSnapshot>;
}

interface CpuTimes {
  idle: number;
  total: number;
}

function sampleCpu(): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of cpus()) {
    const { user, nice, sys, irq } = cpu.times;
    idle += cpu.times.idle;
    total += user + nice + sys + irq + cpu.times.idle;
  }
  return { idle, total };
}

/** Busy share between two samples, 0-100. */
export function cpuPercentBetween(a: CpuTimes, b: CpuTimes): number {
  const total = b.total - a.total;
  if (total <= 0) return 0;
  return ((total - (b.idle - a.idle)) / total) * 100;
}

function percentOf(used: number, total: number): number {
  return total > 0 ? (used / total) * 100 : 0;
}

/**
 * Host metrics from node:os and statfs.
 * CPU is measured over `cpuSampleMs`; memory and disk are point-in-time.
 */
export class HostMetricsSource implements MetricsSource {
  private cpuSampleMs: number;
  private diskPath: string;

  constructor(opts: { cpuSampleMs: number; diskPath: string }) {
    this.cpuSampleMs = opts.cpuSampleMs;
    this.diskPath = opts.diskPath;
  }

  async read(): Promise<MetricsSnapshot> {
    const before = sampleCpu();
    await delay(this.cpuSampleMs);
    const cpuPercent = cpuPercentBetween(before, sampleCpu());

    const memTotal = totalmem();
    const memUsed = memTotal - freemem();

    const fs = await statfs(this.diskPath);
    const diskTotal = fs.blocks * fs.bsize;
    const diskUsed = (fs.blocks - fs.bfree) * fs.bsize;

    return {
      cpuPercent,
      memory: { used: memUsed, total: memTotal, percent: percentOf(memUsed, memTotal) },
      disk: { path: this.diskPath, used: diskUsed, total: diskTotal, percent: percentOf(diskUsed, diskTotal) },
    };
  }
}

const GB = 1024 ** 3;

function gb(bytes: number): string {
  return `${(bytes / GB).toFixed(1)} GB`;
}

export function formatStatusReport(m: MetricsSnapshot): string {
  return [
    '🖥 System status',
    `CPU: ${m.cpuPercent.toFixed(1)}%`,
    `RAM: ${gb(m.memory.used)} / ${gb(m.memory.total)} (${m.memory.percent.toFixed(1)}%)`,
    `Disk (${m.disk.path}): ${gb(m.disk.used)} / ${gb(m.disk.total)} (${m.disk.percent.toFixed(1)}%)`,
  ].join('\n');
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
