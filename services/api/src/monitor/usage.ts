import { logger } from '../logger.js';

export type UsageSample = { cpuPercent: number; rssMb: number };

export interface UsageProbe {
  cpuUsage: (previous?: NodeJS.CpuUsage) => NodeJS.CpuUsage;
  rss: () => number;
  hrtimeMs: () => number;
}

const processProbe: UsageProbe = {
  cpuUsage: (previous) => process.cpuUsage(previous),
  rss: () => process.memoryUsage().rss,
  hrtimeMs: () => Number(process.hrtime.bigint()) / 1e6,
};

/** CPU share of one core since the previous call, and current resident memory. */
export function createUsageSampler(probe: UsageProbe = processProbe): () => UsageSample {
  let lastCpu = probe.cpuUsage();
  let lastAt = probe.hrtimeMs();
  return () => {
    const cpu = probe.cpuUsage(lastCpu);
    const now = probe.hrtimeMs();
    const elapsedMs = now - lastAt;
    lastCpu = probe.cpuUsage();
    lastAt = now;
    const cpuMs = (cpu.user + cpu.system) / 1000;
    return {
      cpuPercent: elapsedMs > 0 ? Math.round((cpuMs / elapsedMs) * 1000) / 10 : 0,
      rssMb: probe.rss() / 1024 ** 2,
    };
  };
}

/**
 * Logs CPU and RAM every `intervalMs`. The timer is unref'd so it never keeps
 * the process alive; call the returned function to stop it.
 */
export function startUsageMonitor(intervalMs: number, sample = createUsageSampler()): () => void {
  const timer = setInterval(() => {
    const { cpuPercent, rssMb } = sample();
    logger.debug(`CPU: ${cpuPercent}% | RAM: ${rssMb.toFixed(2)} MB`);
  }, intervalMs);
  timer.unref();
  return () => clearInterval(timer);
}
