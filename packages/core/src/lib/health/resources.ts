import fs from "node:fs/promises";
import os from "node:os";

export type UsageSample = { usedPercent: number; detail: string };

/**
 * Host resource readings. Swapped for a fixed probe in tests.
 */
export interface ResourceProbe {
  diskUsage(path: string): Promise<UsageSample>;
  memoryUsage(): Promise<UsageSample>;
  loadPerCore(): Promise<{ perCore: number; cores: number }>;
}

function roundPercent(value: number): number {
  return Math.round(value * 10) / 10;
}

function formatGiB(bytes: number): string {
  return `${(bytes / 1024 ** 3).toFixed(1)}GiB`;
}

export const systemResourceProbe: ResourceProbe = {
  async diskUsage(path) {
    const st = await fs.statfs(path);
    const used = (st.blocks - st.bfree) * st.bsize;
    const available = st.bavail * st.bsize;
    const total = used + available;
    const usedPercent = total > 0 ? roundPercent((used / total) * 100) : 0;
    return { usedPercent, detail: `${formatGiB(available)} free of ${formatGiB(total)}` };
  },

  async memoryUsage() {
    const total = os.totalmem();
    const free = os.freemem();
    const usedPercent = total > 0 ? roundPercent(((total - free) / total) * 100) : 0;
    return { usedPercent, detail: `${formatGiB(free)} free of ${formatGiB(total)}` };
  },

  async loadPerCore() {
    const cores = Math.max(1, os.availableParallelism());
    const [oneMinute = 0] = os.loadavg();
    return { perCore: Math.round((oneMinute / cores) * 100) / 100, cores };
  },
};
