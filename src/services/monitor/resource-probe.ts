// Process CPU and memory sampling for the monitor's resource budget

import type { ResourceProbe, ResourceUsage } from '../../models/monitor.js';

/**
 * Samples the current process.
 *
 * CPU is the share of one core used since the previous sample; the first
 * sample measures from probe creation.
 */
export class ProcessResourceProbe implements ResourceProbe {
  private lastCpu = process.cpuUsage();
  private lastTime = process.hrtime.bigint();

  sample(): ResourceUsage {
    const cpu = process.cpuUsage(this.lastCpu);
    const time = process.hrtime.bigint();
    const elapsedMicros = Number(time - this.lastTime) / 1000;

    this.lastCpu = process.cpuUsage();
    this.lastTime = time;

    const cpuPercent = elapsedMicros > 0 ? ((cpu.user + cpu.system) / elapsedMicros) * 100 : 0;
    return {
      cpuPercent: Math.round(cpuPercent * 10) / 10,
      memoryMb: Math.round((process.memoryUsage().rss / 1024 / 1024) * 10) / 10
    };
  }
}
