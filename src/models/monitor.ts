// Monitoring session model

import { ChangeKind, DriftType, OverflowPolicy } from './types.js';

export interface MonitorConfig {
  scanIntervalMs: number;
  watchPatterns: readonly string[];
  ignorePatterns: readonly string[];
  maxCpuPercent: number;
  maxMemoryMb: number;
  batchSize: number;
  enabledChecks: readonly DriftType[];
  queueCapacity: number;
  overflowPolicy: OverflowPolicy;
  workerConcurrency: number;
  /** Where cycle metrics are written as JSON; not written when absent */
  metricsFile?: string;
}

export interface ChangeEvent {
  /** Path relative to the project root, using forward slashes */
  path: string;
  kind: ChangeKind;
  timestamp: number;
}

export interface MonitorMetrics {
  checksCompleted: number;
  filesScanned: number;
  driftDetections: number;
  alertsRaised: number;
  alertsSuppressed: number;
  scanErrors: number;
  throttledCycles: number;
}

export interface MonitorStatus {
  running: boolean;
  lastScanAt: Date | null;
  lastError: string | null;
  throttled: boolean;
  pending: number;
  metrics: MonitorMetrics;
}

export interface ResourceUsage {
  cpuPercent: number;
  memoryMb: number;
}

/**
 * Measures current process resource usage
 */
export interface ResourceProbe {
  sample(): ResourceUsage;
}

/**
 * Producer of raw file change events
 */
export interface ChangeSource {
  start(emit: (event: ChangeEvent) => void): Promise<void>;
  stop(): Promise<void>;
}
