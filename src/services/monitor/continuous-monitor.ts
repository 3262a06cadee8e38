/**
 * Continuous Monitor
 *
 * Schedules drift checks for changed files. Each session owns a bounded
 * change queue, a cooperative timer loop and its metrics; sessions share
 * no state, so several projects can be monitored from one process.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { runPool } from '../../core/async.js';
import { ScanError, SpecLoadError, describeError } from '../../core/errors.js';
import { Logger } from '../../core/logger.js';
import type { DriftSettingsInput, MonitorConfigInput } from '../../core/schemas.js';
import { assertProjectDirectory, normalizeChangePath, parseMonitorConfig } from '../../core/validation.js';
import { driftSeverityRank, toAlertSeverity, type DriftType } from '../../models/types.js';
import type { Alert, CreateAlertResult } from '../../models/alert.js';
import type { DriftItem, DriftReport, SignatureBaseline } from '../../models/drift.js';
import type {
  ChangeEvent,
  ChangeSource,
  MonitorConfig,
  MonitorMetrics,
  MonitorStatus,
  ResourceProbe
} from '../../models/monitor.js';
import type { CurrentSignatures, SignatureExtractor, Specification, SpecificationProvider } from '../../models/specification.js';
import type { Suggestion } from '../../models/suggestion.js';
import type { AlertSystem } from '../alerts/alert-system.js';
import { BaselineStore } from '../drift/baseline-store.js';
import { DriftDetector, type IDriftDetector } from '../drift/drift-detector.js';
import type { RealignmentEngine } from '../realignment/realignment-engine.js';
import { reportToAlertContext } from '../realignment/report-context.js';
import { ChangeQueue } from './change-queue.js';
import { ChokidarChangeSource } from './change-source.js';
import { ProcessResourceProbe } from './resource-probe.js';

/**
 * Optional callbacks invoked during a cycle. Errors they throw are logged.
 */
export interface MonitorHooks {
  onReport?: (report: DriftReport) => void | Promise<void>;
  onSuggestions?: (alert: Readonly<Alert>, suggestions: Suggestion[]) => void | Promise<void>;
}

export interface MonitorDependencies {
  specifications: SpecificationProvider;
  extractor: SignatureExtractor;
  alerts: AlertSystem;
  /** Defaults to a DriftDetector built from `driftSettings` and the enabled checks */
  detector?: IDriftDetector;
  driftSettings?: DriftSettingsInput;
  baselines?: BaselineStore;
  /** Generates suggestions for each newly raised alert when set */
  realignment?: RealignmentEngine;
  /** Defaults to a chokidar watcher over the project */
  changeSource?: ChangeSource;
  probe?: ResourceProbe;
  hooks?: MonitorHooks;
  clock?: () => Date;
}

export interface CycleResult {
  throttled: boolean;
  scanned: number;
  failed: number;
  reports: DriftReport[];
}

/**
 * Control surface of one monitoring session
 */
export interface MonitorHandle {
  readonly projectPath: string;
  readonly config: Readonly<MonitorConfig>;
  status(): MonitorStatus;
  /** Runs one cycle now, after any cycle already in progress */
  scanNow(): Promise<CycleResult>;
  enqueue(event: ChangeEvent): void;
  /** Finishes the current batch, flushes dispatches and stops. Idempotent. */
  stop(): Promise<void>;
}

function emptyMetrics(): MonitorMetrics {
  return {
    checksCompleted: 0,
    filesScanned: 0,
    driftDetections: 0,
    alertsRaised: 0,
    alertsSuppressed: 0,
    scanErrors: 0,
    throttledCycles: 0
  };
}

function freezeConfig(config: MonitorConfig): Readonly<MonitorConfig> {
  return Object.freeze({
    ...config,
    watchPatterns: Object.freeze([...config.watchPatterns]),
    ignorePatterns: Object.freeze([...config.ignorePatterns]),
    enabledChecks: Object.freeze([...config.enabledChecks])
  });
}

/**
 * Groups report items by drift type, keeping first-seen order
 */
function groupByType(items: readonly DriftItem[]): Map<DriftType, DriftItem[]> {
  const groups = new Map<DriftType, DriftItem[]>();
  for (const item of items) {
    const group = groups.get(item.driftType) ?? [];
    group.push(item);
    groups.set(item.driftType, group);
  }
  return groups;
}

interface ScanTarget {
  event: ChangeEvent;
  specification: Specification | undefined;
  specError?: SpecLoadError;
  baseline: SignatureBaseline | undefined;
}

class MonitorSession implements MonitorHandle {
  private readonly queue: ChangeQueue;
  private readonly detector: IDriftDetector;
  private readonly baselines: BaselineStore;
  private readonly changeSource: ChangeSource;
  private readonly probe: ResourceProbe;
  private readonly clock: () => Date;
  private readonly log = Logger.getInstance().child('monitor');

  private running = false;
  private throttled = false;
  private lastScanAt: Date | null = null;
  private lastError: string | null = null;
  private metrics = emptyMetrics();
  private timer: ReturnType<typeof setTimeout> | null = null;
  /** Tail of the cycle chain; never rejects */
  private cycle: Promise<void> = Promise.resolve();
  private cycling = false;
  private stopping: Promise<void> | null = null;

  constructor(
    readonly projectPath: string,
    readonly config: Readonly<MonitorConfig>,
    private readonly deps: MonitorDependencies
  ) {
    this.queue = new ChangeQueue(config.queueCapacity, config.overflowPolicy);
    this.detector = deps.detector ?? new DriftDetector({
      ...deps.driftSettings,
      enabledChecks: config.enabledChecks
    });
    this.baselines = deps.baselines ?? new BaselineStore();
    this.changeSource = deps.changeSource ?? new ChokidarChangeSource({
      projectRoot: projectPath,
      watchPatterns: [...config.watchPatterns],
      ignorePatterns: [...config.ignorePatterns]
    });
    this.probe = deps.probe ?? new ProcessResourceProbe();
    this.clock = deps.clock ?? (() => new Date());
  }

  async begin(): Promise<void> {
    this.running = true;
    await this.changeSource.start(event => this.enqueue(event));
    this.armTimer();
    this.log.info(`Monitoring ${this.projectPath}`, {
      intervalMs: this.config.scanIntervalMs,
      batchSize: this.config.batchSize
    });
  }

  status(): MonitorStatus {
    return {
      running: this.running,
      lastScanAt: this.lastScanAt,
      lastError: this.lastError,
      throttled: this.throttled,
      pending: this.queue.size,
      metrics: { ...this.metrics }
    };
  }

  enqueue(event: ChangeEvent): void {
    const relative = normalizeChangePath(this.projectPath, event.path);
    if (relative === null) {
      this.log.debug(`Ignoring change outside the project: ${event.path}`);
      return;
    }
    const result = this.queue.push({ ...event, path: relative });
    if (result === 'dropped-oldest' || result === 'dropped-newest') {
      this.log.warn(`Change queue full, ${result === 'dropped-oldest' ? 'dropped oldest event' : `dropped ${event.path}`}`, {
        capacity: this.config.queueCapacity
      });
    }
    if (this.running && !this.cycling && !this.throttled && this.queue.size >= this.config.batchSize) {
      this.trigger();
    }
  }

  scanNow(): Promise<CycleResult> {
    const next = this.cycle.then(() => this.runCycle());
    this.cycle = next.then(
      () => undefined,
      (error: unknown) => {
        this.lastError = describeError(error);
      }
    );
    return next;
  }

  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.changeSource.stop();
    await this.cycle;
    await this.deps.alerts.flush();
    await this.saveBaselines();
    this.log.info(`Stopped monitoring ${this.projectPath}`, { ...this.metrics });
  }

  private armTimer(): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.trigger();
    }, this.config.scanIntervalMs);
  }

  /**
   * Starts a cycle from the loop; the timer is re-armed once it settles
   */
  private trigger(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    void this.scanNow()
      .then(
        result => !result.throttled,
        (error: unknown) => {
          this.log.error(`Monitoring cycle failed: ${describeError(error)}`);
          return false;
        }
      )
      .then(progressed => {
        if (!this.running) return;
        if (progressed && this.queue.size >= this.config.batchSize) {
          this.trigger();
        } else if (!this.timer) {
          this.armTimer();
        }
      });
  }

  private async runCycle(): Promise<CycleResult> {
    this.cycling = true;
    try {
      return await this.cycleOnce();
    } finally {
      this.cycling = false;
      await this.writeMetrics();
    }
  }

  private async cycleOnce(): Promise<CycleResult> {
    const usage = this.probe.sample();
    if (usage.cpuPercent > this.config.maxCpuPercent || usage.memoryMb > this.config.maxMemoryMb) {
      this.throttled = true;
      this.metrics.throttledCycles++;
      this.log.warn('Resource budget exceeded, deferring scan', {
        cpuPercent: usage.cpuPercent,
        memoryMb: usage.memoryMb,
        pending: this.queue.size
      });
      return { throttled: true, scanned: 0, failed: 0, reports: [] };
    }
    this.throttled = false;

    const batch = this.queue.drain(this.config.batchSize);
    const targets = await Promise.all(batch.map(event => this.snapshot(event)));

    const results = await runPool(targets, this.config.workerConcurrency, target => this.scan(target));

    const reports: DriftReport[] = [];
    let failed = 0;
    for (let i = 0; i < results.length; i++) {
      const result = results[i];
      const target = targets[i];
      if (!result.ok) {
        failed++;
        await this.recordFailure(target.event, result.error);
        continue;
      }
      this.metrics.filesScanned++;
      reports.push(result.value);
      if (!(await this.handleReport(result.value))) {
        this.queue.requeue(target.event);
      }
    }

    await this.saveBaselines();
    this.lastScanAt = this.clock();
    this.metrics.checksCompleted++;
    if (batch.length > 0) {
      this.log.debug(`Scanned ${batch.length} file(s)`, { failed, pending: this.queue.size });
    }
    return { throttled: false, scanned: reports.length, failed, reports };
  }

  private async snapshot(event: ChangeEvent): Promise<ScanTarget> {
    const baseline = this.baselines.get(event.path);
    try {
      const specification = await this.deps.specifications.getSpecification(event.path);
      return { event, specification, baseline };
    } catch (error) {
      const specError = error instanceof SpecLoadError ? error : new SpecLoadError(event.path, describeError(error));
      return { event, specification: undefined, specError, baseline };
    }
  }

  private async scan(target: ScanTarget): Promise<DriftReport> {
    const { event, specification, baseline } = target;
    if (target.specError) {
      this.log.warn(target.specError.message);
      return this.detector.unchecked(event.path, 'SPEC_LOAD_FAILED', target.specError.message);
    }

    let signatures: CurrentSignatures;
    try {
      signatures = event.kind === 'deleted' ? {} : await this.deps.extractor.extract(event.path);
    } catch (error) {
      throw new ScanError(event.path, error);
    }

    const report = this.detector.check(event.path, signatures, specification, baseline);
    if (specification) {
      this.baselines.observe(event.path, signatures, specification);
    }
    return report;
  }

  private async recordFailure(event: ChangeEvent, error: unknown): Promise<void> {
    const scanError = error instanceof ScanError ? error : new ScanError(event.path, error);
    this.metrics.scanErrors++;
    this.lastError = scanError.message;
    this.queue.requeue(event);
    this.log.warn(`${scanError.message}; retrying next cycle`);

    try {
      await this.deps.alerts.createAlert({
        type: 'scan_error',
        severity: 'WARNING',
        title: `Scan failed for ${event.path}`,
        message: scanError.message,
        filePath: event.path,
        specReference: null
      });
    } catch (alertError) {
      this.log.error(`Cannot record scan failure: ${describeError(alertError)}`);
    }
  }

  /**
   * Raises alerts for a report
   *
   * @returns false when an alert could not be recorded and the file must be scanned again
   */
  private async handleReport(report: DriftReport): Promise<boolean> {
    await this.runHook('onReport', () => this.deps.hooks?.onReport?.(report));
    if (report.items.length === 0) return true;

    this.metrics.driftDetections += report.items.length;
    let recorded = true;

    for (const [driftType, items] of groupByType(report.items)) {
      const worst = items.reduce((a, b) => (driftSeverityRank(b.severity) > driftSeverityRank(a.severity) ? b : a));
      let result: CreateAlertResult;
      try {
        result = await this.deps.alerts.createAlert({
          type: 'drift',
          severity: toAlertSeverity(worst.severity),
          title: `${driftType} in ${report.filePath}`,
          message: items.map(item => item.description).join('\n'),
          filePath: report.filePath,
          specReference: report.specReference,
          driftType,
          context: reportToAlertContext(report, items)
        });
      } catch (error) {
        recorded = false;
        this.lastError = `Cannot raise ${driftType} alert for ${report.filePath}: ${describeError(error)}`;
        this.log.error(`${this.lastError}; retrying next cycle`);
        continue;
      }

      if (result.status === 'suppressed') {
        this.metrics.alertsSuppressed++;
        continue;
      }
      this.metrics.alertsRaised++;

      const engine = this.deps.realignment;
      if (result.status === 'created' && engine) {
        await this.runHook('onSuggestions', async () => {
          const suggestions = await engine.suggestForAlert(result.alert);
          await this.deps.hooks?.onSuggestions?.(result.alert, suggestions);
        });
      }
    }
    return recorded;
  }

  private async runHook(name: string, hook: () => void | Promise<void>): Promise<void> {
    try {
      await hook();
    } catch (error) {
      this.log.warn(`${name} hook failed: ${describeError(error)}`);
    }
  }

  private async saveBaselines(): Promise<void> {
    try {
      await this.baselines.save();
    } catch (error) {
      this.lastError = `Cannot save baselines: ${describeError(error)}`;
      this.log.error(this.lastError);
    }
  }

  private async writeMetrics(): Promise<void> {
    if (!this.config.metricsFile) return;
    const target = path.resolve(this.projectPath, this.config.metricsFile);
    const snapshot = {
      ...this.metrics,
      pending: this.queue.size,
      throttled: this.throttled,
      lastScanAt: this.lastScanAt?.toISOString() ?? null,
      lastError: this.lastError
    };
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, JSON.stringify(snapshot, null, 2), 'utf-8');
    } catch (error) {
      this.log.warn(`Cannot write metrics to ${target}: ${describeError(error)}`);
    }
  }
}

/**
 * Continuous Monitor Implementation
 */
export class ContinuousMonitor {
  constructor(private readonly deps: MonitorDependencies) {}

  /**
   * Validates the configuration and starts a session
   *
   * @throws ConfigError when the configuration or project path is invalid
   */
  async start(projectPath: string, config: MonitorConfigInput = {}): Promise<MonitorHandle> {
    const parsed = parseMonitorConfig(config);
    const root = await assertProjectDirectory(projectPath);

    const session = new MonitorSession(root, freezeConfig(parsed), this.deps);
    await session.begin();
    return session;
  }
}

export function stop(handle: MonitorHandle): Promise<void> {
  return handle.stop();
}

export function status(handle: MonitorHandle): MonitorStatus {
  return handle.status();
}
