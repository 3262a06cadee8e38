/**
 * Alert System
 *
 * Turns drift and monitor events into persisted, de-duplicated alerts and
 * fans them out to delivery channels.
 *
 * Occurrences of an open alert inside its suppression window only bump
 * `occurrenceCount`. Past the window the same alert is delivered again.
 * Every channel runs concurrently under its own time budget, so one slow
 * or failing channel never delays or fails another.
 */

import { withTimeout } from '../../core/async.js';
import { ChannelDeliveryError, ConfigError, NotFoundError, describeError } from '../../core/errors.js';
import { computeFingerprint } from '../../core/fingerprint.js';
import { Logger } from '../../core/logger.js';
import {
  AlertSettingsSchema,
  formatZodIssues,
  type AlertSettings,
  type AlertSettingsInput
} from '../../core/schemas.js';
import { validateAlertId } from '../../core/validation.js';
import { alertSeverityRank, type AlertSeverity, type AlertType } from '../../models/types.js';
import type {
  Alert,
  AlertChannel,
  AlertEvent,
  AlertFilters,
  AlertRule,
  AlertSummary,
  CreateAlertResult,
  DeliveryRecord
} from '../../models/alert.js';
import { AlertStore } from '../storage/alert-store.js';
import { createBuiltinChannels, type MailTransport } from './channels/index.js';
import { RateLimiter } from './rate-limiter.js';

/**
 * Result of one dispatch
 */
export interface DispatchOutcome {
  alertId: string;
  /** Delivery was skipped because the alert type hit a rate limit */
  rateLimited: boolean;
  deliveries: Record<string, DeliveryRecord>;
}

export type AlertListener = (alert: Readonly<Alert>, outcome: DispatchOutcome) => void | Promise<void>;

export interface AlertSystemOptions {
  settings?: AlertSettingsInput;
  /** Defaults to an in-memory store */
  store?: AlertStore;
  /** Extra channels; a channel named like a built-in replaces it */
  channels?: AlertChannel[];
  /** Base for relative paths in channel settings */
  projectRoot?: string;
  mailTransport?: MailTransport;
  clock?: () => Date;
}

const HOUR_MS = 3_600_000;

function hourLabel(date: Date): string {
  return `${date.toISOString().slice(0, 13).replace('T', ' ')}:00`;
}

/**
 * Alert System Implementation
 */
export class AlertSystem {
  private readonly settings: AlertSettings;
  private readonly store: AlertStore;
  private readonly channels = new Map<string, AlertChannel>();
  private readonly listeners = new Map<AlertType | '*', Set<AlertListener>>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly rateLimiter: RateLimiter;
  private readonly clock: () => Date;
  private readonly log = Logger.getInstance().child('alerts');

  constructor(options: AlertSystemOptions = {}) {
    const parsed = AlertSettingsSchema.safeParse(options.settings ?? {});
    if (!parsed.success) {
      const issues = formatZodIssues(parsed.error);
      throw new ConfigError(`Invalid alert settings: ${issues.join('; ')}`, issues);
    }

    this.settings = parsed.data;
    this.store = options.store ?? new AlertStore();
    this.clock = options.clock ?? (() => new Date());
    this.rateLimiter = new RateLimiter(this.settings.rateLimits, () => this.clock().getTime());

    const builtins = createBuiltinChannels(this.settings.channels, {
      projectRoot: options.projectRoot,
      mailTransport: options.mailTransport
    });
    for (const channel of [...builtins, ...(options.channels ?? [])]) {
      this.channels.set(channel.name, channel);
    }

    for (const rule of this.settings.rules) {
      for (const name of rule.channels) {
        if (!this.channels.has(name)) {
          this.log.warn(`Rule "${rule.name}" routes to unknown channel "${name}"`);
        }
      }
    }
  }

  /**
   * Loads persisted alerts
   */
  async initialize(): Promise<void> {
    await this.store.load();
    this.log.debug('Alert store loaded', { alerts: this.store.size() });
  }

  /**
   * Subscribes to delivered alerts of one type, or of every type with `'*'`
   *
   * @returns a function that removes the listener
   */
  onAlert(type: AlertType | '*', listener: AlertListener): () => void {
    const set = this.listeners.get(type) ?? new Set<AlertListener>();
    set.add(listener);
    this.listeners.set(type, set);
    return () => {
      set.delete(listener);
    };
  }

  /**
   * Records an occurrence and schedules delivery unless it is suppressed
   */
  async createAlert(event: AlertEvent): Promise<CreateAlertResult> {
    const fingerprint = computeFingerprint({
      type: event.type,
      filePath: event.filePath,
      specReference: event.specReference,
      driftType: event.driftType
    });

    const result = await this.store.exclusive(async (): Promise<CreateAlertResult> => {
      const now = this.clock();
      const nowIso = now.toISOString();
      const context = {
        ...event.context,
        filePath: event.filePath,
        specReference: event.specReference,
        ...(event.driftType ? { driftType: event.driftType } : {})
      };
      const existing = this.store.findOpenByFingerprint(fingerprint);

      if (existing) {
        const windowMs = this.suppressionWindowSeconds(existing.type, existing.severity) * 1000;
        const reference = Date.parse(existing.lastDeliveredAt ?? existing.createdAt);
        const suppressed = now.getTime() - reference < windowMs;
        const severity = alertSeverityRank(event.severity) > alertSeverityRank(existing.severity)
          ? event.severity
          : existing.severity;

        const updated: Alert = {
          ...existing,
          severity,
          message: event.message,
          context,
          occurrenceCount: existing.occurrenceCount + 1,
          lastSeenAt: nowIso,
          lastDeliveredAt: suppressed ? existing.lastDeliveredAt : nowIso
        };
        await this.store.put(updated);
        return { status: suppressed ? 'suppressed' : 'redelivered', alert: updated };
      }

      const alert: Alert = {
        id: this.store.allocateId(),
        createdAt: nowIso,
        type: event.type,
        severity: event.severity,
        title: event.title,
        message: event.message,
        context,
        fingerprint,
        occurrenceCount: 1,
        lastSeenAt: nowIso,
        lastDeliveredAt: null,
        resolved: false,
        resolvedAt: null,
        resolutionNote: null,
        deliveryLog: {}
      };
      await this.store.put(alert);
      return { status: 'created', alert };
    });

    if (result.status === 'suppressed') {
      this.log.debug(`Suppressed repeat of ${result.alert.id}`, {
        occurrences: result.alert.occurrenceCount
      });
    } else {
      this.schedule(result.alert);
    }
    return result;
  }

  /**
   * Delivers an alert to every channel its rules subscribe. Never throws.
   */
  async dispatch(alert: Readonly<Alert>): Promise<DispatchOutcome> {
    const outcome: DispatchOutcome = { alertId: alert.id, rateLimited: false, deliveries: {} };
    const targets = this.channelsFor(alert.type, alert.severity);
    if (targets.length === 0) {
      this.log.debug(`No rule routes ${alert.id}`);
      return outcome;
    }

    if (!this.rateLimiter.allow(alert.type)) {
      this.log.warn(`Rate limit reached for ${alert.type} alerts; ${alert.id} not delivered`);
      outcome.rateLimited = true;
      return outcome;
    }

    const attemptedAt = this.clock().toISOString();
    const results = await Promise.all(targets.map(name => this.deliver(name, alert)));
    for (const [index, name] of targets.entries()) {
      const previous = alert.deliveryLog[name];
      outcome.deliveries[name] = {
        ...results[index],
        attemptedAt,
        attempts: (previous?.attempts ?? 0) + 1
      };
    }

    let stored: Alert = { ...alert, deliveryLog: { ...alert.deliveryLog, ...outcome.deliveries } };
    try {
      stored = await this.store.exclusive(async () => {
        const current = this.store.get(alert.id) ?? stored;
        const next: Alert = {
          ...current,
          lastDeliveredAt: attemptedAt,
          deliveryLog: { ...current.deliveryLog, ...outcome.deliveries }
        };
        await this.store.put(next);
        return next;
      });
    } catch (error) {
      this.log.error(`Failed to record delivery of ${alert.id}: ${describeError(error)}`);
    }

    await this.notify(stored, outcome);
    return outcome;
  }

  /**
   * Marks an alert resolved. Resolving twice keeps the first resolution.
   *
   * @throws NotFoundError for an unknown id
   */
  async resolve(id: string, note?: string): Promise<Alert> {
    const alertId = validateAlertId(id);
    return this.store.exclusive(async () => {
      const alert = this.store.get(alertId);
      if (!alert) {
        throw new NotFoundError('Alert', alertId);
      }
      if (alert.resolved) {
        return alert;
      }

      const resolved: Alert = {
        ...alert,
        resolved: true,
        resolvedAt: this.clock().toISOString(),
        resolutionNote: note ?? null
      };
      await this.store.put(resolved);
      this.log.info(`Resolved ${alertId}`);
      return resolved;
    });
  }

  get(id: string): Alert | null {
    return this.store.get(validateAlertId(id));
  }

  list(filters: AlertFilters = {}): Alert[] {
    return this.store.list(filters);
  }

  /**
   * Counts of alerts seen in the last `hours`, with an hourly timeline
   * starting at the most recent hour
   */
  summary(hours = 24): AlertSummary {
    const now = this.clock().getTime();
    const recent = this.store.list({ since: new Date(now - hours * HOUR_MS) });

    const summary: AlertSummary = {
      total: recent.length,
      open: 0,
      resolved: 0,
      totalOccurrences: 0,
      bySeverity: { INFO: 0, WARNING: 0, ERROR: 0, CRITICAL: 0 },
      byType: { drift: 0, scan_error: 0, monitor: 0 },
      failedDeliveries: {},
      timeline: []
    };

    for (const alert of recent) {
      if (alert.resolved) {
        summary.resolved++;
      } else {
        summary.open++;
      }
      summary.totalOccurrences += alert.occurrenceCount;
      summary.bySeverity[alert.severity]++;
      summary.byType[alert.type]++;
      for (const [channel, record] of Object.entries(alert.deliveryLog)) {
        if (!record.success) {
          summary.failedDeliveries[channel] = (summary.failedDeliveries[channel] ?? 0) + 1;
        }
      }
    }

    for (let hour = 0; hour < hours; hour++) {
      const end = now - hour * HOUR_MS;
      const start = end - HOUR_MS;
      summary.timeline.push({
        hour: hourLabel(new Date(start)),
        count: recent.filter(alert => {
          const seen = Date.parse(alert.lastSeenAt);
          return seen > start && seen <= end;
        }).length
      });
    }

    return summary;
  }

  /**
   * Waits for every scheduled dispatch and store write
   */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
    await this.store.idle();
  }

  pendingDispatches(): number {
    return this.inFlight.size;
  }

  private schedule(alert: Alert): void {
    const task: Promise<void> = this.dispatch(alert).then(() => {
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);
  }

  private async deliver(name: string, alert: Readonly<Alert>): Promise<{ success: boolean; error?: string; durationMs: number }> {
    const started = Date.now();
    const channel = this.channels.get(name);
    if (!channel) {
      return { success: false, error: `Unknown channel: ${name}`, durationMs: 0 };
    }

    try {
      const result = await withTimeout(channel.send(alert), this.settings.channelTimeoutMs, `Channel ${name}`);
      if (!result.success) {
        this.logDeliveryFailure(alert, new ChannelDeliveryError(name, result.error ?? 'unknown error'));
      }
      return {
        success: result.success,
        ...(result.error !== undefined ? { error: result.error } : {}),
        durationMs: Date.now() - started
      };
    } catch (error) {
      this.logDeliveryFailure(alert, new ChannelDeliveryError(name, describeError(error)));
      return { success: false, error: describeError(error), durationMs: Date.now() - started };
    }
  }

  private logDeliveryFailure(alert: Readonly<Alert>, failure: ChannelDeliveryError): void {
    this.log.warn(failure.message, { alertId: alert.id, channel: failure.channel });
  }

  private async notify(alert: Readonly<Alert>, outcome: DispatchOutcome): Promise<void> {
    const listeners = [
      ...(this.listeners.get(alert.type) ?? []),
      ...(this.listeners.get('*') ?? [])
    ];
    for (const listener of listeners) {
      try {
        await listener(alert, outcome);
      } catch (error) {
        this.log.error(`Alert listener failed for ${alert.id}: ${describeError(error)}`);
      }
    }
  }

  private matchingRules(type: AlertType, severity: AlertSeverity): AlertRule[] {
    const rank = alertSeverityRank(severity);
    return this.settings.rules.filter(rule =>
      (!rule.types || rule.types.includes(type)) && rank >= alertSeverityRank(rule.minSeverity)
    );
  }

  private channelsFor(type: AlertType, severity: AlertSeverity): string[] {
    const names = new Set<string>();
    for (const rule of this.matchingRules(type, severity)) {
      for (const name of rule.channels) {
        names.add(name);
      }
    }
    return [...names];
  }

  private suppressionWindowSeconds(type: AlertType, severity: AlertSeverity): number {
    const rules = this.matchingRules(type, severity);
    if (rules.length === 0) {
      return this.settings.defaultSuppressionWindowSeconds;
    }
    return Math.max(...rules.map(rule => rule.suppressionWindowSeconds));
  }
}
