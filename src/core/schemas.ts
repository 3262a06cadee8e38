// Zod schemas for configuration, specifications and persisted data

import { z } from 'zod';
import {
  ALERT_SEVERITIES,
  ALERT_TYPES,
  DRIFT_SEVERITIES,
  DRIFT_TYPES,
  SUGGESTION_CATEGORIES
} from '../models/types.js';
import type { JsonValue } from '../models/alert.js';

export const DriftTypeSchema = z.enum(DRIFT_TYPES);
export const DriftSeveritySchema = z.enum(DRIFT_SEVERITIES);
export const AlertSeveritySchema = z.enum(ALERT_SEVERITIES);
export const AlertTypeSchema = z.enum(ALERT_TYPES);
export const SuggestionCategorySchema = z.enum(SUGGESTION_CATEGORIES);

export const DEFAULT_IGNORE_PATTERNS = [
  '**/node_modules/**',
  '**/.git/**',
  '**/dist/**',
  '**/coverage/**',
  '.driftwatch/**'
];

/**
 * Monitoring session configuration
 */
export const MonitorConfigSchema = z.object({
  scanIntervalMs: z.number().int().positive('scanIntervalMs must be positive').default(30000),
  watchPatterns: z.array(z.string().min(1)).min(1, 'At least one watch pattern is required').default(['**/*']),
  ignorePatterns: z.array(z.string().min(1)).default(DEFAULT_IGNORE_PATTERNS),
  maxCpuPercent: z.number().positive().default(80),
  maxMemoryMb: z.number().positive().default(512),
  batchSize: z.number().int().positive('batchSize must be positive').default(25),
  enabledChecks: z.array(DriftTypeSchema).default([...DRIFT_TYPES]),
  queueCapacity: z.number().int().positive().default(1000),
  overflowPolicy: z.enum(['drop-oldest', 'drop-newest']).default('drop-oldest'),
  workerConcurrency: z.number().int().min(1).max(32).default(4),
  metricsFile: z.string().min(1).optional()
});

export type MonitorConfigInput = z.input<typeof MonitorConfigSchema>;

/**
 * Drift scoring configuration
 */
export const DriftSettingsSchema = z.object({
  minConfidence: z.number().min(0).max(1).default(0.5),
  weights: z.record(DriftTypeSchema, z.number().min(0).max(1)).default({})
});

export const AlertRuleSchema = z.object({
  name: z.string().min(1),
  types: z.array(AlertTypeSchema).optional(),
  minSeverity: AlertSeveritySchema.default('INFO'),
  channels: z.array(z.string().min(1)).min(1, 'A rule must name at least one channel'),
  suppressionWindowSeconds: z.number().nonnegative().default(300)
});

export const ChannelsConfigSchema = z.object({
  log: z.object({}).optional(),
  console: z.object({}).optional(),
  file: z.object({ path: z.string().min(1) }).optional(),
  webhook: z.object({
    url: z.string().url(),
    headers: z.record(z.string()).default({})
  }).optional(),
  email: z.object({
    from: z.string().min(1),
    to: z.array(z.string().email()).min(1)
  }).optional()
});

export const AlertSettingsSchema = z.object({
  storePath: z.string().min(1).default('.driftwatch/alerts.json'),
  defaultSuppressionWindowSeconds: z.number().nonnegative().default(300),
  channelTimeoutMs: z.number().int().positive().default(5000),
  rateLimits: z.object({
    perMinute: z.number().int().positive().default(10),
    perHour: z.number().int().positive().default(100),
    perDay: z.number().int().positive().default(500)
  }).default({}),
  rules: z.array(AlertRuleSchema).default([
    { name: 'default', minSeverity: 'INFO', channels: ['log'], suppressionWindowSeconds: 300 }
  ]),
  channels: ChannelsConfigSchema.default({ log: {} })
});

export const RealignmentSettingsSchema = z.object({
  enrichmentTimeoutMs: z.number().int().positive().default(10000),
  cacheTtlMs: z.number().int().nonnegative().default(300000),
  cacheMaxEntries: z.number().int().positive().default(100)
});

/**
 * Full `.driftwatch/config.yaml` schema
 */
export const DriftwatchConfigSchema = z.object({
  monitor: MonitorConfigSchema.default({}),
  drift: DriftSettingsSchema.default({}),
  alerts: AlertSettingsSchema.default({}),
  realignment: RealignmentSettingsSchema.default({}),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    timestamps: z.boolean().default(false)
  }).default({}),
  specifications: z.object({
    directory: z.string().min(1).default('.driftwatch/specs')
  }).default({}),
  signatures: z.object({
    indexFile: z.string().min(1).default('.driftwatch/signatures.json')
  }).default({})
});

export type DriftwatchConfig = z.infer<typeof DriftwatchConfigSchema>;
export type AlertSettings = z.infer<typeof AlertSettingsSchema>;
export type AlertSettingsInput = z.input<typeof AlertSettingsSchema>;
export type ChannelsConfig = z.infer<typeof ChannelsConfigSchema>;
export type RealignmentSettings = z.infer<typeof RealignmentSettingsSchema>;
export type RealignmentSettingsInput = z.input<typeof RealignmentSettingsSchema>;
export type DriftSettingsInput = z.input<typeof DriftSettingsSchema>;

/**
 * Specification element
 */
export const ExpectedElementSchema = z.object({
  id: z.string().min(1),
  signature: z.string(),
  behaviorHash: z.string().min(1).optional(),
  description: z.string().optional(),
  isBreakingIfRemoved: z.boolean().default(false),
  kind: z.enum(['symbol', 'dependency']).default('symbol')
});

export const SpecificationSchema = z.object({
  name: z.string().min(1),
  sourceRef: z.string().min(1),
  revision: z.string().min(1).optional(),
  elements: z.array(ExpectedElementSchema)
});

/**
 * Normalized specification file: each entry covers the paths matching its patterns
 */
export const SpecificationFileSchema = z.object({
  specifications: z.array(
    SpecificationSchema.extend({
      sourceRef: z.string().min(1).optional(),
      patterns: z.array(z.string().min(1)).min(1)
    })
  )
});

export const ObservedSignatureSchema = z.object({
  signature: z.string(),
  behaviorHash: z.string().min(1).optional(),
  line: z.number().int().positive().optional()
});

export const CurrentSignaturesSchema = z.record(ObservedSignatureSchema);

/**
 * Index file maintained by an external analyzer: path -> signatures
 */
export const SignatureIndexSchema = z.object({
  files: z.record(CurrentSignaturesSchema)
});

export const DriftItemSchema = z.object({
  driftType: DriftTypeSchema,
  severity: DriftSeveritySchema,
  description: z.string(),
  confidence: z.number().min(0).max(1),
  elementId: z.string().min(1),
  expected: z.string().optional(),
  actual: z.string().optional(),
  lineNumber: z.number().int().positive().optional()
});

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema)
  ])
);

export const DeliveryRecordSchema = z.object({
  success: z.boolean(),
  error: z.string().optional(),
  attemptedAt: z.string(),
  durationMs: z.number().nonnegative(),
  attempts: z.number().int().positive()
});

export const StoredAlertSchema = z.object({
  id: z.string().regex(/^ALERT-\d{6,}$/, 'Invalid alert ID format'),
  createdAt: z.string(),
  type: AlertTypeSchema,
  severity: AlertSeveritySchema,
  title: z.string().min(1),
  message: z.string(),
  context: z.record(JsonValueSchema),
  fingerprint: z.string().min(1),
  occurrenceCount: z.number().int().positive(),
  lastSeenAt: z.string(),
  lastDeliveredAt: z.string().nullable(),
  resolved: z.boolean(),
  resolvedAt: z.string().nullable(),
  resolutionNote: z.string().nullable(),
  deliveryLog: z.record(DeliveryRecordSchema)
});

export const AlertStoreFileSchema = z.object({
  version: z.literal(1),
  nextSequence: z.number().int().positive(),
  alerts: z.array(StoredAlertSchema)
});

export type AlertStoreFile = z.infer<typeof AlertStoreFileSchema>;

/**
 * Suggestion returned by an enricher
 */
export const SuggestionSchema = z.object({
  category: SuggestionCategorySchema,
  title: z.string().min(1),
  description: z.string(),
  priority: z.number().int().min(1).max(5),
  effort: z.number().int().min(1).max(5),
  confidence: z.number().min(0).max(1),
  driftType: DriftTypeSchema,
  filePath: z.string().optional(),
  lineNumber: z.number().int().positive().optional(),
  codeSnippet: z.string().optional(),
  steps: z.array(z.string()).default([])
});

/**
 * Flattens zod issues into `path: message` strings
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}
