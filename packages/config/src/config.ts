import { z } from 'zod';

// ============================================================================
// Helpers
// ============================================================================

const optionalUrlSchema = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.url().optional());

const durationMsSchema = (min: number, max: number, fallback: number) =>
  z.number().int().min(min).max(max).default(fallback);

// Host:port, no scheme. Pods are addressed by IP so hostnames stay permissive.
const endpointSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9.\-[\]:]+:\d{1,5}$/, 'Endpoint must look like host:port');

// ============================================================================
// CONFIG SCHEMA (config.json)
// ============================================================================

const telemetryFileSchema = z
  .object({
    logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
    traceErrors: z.boolean().default(false),
  })
  .strict();

export const telemetrySchema = telemetryFileSchema.extend({
  notifyWebhookUrl: optionalUrlSchema,
});

export type TelemetryConfig = z.infer<typeof telemetrySchema>;

const monitorFileSchema = z
  .object({
    host: z.string().trim().min(1).default('0.0.0.0'),
    port: z.number().int().min(1).max(65_535).default(9000),
    windowCapacity: z.number().int().min(1).max(1_000_000).default(1000),
  })
  .strict();

export const monitorSchema = monitorFileSchema.extend({
  url: z.url().default('http://monitor:9000'),
});

export type MonitorConfig = z.infer<typeof monitorSchema>;

export const dispatcherSchema = z
  .object({
    host: z.string().trim().min(1).default('0.0.0.0'),
    port: z.number().int().min(1).max(65_535).default(8080),
    selection: z.enum(['random', 'round-robin']).default('random'),
    backendPath: z.string().startsWith('/').default('/predict'),
    requestTimeoutMs: durationMsSchema(50, 300_000, 10_000),
    reportTimeoutMs: durationMsSchema(10, 60_000, 1000),
    poolRefreshIntervalMs: durationMsSchema(100, 600_000, 5000),
    bodyLimitBytes: z.number().int().min(1024).default(25 * 1024 * 1024),
  })
  .strict();

export type DispatcherConfig = z.infer<typeof dispatcherSchema>;

export const discoverySchema = z
  .object({
    mode: z.enum(['kubernetes', 'static']).default('kubernetes'),
    namespace: z.string().trim().min(1).default('default'),
    deploymentName: z.string().trim().min(1).default('image-classifier'),
    labelSelector: z.string().trim().min(1).default('app=image-classifier'),
    backendPort: z.number().int().min(1).max(65_535).default(5000),
    staticEndpoints: z.array(endpointSchema).default([]),
    timeoutMs: durationMsSchema(10, 120_000, 5000),
  })
  .strict();

export type DiscoveryConfig = z.infer<typeof discoverySchema>;

export const autoscalerSchema = z
  .object({
    pollIntervalMs: durationMsSchema(100, 3_600_000, 10_000),
    latencyCeilingMs: z.number().positive().default(330),
    scaleUpFactor: z.number().gt(1, 'scaleUpFactor must be greater than 1').max(10).default(1.2),
    scaleDownStep: z.number().int().min(1).default(1),
    minReplicas: z.number().int().min(1, 'minReplicas must be at least 1').default(1),
    maxReplicas: z.number().int().min(1).default(8),
    minSamples: z.number().int().min(1).default(20),
    callTimeoutMs: durationMsSchema(10, 120_000, 5000),
  })
  .strict();

export type AutoscalerConfig = z.infer<typeof autoscalerSchema>;

// ============================================================================
// MAIN CONFIG SCHEMAS
// ============================================================================

export const configFileSchema = z
  .object({
    $schema: z.string().optional(),
    $comment: z.string().optional(),
    telemetry: telemetryFileSchema.default({ logLevel: 'info', traceErrors: false }),
    monitor: monitorFileSchema.default({ host: '0.0.0.0', port: 9000, windowCapacity: 1000 }),
    dispatcher: dispatcherSchema.default({
      host: '0.0.0.0',
      port: 8080,
      selection: 'random',
      backendPath: '/predict',
      requestTimeoutMs: 10_000,
      reportTimeoutMs: 1000,
      poolRefreshIntervalMs: 5000,
      bodyLimitBytes: 25 * 1024 * 1024,
    }),
    discovery: discoverySchema.default({
      mode: 'kubernetes',
      namespace: 'default',
      deploymentName: 'image-classifier',
      labelSelector: 'app=image-classifier',
      backendPort: 5000,
      staticEndpoints: [],
      timeoutMs: 5000,
    }),
    autoscaler: autoscalerSchema.default({
      pollIntervalMs: 10_000,
      latencyCeilingMs: 330,
      scaleUpFactor: 1.2,
      scaleDownStep: 1,
      minReplicas: 1,
      maxReplicas: 8,
      minSamples: 20,
      callTimeoutMs: 5000,
    }),
  })
  .strict();

export type ConfigFileSchema = z.infer<typeof configFileSchema>;

export const configSchema = configFileSchema
  .extend({
    telemetry: telemetrySchema,
    monitor: monitorSchema,
  })
  .strict()
  .superRefine((config, ctx) => {
    const { minReplicas, maxReplicas } = config.autoscaler;
    if (minReplicas > maxReplicas) {
      ctx.addIssue({
        code: 'custom',
        path: ['autoscaler', 'minReplicas'],
        message: `minReplicas (${minReplicas}) must not exceed maxReplicas (${maxReplicas})`,
      });
    }
    if (config.discovery.mode === 'static' && config.discovery.staticEndpoints.length === 0) {
      ctx.addIssue({
        code: 'custom',
        path: ['discovery', 'staticEndpoints'],
        message: 'Static discovery needs at least one endpoint',
      });
    }
  });

export type ConfigSchema = z.infer<typeof configSchema>;
