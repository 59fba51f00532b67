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

const optionalStringSchema = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().optional());

// ============================================================================
// ENV SCHEMA (.env file)
// ============================================================================

export const envSchema = z
  .object({
    MONITOR_URL: optionalUrlSchema,
    NOTIFY_WEBHOOK_URL: optionalUrlSchema,
    // Set by the kubelet inside a pod; selects in-cluster credentials.
    KUBERNETES_SERVICE_HOST: optionalStringSchema,
  })
  .strict();

export type EnvSchema = z.infer<typeof envSchema>;
