import { isIP } from 'node:net';
import { z } from 'zod';

// ============================================================================
// Helpers
// ============================================================================

const portSchema = z.number().int().min(1).max(65_535);

const httpUrlSchema = z.url({ protocol: /^https?$/ });

/** Empty means "derive from the candidate address". */
const cdnUrlSchema = z
  .string()
  .trim()
  .superRefine((value, ctx) => {
    if (value.length === 0) {
      return;
    }
    let url: URL;
    try {
      url = new URL(value);
    } catch {
      ctx.addIssue({ code: 'custom', message: 'cdnUrl must be empty or a valid URL' });
      return;
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      ctx.addIssue({ code: 'custom', message: 'cdnUrl must use http or https' });
    }
    if (isIP(url.hostname.replace(/^\[|\]$/g, '')) !== 0) {
      ctx.addIssue({ code: 'custom', message: 'cdnUrl host must be a domain name, not an address' });
    }
  })
  .default('');

const patternSchema = z
  .string()
  .min(1)
  .refine(
    (value) => {
      try {
        new RegExp(value);
        return true;
      } catch {
        return false;
      }
    },
    { message: 'Invalid regular expression' },
  );

// ============================================================================
// CONFIG SCHEMA (scanner.json)
// ============================================================================

export const telemetrySchema = z
  .object({
    logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
    traceErrors: z.boolean().default(false),
  })
  .strict();

export type TelemetryConfig = z.infer<typeof telemetrySchema>;

export const probeSchema = z
  .object({
    portBase: portSchema.default(20_000),
    maxConnectionCount: z.number().int().min(1).max(4_096).default(64),
    originUrl: httpUrlSchema,
    cdnUrl: cdnUrlSchema,
    listenIp: z.union([z.ipv4(), z.ipv6()]).default('127.0.0.1'),
    maxRttMs: z.number().int().min(1).max(60_000).default(1_000),
    originResponseBody: z.string().default(''),
    cdnResponseBody: z.string().default(''),
    originViaTunnel: z.boolean().default(true),
  })
  .strict()
  .refine((probe) => probe.portBase + probe.maxConnectionCount - 1 <= 65_535, {
    message: 'portBase + maxConnectionCount - 1 must not exceed 65535',
    path: ['maxConnectionCount'],
  });

export type ProbeConfig = z.infer<typeof probeSchema>;

export const scanSchema = z
  .object({
    maxRangeLength: z.number().int().min(1).max(Number.MAX_SAFE_INTEGER).default(256),
    topResults: z.number().int().min(0).max(10_000).default(10),
  })
  .strict();

export type ScanConfig = z.infer<typeof scanSchema>;

export const tunnelSchema = z
  .object({
    binaryPath: z.string().trim().min(1).default('./sing-box'),
    args: z.array(z.string()).default(['run', '-c', '{config}']),
    readyTimeoutMs: z.number().int().min(100).max(120_000).default(5_000),
    stopTimeoutMs: z.number().int().min(100).max(120_000).default(3_000),
    errorPattern: patternSchema.default('FATAL|ERROR'),
  })
  .strict();

export type TunnelConfig = z.infer<typeof tunnelSchema>;

// ============================================================================
// MAIN CONFIG SCHEMA
// ============================================================================

export const configSchema = z
  .object({
    $schema: z.string().optional(),
    $comment: z.string().optional(),
    telemetry: telemetrySchema.prefault({}),
    probe: probeSchema,
    scan: scanSchema.prefault({}),
    tunnel: tunnelSchema.prefault({}),
  })
  .strict();

export type ConfigInput = z.input<typeof configSchema>;
export type ConfigSchema = z.infer<typeof configSchema>;
