import { z } from 'zod';
import { SiteSelectorsSchema } from './selector.schema.js';

export const SiteConfigSchema = z.object({
  id: z.string().regex(/^[a-z0-9-]+$/, 'site id must be lowercase kebab-case'),
  label: z.string().min(1),
  enabled: z.boolean(),
  loginUrl: z.string().url(),
  profileUrl: z.string().url(),
  field: z.string().min(1),
  contextLabel: z.string().min(1),
  maxRetries: z.number().int().min(0).max(10),
  writeMode: z.enum(['fill', 'type']).default('fill'),
  selectors: SiteSelectorsSchema,
});

export const BrowserConfigSchema = z.object({
  headless: z.boolean().default(true),
  timeoutMs: z.number().int().positive().default(30_000),
  navigationTimeoutMs: z.number().int().positive().default(60_000),
  slowMoMs: z.number().int().min(0).default(100),
  userAgent: z
    .string()
    .default(
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    ),
  locale: z.string().default('en-US'),
  timezoneId: z.string().default('Asia/Kolkata'),
  viewport: z
    .object({ width: z.number().int().positive(), height: z.number().int().positive() })
    .default({ width: 1920, height: 1080 }),
});

export const ExecutionConfigSchema = z.object({
  maxExecutionTimeMs: z.number().int().positive().default(270_000),
  delayBetweenSitesMs: z.number().int().min(0).default(5_000),
  loginSettleMs: z.number().int().min(0).default(5_000),
  indicatorTimeoutMs: z.number().int().positive().default(15_000),
  saveConfirmTimeoutMs: z.number().int().min(0).default(5_000),
});

export const NotificationConfigSchema = z.object({
  sendOnSuccess: z.boolean().default(false),
  sendOnFailure: z.boolean().default(true),
  subjectPrefix: z.string().default('Profile Refresh'),
});

export const OracleConfigSchema = z.object({
  model: z.string().min(1).default('claude-3-haiku-20240307'),
  maxTokens: z.number().int().positive().default(500),
  temperature: z.number().min(0).max(1).default(0.7),
  systemPrompt: z
    .string()
    .default(
      'You are a professional profile editor. Your task is to make minimal, subtle changes to profile text to keep it fresh while preserving the original meaning and intent.',
    ),
});

export const AppConfigSchema = z
  .object({
    sites: z.array(SiteConfigSchema).min(1),
    browser: BrowserConfigSchema.default({}),
    execution: ExecutionConfigSchema.default({}),
    notifications: NotificationConfigSchema.default({}),
    oracle: OracleConfigSchema.default({}),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.sites.forEach((site, index) => {
      if (seen.has(site.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sites', index, 'id'],
          message: `duplicate site id: ${site.id}`,
        });
      }
      seen.add(site.id);
    });
  });
