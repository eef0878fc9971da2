import type { SiteSelectors } from './selector.js';

export type WriteMode = 'fill' | 'type';

export interface SiteConfig {
  id: string;
  label: string;
  enabled: boolean;
  loginUrl: string;
  profileUrl: string;
  field: string;
  contextLabel: string;
  maxRetries: number;
  writeMode: WriteMode;
  selectors: SiteSelectors;
}

export interface BrowserConfig {
  headless: boolean;
  timeoutMs: number;
  navigationTimeoutMs: number;
  slowMoMs: number;
  userAgent: string;
  locale: string;
  timezoneId: string;
  viewport: { width: number; height: number };
}

export interface ExecutionConfig {
  maxExecutionTimeMs: number;
  delayBetweenSitesMs: number;
  loginSettleMs: number;
  indicatorTimeoutMs: number;
  saveConfirmTimeoutMs: number;
}

export interface NotificationConfig {
  sendOnSuccess: boolean;
  sendOnFailure: boolean;
  subjectPrefix: string;
}

export interface OracleConfig {
  model: string;
  maxTokens: number;
  temperature: number;
  systemPrompt: string;
}

export interface AppConfig {
  sites: SiteConfig[];
  browser: BrowserConfig;
  execution: ExecutionConfig;
  notifications: NotificationConfig;
  oracle: OracleConfig;
}
