#!/usr/bin/env node
/**
 * CLI: one profile refresh run.
 *
 * Usage: CREDENTIALS_FILE=./credentials.json profile-refresh
 *
 * Loads config/sites.json (or PROFILE_REFRESH_CONFIG), refreshes every
 * enabled site and prints the run envelope as JSON on stdout. Exit code 1
 * when the run failed fatally or any site failed.
 */

import Anthropic from '@anthropic-ai/sdk';
import { fileURLToPath } from 'node:url';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { getEnv } from '../config/env.js';
import { loadConfig } from '../config/loader.js';
import { configureLogger, createLogger } from '../logging/logger.js';
import { DiagnosticsRecorder } from '../logging/diagnostics.js';
import { FileCredentialSupplier } from '../credentials/credential-store.js';
import { PlaywrightSessionFactory } from '../engines/browser-session.js';
import { AnthropicMutationOracle } from '../oracle/anthropic-oracle.js';
import { ProfileWorkflow } from '../runner/profile-workflow.js';
import { Orchestrator } from '../runner/orchestrator.js';
import { HttpClient } from '../notify/http-client.js';
import { LogNotifier, WebhookNotifier, type Notifier } from '../notify/notifier.js';
import { ConfigurationError } from '../exception/errors.js';
import { failureEnvelope, runRefresh, type RunEnvelope } from '../handler.js';

const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('../../config/sites.json', import.meta.url));

async function main(): Promise<void> {
  const env = getEnv();
  configureLogger({ level: env.LOG_LEVEL, prettyPrint: env.LOG_PRETTY });
  const logger = createLogger('CLI');

  const config = await loadConfig(env.PROFILE_REFRESH_CONFIG ?? DEFAULT_CONFIG_PATH);
  const browser = env.HEADLESS === undefined ? config.browser : { ...config.browser, headless: env.HEADLESS };

  if (!env.ANTHROPIC_API_KEY) {
    throw new ConfigurationError('ANTHROPIC_API_KEY is not set');
  }

  const runId = `run-${Date.now()}-${Math.random().toString(36).slice(2, 7)}`;
  const diagnostics = new DiagnosticsRecorder(join(env.DIAGNOSTICS_DIR ?? join(tmpdir(), 'profile-refresh'), runId));

  const sessions = new PlaywrightSessionFactory(browser);
  const oracle = new AnthropicMutationOracle(config.oracle, new Anthropic({ apiKey: env.ANTHROPIC_API_KEY }));

  const orchestrator = new Orchestrator({
    sites: config.sites,
    execution: config.execution,
    results: diagnostics,
    createWorkflow: (site) =>
      new ProfileWorkflow(site, { sessions, oracle, execution: config.execution, diagnostics }),
  });

  const notifier: Notifier = env.NOTIFY_WEBHOOK_URL
    ? new WebhookNotifier(new HttpClient({ token: env.NOTIFY_WEBHOOK_TOKEN }), env.NOTIFY_WEBHOOK_URL, config.notifications)
    : new LogNotifier(config.notifications);

  logger.info({ runId, diagnosticsDir: diagnostics.getRunDir() }, 'starting run');

  const envelope = await runRefresh({
    credentials: new FileCredentialSupplier(env.CREDENTIALS_FILE),
    orchestrator,
    notifier,
    notifications: config.notifications,
  });

  report(envelope);
}

function report(envelope: RunEnvelope): void {
  process.stdout.write(JSON.stringify(envelope, null, 2) + '\n');
  if (envelope.statusCode !== 200 || envelope.body.summary?.success === false) {
    process.exitCode = 1;
  }
}

// Boot failures (env, config, API key) get the same envelope as a failed run.
main().catch((error: unknown) => {
  createLogger('CLI').fatal({ err: error }, 'profile refresh could not start');
  report(failureEnvelope(error));
});
