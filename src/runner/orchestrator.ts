import type {
  ExecutionConfig,
  ExecutionSummary,
  RawCredentials,
  SiteConfig,
  WorkflowOutcome,
  WorkflowResult,
} from '../types/index.js';
import { ConfigurationError, errorMessage } from '../exception/errors.js';
import { classifyError } from '../exception/classifier.js';
import { validateCredentials } from '../credentials/credential-store.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { withRetry, defaultSleep, type Sleep } from './retry.js';
import type { SiteWorkflow } from './profile-workflow.js';

export interface ResultSink {
  logResult(result: WorkflowResult): Promise<void>;
}

export interface OrchestratorOptions {
  sites: readonly SiteConfig[];
  createWorkflow: (site: SiteConfig) => SiteWorkflow;
  execution: Pick<ExecutionConfig, 'delayBetweenSitesMs' | 'maxExecutionTimeMs'>;
  /** Used for both the inter-site delay and retry backoff. */
  sleep?: Sleep;
  now?: () => number;
  results?: ResultSink;
  logger?: Logger;
}

/**
 * Runs every enabled site's workflow one after another. A site's failure is
 * recorded as its result and never stops the loop; only missing credentials
 * abort the run.
 */
export class Orchestrator {
  private sleep: Sleep;
  private now: () => number;
  private logger: Logger;

  constructor(private options: OrchestratorOptions) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger('Orchestrator');
  }

  enabledSites(): SiteConfig[] {
    return this.options.sites.filter((site) => site.enabled);
  }

  async run(credentials: RawCredentials): Promise<ExecutionSummary> {
    const startedAt = this.now();
    const sites = this.enabledSites();
    const bundle = validateCredentials(credentials, sites);
    const results: WorkflowResult[] = [];
    let overBudget = false;

    this.logger.info({ sites: sites.map((s) => s.id) }, `executing updates for ${sites.length} sites`);

    for (const site of sites) {
      const siteCredentials = bundle.sites[site.id];
      if (!siteCredentials) {
        throw new ConfigurationError(`No credentials found for site: ${site.id}`);
      }

      const result = await this.runSite(site, () => this.options.createWorkflow(site).execute(siteCredentials));
      results.push(result);
      await this.record(result);

      const elapsed = this.now() - startedAt;
      if (!overBudget && elapsed > this.options.execution.maxExecutionTimeMs) {
        overBudget = true;
        this.logger.warn(
          { elapsedMs: elapsed, budgetMs: this.options.execution.maxExecutionTimeMs },
          'run exceeded its time budget',
        );
      }

      if (this.options.execution.delayBetweenSitesMs > 0) {
        await this.sleep(this.options.execution.delayBetweenSitesMs);
      }
    }

    const endedAt = this.now();
    const summary: ExecutionSummary = Object.freeze({
      success: results.every((r) => r.success),
      results: Object.freeze(results),
      startedAt,
      endedAt,
      totalDurationMs: endedAt - startedAt,
    });

    this.logger.info(
      {
        success: summary.success,
        totalDurationMs: summary.totalDurationMs,
        results: summary.results.map((r) => ({ site: r.site, success: r.success, error: r.error })),
      },
      'execution summary',
    );
    return summary;
  }

  private async runSite(
    site: SiteConfig,
    attempt: () => Promise<WorkflowOutcome>,
  ): Promise<WorkflowResult> {
    const start = this.now();
    try {
      const outcome = await withRetry(attempt, site.maxRetries, site.id, {
        sleep: this.sleep,
        logger: this.logger,
      });
      const durationMs = this.now() - start;
      this.logger.info({ site: site.id, durationMs }, `successfully updated site: ${site.label}`);
      return Object.freeze({
        site: site.id,
        success: true,
        durationMs,
        details: Object.freeze({
          contentLength: outcome.contentLength,
          usedFallback: outcome.usedFallback,
          saveConfirmed: outcome.saveConfirmed,
        }),
      });
    } catch (error) {
      const durationMs = this.now() - start;
      this.logger.error({ site: site.id, durationMs, err: error }, `failed to update site: ${site.label}`);
      return Object.freeze({
        site: site.id,
        success: false,
        durationMs,
        error: errorMessage(error),
        errorKind: classifyError(error),
      });
    }
  }

  private async record(result: WorkflowResult): Promise<void> {
    if (!this.options.results) return;
    try {
      await this.options.results.logResult(result);
    } catch (error) {
      this.logger.warn({ err: error, site: result.site }, 'failed to record site result');
    }
  }
}
