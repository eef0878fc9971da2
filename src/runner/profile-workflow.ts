import type {
  ExecutionConfig,
  SelectorCandidates,
  SiteConfig,
  SiteCredentials,
  WorkflowOutcome,
  WorkflowState,
} from '../types/index.js';
import type { BrowserDriver, DriverElement, SessionFactory } from '../engines/browser-driver.js';
import type { MutationOracle } from '../oracle/mutation-oracle.js';
import { fallbackMutation } from '../oracle/mutation-oracle.js';
import { WorkflowStepError, errorMessage } from '../exception/errors.js';
import { classifyError } from '../exception/classifier.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { describeMutationRejection } from './mutation-validator.js';

export interface SiteWorkflow {
  readonly siteId: string;
  /** One attempt from a fresh session. Throws `WorkflowStepError` on any step failure. */
  execute(credentials: SiteCredentials): Promise<WorkflowOutcome>;
}

export interface ScreenshotSink {
  saveScreenshot(name: string, buffer: Buffer): Promise<string>;
}

export interface ProfileWorkflowDeps {
  sessions: SessionFactory;
  oracle: MutationOracle;
  execution: Pick<ExecutionConfig, 'loginSettleMs' | 'indicatorTimeoutMs' | 'saveConfirmTimeoutMs'>;
  diagnostics?: ScreenshotSink;
  logger?: Logger;
}

/** Artifact name fragment for a failure while moving into each state. */
const STEP_LABELS: Partial<Record<WorkflowState, string>> = {
  LoggedIn: 'login',
  OnProfilePage: 'profile-nav',
  FieldRead: 'read-field',
  MutationReady: 'mutate',
  Validated: 'validate',
  Written: 'write',
  Verified: 'verify',
};

interface Mutation {
  text: string;
  usedFallback: boolean;
}

/**
 * Login → profile page → read field → mutate → validate → write → verify,
 * strictly forward. Retries are the caller's concern: every call starts
 * over from `Init` in a new browser session.
 */
export class ProfileWorkflow implements SiteWorkflow {
  private logger: Logger;

  constructor(
    private site: SiteConfig,
    private deps: ProfileWorkflowDeps,
  ) {
    this.logger = (deps.logger ?? createLogger('Workflow')).child({ site: site.id });
  }

  get siteId(): string {
    return this.site.id;
  }

  async execute(credentials: SiteCredentials): Promise<WorkflowOutcome> {
    this.logger.info(`starting automation for ${this.site.label}`);
    const session = await this.deps.sessions.open();
    const driver = session.driver;
    let state: WorkflowState = 'Init';
    let target: WorkflowState = 'LoggedIn';

    try {
      await this.login(driver, credentials);
      state = 'LoggedIn';
      this.logger.info('login successful');

      target = 'OnProfilePage';
      await this.openProfile(driver);
      state = 'OnProfilePage';

      target = 'FieldRead';
      const original = await this.readField(driver);
      state = 'FieldRead';
      this.logger.info({ length: original.length }, `read current ${this.site.field}`);

      target = 'MutationReady';
      const mutation = await this.mutate(original);
      state = 'MutationReady';

      target = 'Validated';
      this.validate(original, mutation);
      state = 'Validated';

      target = 'Written';
      await this.write(driver, mutation.text);
      state = 'Written';

      target = 'Verified';
      const saveConfirmed = await this.verify(driver);
      state = 'Verified';

      state = 'Done';
      this.logger.info({ contentLength: mutation.text.length }, `updated ${this.site.field}`);
      return {
        site: this.site.id,
        originalLength: original.length,
        contentLength: mutation.text.length,
        usedFallback: mutation.usedFallback,
        saveConfirmed,
      };
    } catch (error) {
      const stepError =
        error instanceof WorkflowStepError
          ? error
          : new WorkflowStepError(classifyError(error), errorMessage(error), target, { cause: error });
      this.logger.error(
        { state, failedStep: target, kind: stepError.kind, err: error },
        `${this.site.label} workflow failed`,
      );
      await this.captureFailure(driver, target);
      throw stepError;
    } finally {
      try {
        await session.close();
      } catch (closeError) {
        this.logger.warn({ err: closeError }, 'failed to close browser session');
      }
    }
  }

  private async login(driver: BrowserDriver, credentials: SiteCredentials): Promise<void> {
    const { selectors } = this.site;
    await driver.navigate(this.site.loginUrl);
    await driver.pause(2000);

    const username = await this.require(driver, selectors.usernameInput, 'LoggedIn', 'username input');
    await username.type(credentials.username);

    if (selectors.continueButton) {
      const next = await driver.resolve(selectors.continueButton);
      if (next.kind === 'Success') {
        await next.handle.click();
        await driver.pause(2000);
      }
    }

    const password = await this.require(driver, selectors.passwordInput, 'LoggedIn', 'password input');
    await password.type(credentials.password);

    const submit = await this.require(driver, selectors.submitButton, 'LoggedIn', 'login submit button');
    await submit.click();
    await driver.pause(this.deps.execution.loginSettleMs);

    // Success markers first: error banners can linger while the next page loads.
    const success = await driver.waitFor(selectors.loginSuccess, this.deps.execution.indicatorTimeoutMs);
    if (success.kind === 'Success') {
      this.logger.debug({ selector: success.selector }, 'post-login indicator found');
      return;
    }

    const loginError = await driver.resolve(selectors.loginError);
    if (loginError.kind === 'Success') {
      const message = (await loginError.handle.readText()).trim();
      if (message) {
        throw new WorkflowStepError('LoginFailed', `Login failed: ${message}`, 'LoggedIn');
      }
    }

    const challenge = await driver.resolve(selectors.challenge);
    if (challenge.kind === 'Success') {
      throw new WorkflowStepError(
        'AmbiguousVerification',
        'Verification challenge detected (CAPTCHA/OTP), manual verification required',
        'LoggedIn',
      );
    }

    throw new WorkflowStepError(
      'AmbiguousVerification',
      'Login verification required or CAPTCHA detected',
      'LoggedIn',
    );
  }

  private async openProfile(driver: BrowserDriver): Promise<void> {
    await driver.navigate(this.site.profileUrl);
    await driver.pause(3000);

    const ready = await driver.waitFor(this.site.selectors.profileReady, this.deps.execution.indicatorTimeoutMs);
    if (ready.kind === 'NotFound') {
      throw new WorkflowStepError(
        'NavigationFailed',
        `Profile page did not load (waited for ${ready.tried.join(', ')})`,
        'OnProfilePage',
      );
    }
  }

  private async readField(driver: BrowserDriver): Promise<string> {
    const { selectors, field } = this.site;
    const edit = await this.require(driver, selectors.editButton, 'FieldRead', `${field} edit control`);
    await edit.click();
    await driver.pause(2000);

    const input = await this.require(driver, selectors.fieldInput, 'FieldRead', `${field} input`);
    const content = (await input.readValue()).trim();
    if (!content) {
      throw new WorkflowStepError('FieldEmpty', `${field} is empty or not found`, 'FieldRead');
    }
    return content;
  }

  private async mutate(original: string): Promise<Mutation> {
    try {
      const text = await this.deps.oracle.propose(original, this.site.contextLabel);
      return { text, usedFallback: false };
    } catch (error) {
      this.logger.warn({ err: error }, 'mutation oracle failed, using fallback mutation');
      return { text: fallbackMutation(original), usedFallback: true };
    }
  }

  private validate(original: string, mutation: Mutation): void {
    if (mutation.usedFallback) return;

    const rejection = describeMutationRejection(original, mutation.text);
    if (rejection) {
      this.logger.warn(
        { reason: rejection, originalLength: original.length, mutatedLength: mutation.text.length },
        'mutation rejected',
      );
      throw new WorkflowStepError(
        'ValidationRejected',
        `Content mutation validation failed: ${rejection}`,
        'Validated',
      );
    }
  }

  private async write(driver: BrowserDriver, text: string): Promise<void> {
    const { selectors, field } = this.site;
    const input = await this.require(driver, selectors.fieldInput, 'Written', `${field} input`);
    await input.replace(text, this.site.writeMode);
    await driver.pause(1000);

    const save = await driver.resolve(selectors.saveButton);
    if (save.kind === 'NotFound') {
      throw new WorkflowStepError(
        'WriteNotConfirmed',
        `Could not find save control (tried ${save.tried.join(', ')})`,
        'Written',
      );
    }
    await save.handle.click();
    this.logger.debug({ selector: save.selector }, 'clicked save');
    await driver.pause(3000);
  }

  private async verify(driver: BrowserDriver): Promise<boolean> {
    const surface = this.site.selectors.editSurface;
    if (surface.length === 0) {
      this.logger.debug('no edit surface configured; save not confirmed');
      return false;
    }

    try {
      const closed = await driver.waitForGone(surface, this.deps.execution.saveConfirmTimeoutMs);
      if (!closed) {
        this.logger.warn('edit surface still open after save; assuming the save went through');
      }
      return closed;
    } catch (error) {
      this.logger.warn({ err: error }, 'could not confirm save');
      return false;
    }
  }

  private async require(
    driver: BrowserDriver,
    candidates: SelectorCandidates,
    state: WorkflowState,
    what: string,
  ): Promise<DriverElement> {
    const resolution = await driver.waitFor(candidates, this.deps.execution.indicatorTimeoutMs);
    if (resolution.kind === 'NotFound') {
      throw new WorkflowStepError('NotFound', `Could not find ${what} (tried ${resolution.tried.join(', ')})`, state);
    }
    return resolution.handle;
  }

  private async captureFailure(driver: BrowserDriver, target: WorkflowState): Promise<void> {
    if (!this.deps.diagnostics) return;
    const name = `${this.site.id}-${STEP_LABELS[target] ?? target}-error`;
    try {
      const path = await this.deps.diagnostics.saveScreenshot(name, await driver.screenshot());
      this.logger.info({ path }, 'saved failure screenshot');
    } catch (error) {
      this.logger.warn({ err: error }, 'failed to capture failure screenshot');
    }
  }
}
