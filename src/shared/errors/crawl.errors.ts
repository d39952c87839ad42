/**
 * Error classes for the acquisition core.
 *
 * Per-attempt outcomes travel as verdicts, not exceptions. These classes
 * cover the few conditions that leave the normal verdict flow: a fatal
 * configuration problem, an empty egress choice, a run-level abort and a
 * broken task lifecycle.
 */

export class CrawlError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(message: string, code: string, retryable: boolean = false) {
    super(message);
    this.name = 'CrawlError';
    this.code = code;
    this.retryable = retryable;
  }
}

/** Malformed catalog, missing required setting. Aborts the run before any task starts. */
export class ConfigurationError extends CrawlError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', false);
    this.name = 'ConfigurationError';
  }
}

/** No eligible egress for a site: every candidate proxy is cooling down and direct access is not allowed */
export class ProxyExhaustedError extends CrawlError {
  public readonly site: string;

  constructor(site: string) {
    super(`No eligible egress for ${site}`, 'PROXY_EXHAUSTED', false);
    this.name = 'ProxyExhaustedError';
    this.site = site;
  }
}

/** The run signal fired while a wait or a network call was pending */
export class CancelledError extends CrawlError {
  constructor(message: string = 'Run cancelled') {
    super(message, 'CANCELLED', false);
    this.name = 'CancelledError';
  }
}

export class IllegalTaskTransitionError extends CrawlError {
  constructor(entityKey: string, from: string, to: string) {
    super(
      `Entity task ${entityKey} cannot move from ${from} to ${to}`,
      'ILLEGAL_TASK_TRANSITION',
      false,
    );
    this.name = 'IllegalTaskTransitionError';
  }
}
