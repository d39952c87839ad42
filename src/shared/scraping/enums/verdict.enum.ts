/**
 * Outcome of one acquisition attempt.
 */
export enum Verdict {
  SUCCESS = 'Success',
  /** Challenge page (captcha, JS check); the content may be reachable another way. */
  SOFT_BLOCK = 'SoftBlock',
  /** Explicit denial: WAF page, 403/451, block header. */
  HARD_BLOCK = 'HardBlock',
  RATE_LIMITED = 'RateLimited',
  TRANSIENT_ERROR = 'TransientError',
  /** Response arrived but is not the expected payload. */
  PARSE_FAILURE = 'ParseFailure',
  PROXY_EXHAUSTED = 'ProxyExhausted',
  CANCELLED = 'Cancelled',
}

/** Verdicts that count toward the WAF trigger statistic. */
export const WAF_VERDICTS: ReadonlySet<Verdict> = new Set([
  Verdict.HARD_BLOCK,
  Verdict.SOFT_BLOCK,
]);
