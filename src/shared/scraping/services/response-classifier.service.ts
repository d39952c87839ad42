import * as fs from 'fs';
import * as path from 'path';
import * as Joi from 'joi';
import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  CRAWLER_SETTINGS,
  CrawlerSettings,
} from '@/shared/config/crawler.config';
import { ConfigurationError } from '@/shared/errors/crawl.errors';
import { errorMessage } from '@/shared/lib/util';
import { Verdict } from '../enums/verdict.enum';
import { PayloadExpectation } from '../interfaces/strategy.interface';
import { RawOutcome } from '../interfaces/transport.interface';

export interface ClassifierMarkers {
  hardBlock: string[];
  softBlock: string[];
  rateLimited: string[];
  /** Response headers whose presence marks a WAF block. */
  blockHeaders: string[];
  /** HTML bodies shorter than this, once trimmed, are blank challenge pages. */
  minBodyLength: number;
}

export interface Classification {
  verdict: Verdict;
  httpStatus?: number;
  detail?: string;
  retryAfterMs?: number;
}

const markersSchema = Joi.object<ClassifierMarkers>({
  hardBlock: Joi.array().items(Joi.string().min(1)).default([]),
  softBlock: Joi.array().items(Joi.string().min(1)).default([]),
  rateLimited: Joi.array().items(Joi.string().min(1)).default([]),
  blockHeaders: Joi.array().items(Joi.string().min(1)).default([]),
  minBodyLength: Joi.number().integer().min(0).default(0),
});

function findMarker(haystack: string, markers: string[]): string | undefined {
  return markers.find((marker) => haystack.includes(marker.toLowerCase()));
}

/**
 * Retry-After in ms: delta-seconds or an HTTP date.
 */
export function parseRetryAfter(
  value: string | undefined,
  now: number,
): number | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

function looksLikeJson(body: string): boolean {
  try {
    JSON.parse(body);
    return true;
  } catch {
    return false;
  }
}

/**
 * Maps one raw outcome to a verdict. Checks run in a fixed order and the
 * first match wins; transport failures before status codes, status codes
 * before headers, headers before body markers, body markers before payload
 * shape. A near-empty 2xx HTML page counts as a challenge.
 */
export function classifyResponse(
  outcome: RawOutcome,
  expectation: PayloadExpectation,
  markers: ClassifierMarkers,
  now: number = Date.now(),
): Classification {
  if (outcome.kind === 'failure') {
    return {
      verdict: Verdict.TRANSIENT_ERROR,
      detail: `${outcome.code}: ${outcome.message}`,
    };
  }

  const { status, headers } = outcome;
  const body = outcome.body.toLowerCase();
  const retryAfterMs = parseRetryAfter(headers['retry-after'], now);

  if (status === 403 || status === 451) {
    return { verdict: Verdict.HARD_BLOCK, httpStatus: status, detail: `HTTP ${status}` };
  }

  if (status === 429) {
    return {
      verdict: Verdict.RATE_LIMITED,
      httpStatus: status,
      detail: 'HTTP 429',
      ...(retryAfterMs !== undefined ? { retryAfterMs } : {}),
    };
  }

  if (status >= 500) {
    return {
      verdict: Verdict.TRANSIENT_ERROR,
      httpStatus: status,
      detail: `HTTP ${status}`,
      ...(retryAfterMs !== undefined ? { retryAfterMs } : {}),
    };
  }

  const blockHeader = markers.blockHeaders.find(
    (name) => headers[name.toLowerCase()] !== undefined,
  );
  if (blockHeader) {
    return {
      verdict: Verdict.HARD_BLOCK,
      httpStatus: status,
      detail: `block header ${blockHeader.toLowerCase()}`,
    };
  }

  const hardMarker = findMarker(body, markers.hardBlock);
  if (hardMarker) {
    return { verdict: Verdict.HARD_BLOCK, httpStatus: status, detail: `marker "${hardMarker}"` };
  }

  const softMarker = findMarker(body, markers.softBlock);
  if (softMarker) {
    return { verdict: Verdict.SOFT_BLOCK, httpStatus: status, detail: `marker "${softMarker}"` };
  }

  const rateMarker = findMarker(body, markers.rateLimited);
  if (rateMarker) {
    return {
      verdict: Verdict.RATE_LIMITED,
      httpStatus: status,
      detail: `marker "${rateMarker}"`,
      ...(retryAfterMs !== undefined ? { retryAfterMs } : {}),
    };
  }

  const bodyLength = outcome.body.trim().length;
  if (
    expectation.contentType === 'html' &&
    status < 300 &&
    bodyLength < markers.minBodyLength
  ) {
    return {
      verdict: Verdict.SOFT_BLOCK,
      httpStatus: status,
      detail: `body too short (${bodyLength} chars)`,
    };
  }

  if (
    expectation.contentType === 'json' &&
    (outcome.contentType.toLowerCase().includes('html') ||
      !looksLikeJson(outcome.body))
  ) {
    return {
      verdict: Verdict.HARD_BLOCK,
      httpStatus: status,
      detail: `expected JSON, got ${outcome.contentType || 'unknown content'}`,
    };
  }

  if (status >= 400) {
    return { verdict: Verdict.PARSE_FAILURE, httpStatus: status, detail: `HTTP ${status}` };
  }

  const missing = expectation.markers.filter(
    (marker) => !body.includes(marker.toLowerCase()),
  );
  if (missing.length > 0) {
    return {
      verdict: Verdict.PARSE_FAILURE,
      httpStatus: status,
      detail: `payload markers missing: ${missing.join(', ')}`,
    };
  }

  return { verdict: Verdict.SUCCESS, httpStatus: status };
}

export function parseClassifierMarkers(raw: unknown): ClassifierMarkers {
  const { error, value } = markersSchema.validate(raw);
  if (error) {
    throw new ConfigurationError(`Invalid block markers: ${error.message}`);
  }
  return value;
}

@Injectable()
export class ResponseClassifierService {
  private readonly logger = new Logger(ResponseClassifierService.name);
  private readonly markers: ClassifierMarkers;

  constructor(@Inject(CRAWLER_SETTINGS) settings: CrawlerSettings) {
    this.markers = ResponseClassifierService.load(settings.blockMarkersPath);
    this.logger.log(
      `Loaded block markers: ${this.markers.hardBlock.length} hard, ${this.markers.softBlock.length} challenge, ${this.markers.rateLimited.length} throttling, ${this.markers.blockHeaders.length} headers`,
    );
  }

  static load(markersPath: string): ClassifierMarkers {
    const resolved = path.resolve(process.cwd(), markersPath);
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read block markers ${resolved}: ${errorMessage(error)}`,
      );
    }
    return parseClassifierMarkers(raw);
  }

  classify(outcome: RawOutcome, expectation: PayloadExpectation, now?: number): Classification {
    return classifyResponse(outcome, expectation, this.markers, now);
  }
}
