import { Egress } from '@/shared/proxy/interfaces/proxy.interface';

export type TransportFailureCode =
  | 'timeout'
  | 'connection-reset'
  | 'connection-refused'
  | 'dns'
  | 'aborted'
  | 'unknown';

export interface RawResponse {
  kind: 'response';
  status: number;
  /** Lower-cased header names. */
  headers: Record<string, string>;
  body: string;
  contentType: string;
  url: string;
}

export interface TransportFailure {
  kind: 'failure';
  code: TransportFailureCode;
  message: string;
}

/**
 * What a transport hands back for one attempt. Transports never throw for
 * network problems; they return a failure.
 */
export type RawOutcome = RawResponse | TransportFailure;

export interface TransportRequest {
  url: string;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  egress: Egress;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface NetworkTransport {
  send(request: TransportRequest): Promise<RawOutcome>;
}

export interface BrowserRenderRequest {
  url: string;
  egress: Egress;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Remote browser that loads a page, runs its scripts and returns the
 * rendered document.
 */
export interface BrowserAutomationClient {
  render(request: BrowserRenderRequest): Promise<RawOutcome>;
}
