import {
  Egress,
  ProxyProtocol,
} from '@/shared/proxy/interfaces/proxy.interface';
import { EntityRequest } from './acquisition.interface';
import { RawOutcome } from './transport.interface';

export type StrategyName =
  | 'structured-database'
  | 'search-engine'
  | 'browser-automation'
  | 'direct-url';

export interface PayloadExpectation {
  contentType: 'json' | 'html';
  /** Case-insensitive substrings a real payload contains. */
  markers: string[];
}

export interface AttemptContext {
  signal: AbortSignal;
  timeoutMs: number;
}

export interface AcquisitionStrategy {
  readonly name: StrategyName;
  readonly expectation: PayloadExpectation;
  /** Proxy protocols the strategy can hand on; any when absent. */
  readonly proxyProtocols?: readonly ProxyProtocol[];
  supports(request: EntityRequest): boolean;
  /** Hostname the attempt will contact, for site policy. */
  siteFor(request: EntityRequest): string;
  /** One network attempt. Does not throw for network problems. */
  attempt(
    request: EntityRequest,
    egress: Egress,
    context: AttemptContext,
  ): Promise<RawOutcome>;
}
