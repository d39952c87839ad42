import { Inject, Injectable } from '@nestjs/common';
import { Egress } from '@/shared/proxy/interfaces/proxy.interface';
import { EntityRequest } from '../interfaces/acquisition.interface';
import { AttemptContext, StrategyName } from '../interfaces/strategy.interface';
import {
  NetworkTransport,
  RawOutcome,
} from '../interfaces/transport.interface';
import { NETWORK_TRANSPORT } from '../scraping.constants';
import { SourceCatalogService } from '../services/source-catalog.service';
import { SourceStrategy } from './source-strategy.base';

/**
 * Fetches the request's known publication URL.
 */
@Injectable()
export class DirectUrlStrategy extends SourceStrategy {
  readonly name: StrategyName = 'direct-url';

  constructor(
    sources: SourceCatalogService,
    @Inject(NETWORK_TRANSPORT) private readonly transport: NetworkTransport,
  ) {
    super(sources);
  }

  supports(request: EntityRequest): boolean {
    return super.supports(request) && !!request.sourceUrl;
  }

  urlFor(request: EntityRequest): string {
    return request.sourceUrl ?? '';
  }

  attempt(
    request: EntityRequest,
    egress: Egress,
    { signal, timeoutMs }: AttemptContext,
  ): Promise<RawOutcome> {
    return this.transport.send({
      url: this.urlFor(request),
      method: 'GET',
      egress,
      timeoutMs,
      signal,
    });
  }
}
