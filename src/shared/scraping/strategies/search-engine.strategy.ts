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
 * Search results page restricted to government hosts. The document number
 * is part of the query when known.
 */
@Injectable()
export class SearchEngineStrategy extends SourceStrategy {
  readonly name: StrategyName = 'search-engine';

  constructor(
    sources: SourceCatalogService,
    @Inject(NETWORK_TRANSPORT) private readonly transport: NetworkTransport,
  ) {
    super(sources);
  }

  protected queryFor(request: EntityRequest): string {
    const name = request.name.trim();
    const documentNumber = request.documentNumber?.trim();
    return documentNumber ? `${name} ${documentNumber}` : name;
  }

  attempt(
    request: EntityRequest,
    egress: Egress,
    { signal, timeoutMs }: AttemptContext,
  ): Promise<RawOutcome> {
    return this.transport.send({
      url: this.urlFor(request),
      method: 'GET',
      headers: {
        Accept:
          'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'sec-fetch-dest': 'document',
        'sec-fetch-mode': 'navigate',
        'upgrade-insecure-requests': '1',
      },
      egress,
      timeoutMs,
      signal,
    });
  }
}
