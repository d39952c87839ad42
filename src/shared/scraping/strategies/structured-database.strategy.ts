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
 * Title search on the national laws database JSON API.
 */
@Injectable()
export class StructuredDatabaseStrategy extends SourceStrategy {
  readonly name: StrategyName = 'structured-database';

  constructor(
    sources: SourceCatalogService,
    @Inject(NETWORK_TRANSPORT) private readonly transport: NetworkTransport,
  ) {
    super(sources);
  }

  attempt(
    request: EntityRequest,
    egress: Egress,
    { signal, timeoutMs }: AttemptContext,
  ): Promise<RawOutcome> {
    const url = this.urlFor(request);
    return this.transport.send({
      url,
      method: 'GET',
      headers: {
        Accept: 'application/json, text/javascript, */*; q=0.01',
        'X-Requested-With': 'XMLHttpRequest',
        Referer: new URL(url).origin + '/',
      },
      egress,
      timeoutMs,
      signal,
    });
  }
}
