import { ConfigurationError } from '@/shared/errors/crawl.errors';
import { fillUrlTemplate, normalizeHostname } from '@/shared/lib/util';
import { Egress } from '@/shared/proxy/interfaces/proxy.interface';
import { EntityRequest } from '../interfaces/acquisition.interface';
import {
  AcquisitionStrategy,
  AttemptContext,
  PayloadExpectation,
  StrategyName,
} from '../interfaces/strategy.interface';
import { RawOutcome } from '../interfaces/transport.interface';
import { SourceCatalogService } from '../services/source-catalog.service';

/**
 * Strategy whose target URL comes from a templated source in the catalog.
 */
export abstract class SourceStrategy implements AcquisitionStrategy {
  abstract readonly name: StrategyName;

  protected constructor(protected readonly sources: SourceCatalogService) {}

  get expectation(): PayloadExpectation {
    return this.sources.get(this.name).expect;
  }

  supports(_request: EntityRequest): boolean {
    return this.sources.get(this.name).enabled;
  }

  siteFor(request: EntityRequest): string {
    return normalizeHostname(this.urlFor(request));
  }

  urlFor(request: EntityRequest): string {
    const { urlTemplate } = this.sources.get(this.name);
    if (!urlTemplate) {
      throw new ConfigurationError(`Source ${this.name} has no URL template`);
    }
    return fillUrlTemplate(urlTemplate, this.queryFor(request));
  }

  protected queryFor(request: EntityRequest): string {
    return request.name.trim();
  }

  abstract attempt(
    request: EntityRequest,
    egress: Egress,
    context: AttemptContext,
  ): Promise<RawOutcome>;
}
