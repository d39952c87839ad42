import { Injectable, Logger } from '@nestjs/common';
import { normalizeHostname } from '@/shared/lib/util';
import {
  ProxyPoolPolicy,
  ProxyTier,
  SitePreference,
} from '../interfaces/proxy.interface';
import { ProxyRegistryService } from './proxy-registry.service';

export interface ResolvedSitePreference {
  site: string;
  /** Catalog key that matched, or `default`. */
  matchedBy: string;
  useProxy: boolean;
  preferredTier?: ProxyTier;
  allowDirect: boolean;
}

/**
 * Maps a site hint to its proxy preference. Exact hostnames win over
 * `*.suffix` wildcards; among wildcards the longest suffix wins.
 */
@Injectable()
export class SitePolicyService {
  private readonly logger = new Logger(SitePolicyService.name);
  private readonly policy: ProxyPoolPolicy;
  private readonly exact = new Map<string, SitePreference>();
  private readonly wildcards: Array<[string, SitePreference]> = [];

  constructor(registry: ProxyRegistryService) {
    this.policy = registry.getPolicy();

    for (const [pattern, preference] of Object.entries(this.policy.sites)) {
      const normalized = pattern.trim().toLowerCase();
      if (normalized.startsWith('*.')) {
        this.wildcards.push([normalized.slice(2), preference]);
      } else {
        this.exact.set(normalizeHostname(normalized), preference);
      }
    }
    this.wildcards.sort(([a], [b]) => b.length - a.length);

    this.logger.log(
      `Loaded ${this.exact.size} site rules and ${this.wildcards.length} wildcard rules`,
    );
  }

  resolve(siteHint: string): ResolvedSitePreference {
    const site = normalizeHostname(siteHint);

    const exact = this.exact.get(site);
    if (exact) {
      return this.toResolved(site, site, exact);
    }

    for (const [suffix, preference] of this.wildcards) {
      if (site === suffix || site.endsWith(`.${suffix}`)) {
        return this.toResolved(site, `*.${suffix}`, preference);
      }
    }

    return this.toResolved(site, 'default', this.policy.defaultSite);
  }

  private toResolved(
    site: string,
    matchedBy: string,
    preference: SitePreference,
  ): ResolvedSitePreference {
    this.logger.debug(`Site ${site} → ${matchedBy}`);
    return {
      site,
      matchedBy,
      useProxy: preference.useProxy,
      preferredTier: preference.preferredTier,
      allowDirect: preference.allowDirect ?? this.policy.fallbackToDirect,
    };
  }
}
