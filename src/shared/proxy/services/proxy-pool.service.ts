import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import {
  CRAWLER_SETTINGS,
  CrawlerSettings,
} from '@/shared/config/crawler.config';
import { ProxyExhaustedError } from '@/shared/errors/crawl.errors';
import { CLOCK, Clock } from '@/shared/lib/clock';
import { errorMessage } from '@/shared/lib/util';
import { Verdict } from '@/shared/scraping/enums/verdict.enum';
import {
  DIRECT_EGRESS,
  Egress,
  EgressConstraints,
  PersistedProxyState,
  ProxyEndpoint,
  ProxyPoolStats,
  endpointKey,
  rotationGroupKey,
} from '../interfaces/proxy.interface';
import { PROXY_STATE_STORE, PROXY_STATE_VERSION } from '../proxy.constants';
import { ProxyStateStore } from '../stores/proxy-state.store';
import { ProxyHealthTracker } from './proxy-health-tracker';
import { ProxyRegistryService } from './proxy-registry.service';
import { SitePolicyService } from './site-policy.service';

/**
 * Chooses the egress for each attempt and folds attempt verdicts into
 * endpoint health. Every mutation is followed by a state flush; flushes
 * run one after another in mutation order.
 */
@Injectable()
export class ProxyPoolService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(ProxyPoolService.name);
  private readonly tracker: ProxyHealthTracker;
  private readonly rotation = new Map<string, number>();
  private flushChain: Promise<void> = Promise.resolve();

  constructor(
    private readonly registry: ProxyRegistryService,
    private readonly sitePolicy: SitePolicyService,
    @Inject(PROXY_STATE_STORE) private readonly store: ProxyStateStore,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(CRAWLER_SETTINGS) settings: CrawlerSettings,
  ) {
    this.tracker = new ProxyHealthTracker(clock, {
      cooldownMs: settings.proxy.cooldownMs,
      failureThreshold: settings.proxy.failureThreshold,
    });
  }

  async onModuleInit(): Promise<void> {
    await this.restore();
  }

  async onModuleDestroy(): Promise<void> {
    await this.flushed();
  }

  /**
   * Loads rotation counters and health from the state store. A store that
   * cannot be read leaves the pool fresh.
   */
  async restore(): Promise<void> {
    let persisted: PersistedProxyState | null;
    try {
      persisted = await this.store.load();
    } catch (error) {
      this.logger.warn(`Proxy state not restored: ${errorMessage(error)}`);
      return;
    }
    if (!persisted) {
      return;
    }

    const keys = this.registry.getEndpoints().map(endpointKey);
    const restored = this.tracker.restore(persisted.endpoints, keys);
    for (const [group, index] of Object.entries(persisted.rotation)) {
      this.rotation.set(group, index);
    }

    this.logger.log(
      `Restored proxy state from ${persisted.lastUpdated}: ${this.rotation.size} rotation groups, ${restored}/${keys.length} endpoints`,
    );
  }

  /**
   * Egress for the next attempt against `siteHint`. Each selection group
   * (tier filter, priority, protocol restriction) rotates on its own
   * counter.
   * @throws ProxyExhaustedError when no proxy is eligible and the site does
   * not allow direct access
   */
  async selectEgress(
    siteHint: string,
    constraints: EgressConstraints = {},
  ): Promise<Egress> {
    const { protocols } = constraints;
    const preference = this.sitePolicy.resolve(siteHint);
    const policy = this.registry.getPolicy();

    if (!policy.enabled || !preference.useProxy) {
      if (preference.allowDirect) {
        return DIRECT_EGRESS;
      }
      throw new ProxyExhaustedError(preference.site);
    }

    const eligible = this.registry
      .getEndpoints()
      .filter(
        (endpoint) =>
          !this.tracker.isCoolingDown(endpointKey(endpoint)) &&
          (!preference.preferredTier ||
            endpoint.tier === preference.preferredTier) &&
          (!protocols || protocols.includes(endpoint.protocol)),
      );

    if (eligible.length === 0) {
      if (preference.allowDirect) {
        this.logger.warn(
          `No eligible proxy for ${preference.site}, falling back to direct`,
        );
        return DIRECT_EGRESS;
      }
      this.logger.warn(`Proxy pool exhausted for ${preference.site}`);
      throw new ProxyExhaustedError(preference.site);
    }

    const bestPriority = Math.min(...eligible.map((e) => e.priority));
    const group = eligible.filter((e) => e.priority === bestPriority);

    let chosen: ProxyEndpoint;
    if (policy.rotationEnabled) {
      const groupKey = rotationGroupKey(
        preference.preferredTier,
        bestPriority,
        protocols,
      );
      const index = this.rotation.get(groupKey) ?? 0;
      chosen = group[index % group.length];
      this.rotation.set(groupKey, index + 1);
      await this.persist();
    } else {
      chosen = group[0];
    }

    this.logger.debug(
      `Egress for ${preference.site}: ${chosen.name} (${preference.matchedBy})`,
    );
    return { kind: 'proxy', endpoint: chosen };
  }

  /**
   * Timeout of one attempt through `egress`: the catalog's proxy timeout
   * for proxied egress, `directTimeoutMs` otherwise.
   */
  attemptTimeoutMs(egress: Egress, directTimeoutMs: number): number {
    return egress.kind === 'proxy'
      ? this.registry.getPolicy().timeoutSeconds * 1000
      : directTimeoutMs;
  }

  /**
   * Most attempts one strategy may make through `egress`: the catalog's
   * `maxRetries` caps proxied attempts below `directBudget`.
   */
  attemptBudget(egress: Egress, directBudget: number): number {
    return egress.kind === 'proxy'
      ? Math.min(directBudget, this.registry.getPolicy().maxRetries)
      : directBudget;
  }

  async recordOutcome(egress: Egress, verdict: Verdict): Promise<void> {
    if (egress.kind === 'direct') {
      return;
    }

    const { endpoint } = egress;
    const key = endpointKey(endpoint);
    let cooledDown = false;

    switch (verdict) {
      case Verdict.SUCCESS:
      case Verdict.PARSE_FAILURE:
        this.tracker.recordSuccess(key);
        break;
      case Verdict.HARD_BLOCK:
        cooledDown = this.tracker.recordFailure(key, true);
        break;
      case Verdict.TRANSIENT_ERROR:
      case Verdict.RATE_LIMITED:
      case Verdict.SOFT_BLOCK:
        cooledDown = this.tracker.recordFailure(key, false);
        break;
      default:
        return;
    }

    if (cooledDown) {
      const state = this.tracker.get(key);
      this.logger.warn(
        `Proxy ${endpoint.name} cooling down after ${verdict} until ${new Date(state.cooldownUntil ?? 0).toISOString()}`,
      );
    }

    await this.persist();
  }

  /** Releases expired cooldowns; returns the released endpoint keys. */
  async sweepCooldowns(): Promise<string[]> {
    const released = this.tracker.sweep();
    if (released.length > 0) {
      this.logger.log(`Released ${released.length} proxies from cooldown`);
      await this.persist();
    }
    return released;
  }

  isCoolingDown(endpoint: ProxyEndpoint): boolean {
    return this.tracker.isCoolingDown(endpointKey(endpoint));
  }

  getStats(): ProxyPoolStats {
    const endpoints = this.registry.getEndpoints().map((endpoint) => {
      const key = endpointKey(endpoint);
      return {
        ...this.tracker.get(key),
        name: endpoint.name,
        key,
        tier: endpoint.tier,
        coolingDown: this.tracker.isCoolingDown(key),
      };
    });
    const coolingDown = endpoints.filter((e) => e.coolingDown).length;

    return {
      total: endpoints.length,
      available: endpoints.length - coolingDown,
      coolingDown,
      rotation: Object.fromEntries(this.rotation),
      endpoints,
    };
  }

  /** Resolves once every flush queued so far has settled. */
  flushed(): Promise<void> {
    return this.flushChain;
  }

  private persist(): Promise<void> {
    const snapshot: PersistedProxyState = {
      version: PROXY_STATE_VERSION,
      rotation: Object.fromEntries(this.rotation),
      lastUpdated: new Date(this.clock.now()).toISOString(),
      endpoints: this.tracker.snapshot(),
    };

    this.flushChain = this.flushChain.then(async () => {
      try {
        await this.store.save(snapshot);
      } catch (error) {
        this.logger.warn(`Proxy state flush failed: ${errorMessage(error)}`);
      }
    });
    return this.flushChain;
  }
}
