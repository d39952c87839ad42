import { CrawlerSettings } from '@/shared/config/crawler.config';
import {
  ProxyPoolPolicy,
  ProxyProtocol,
} from '@/shared/proxy/interfaces/proxy.interface';
import { ProxyPoolService } from '@/shared/proxy/services/proxy-pool.service';
import { ProxyRegistryService } from '@/shared/proxy/services/proxy-registry.service';
import { SitePolicyService } from '@/shared/proxy/services/site-policy.service';
import { InMemoryProxyStateStore } from '@/shared/proxy/stores/proxy-state.store';
import {
  BlockingStrategy,
  FakeClock,
  OK_PAGE,
  ScriptedStrategy,
  flushPromises,
  htmlResponse,
  makeCatalog,
  makeEndpoint,
  makeSettings,
  transportFailure,
} from '@/shared/testing/fakes';
import { Verdict } from '../enums/verdict.enum';
import { EntityRequest } from '../interfaces/acquisition.interface';
import { PayloadInspector } from '../interfaces/crawl-result.interface';
import {
  AcquisitionStrategy,
  PayloadExpectation,
} from '../interfaces/strategy.interface';
import { RawOutcome } from '../interfaces/transport.interface';
import { RateLimiterService } from './rate-limiter.service';
import { ResponseClassifierService } from './response-classifier.service';
import { RetryControllerService } from './retry-controller.service';
import { StrategyChainService } from './strategy-chain.service';

const DIRECT_POLICY: Partial<ProxyPoolPolicy> = {
  defaultSite: { useProxy: false, allowDirect: true },
};

const BLOCKED = htmlResponse('<h1>Access Denied</h1>', 403);

const REQUEST: EntityRequest = {
  name: '中华人民共和国民法典',
  documentNumber: '主席令第45号',
  sourceUrl: 'https://www.gov.cn/zhengce/content/minfadian.htm',
};

/** Strategy whose attempts never settle and ignore their signal. */
class StalledStrategy implements AcquisitionStrategy {
  readonly name = 'structured-database';
  readonly expectation: PayloadExpectation = { contentType: 'html', markers: [] };
  started = 0;

  supports(): boolean {
    return true;
  }

  siteFor(): string {
    return 'flk.npc.gov.cn';
  }

  attempt(): Promise<RawOutcome> {
    this.started++;
    return new Promise<RawOutcome>(() => undefined);
  }
}

function buildChain(
  strategies: AcquisitionStrategy[],
  policy: Partial<ProxyPoolPolicy> = DIRECT_POLICY,
  inspector?: PayloadInspector,
  overrides: Partial<CrawlerSettings> = {},
) {
  const clock = new FakeClock();
  const settings = makeSettings(overrides);
  const endpoints = [
    makeEndpoint('hk-primary'),
    makeEndpoint('tw-relay'),
    makeEndpoint('jp-relay'),
  ];
  const registry = new ProxyRegistryService(makeCatalog(endpoints, policy));
  const pool = new ProxyPoolService(
    registry,
    new SitePolicyService(registry),
    new InMemoryProxyStateStore(),
    clock,
    settings,
  );
  const rateLimiter = new RateLimiterService(settings, clock);
  const chain = new StrategyChainService(
    strategies,
    pool,
    rateLimiter,
    new ResponseClassifierService(settings),
    new RetryControllerService(settings, () => 0.5),
    clock,
    settings,
    inspector,
  );
  return { chain, clock, pool, endpoints, rateLimiter };
}

describe('StrategyChainService', () => {
  const signal = new AbortController().signal;

  it('runs strategies in the fixed priority order', () => {
    const { chain } = buildChain([
      new ScriptedStrategy('direct-url'),
      new ScriptedStrategy('search-engine'),
      new ScriptedStrategy('browser-automation'),
      new ScriptedStrategy('structured-database'),
    ]);

    expect(chain.strategyNames).toEqual([
      'structured-database',
      'search-engine',
      'browser-automation',
      'direct-url',
    ]);
  });

  it('succeeds on the first attempt through direct egress', async () => {
    const primary = new ScriptedStrategy('structured-database');
    const { chain } = buildChain([primary]);

    const task = await chain.execute(REQUEST, '民法典#45', signal);

    expect(task.status).toBe('Succeeded');
    expect(task.rawQuery).toBe('中华人民共和国民法典 主席令第45号');
    expect(task.attempts).toHaveLength(1);
    expect(task.attempts[0]).toMatchObject({
      strategyName: 'structured-database',
      site: 'flk.npc.gov.cn',
      proxyUsed: null,
      verdict: Verdict.SUCCESS,
      httpStatus: 200,
    });
    expect(task.payload).toEqual({
      strategyName: 'structured-database',
      sourceUrl: OK_PAGE.url,
      contentType: OK_PAGE.contentType,
      body: OK_PAGE.body,
    });
    expect(primary.calls[0].egress).toEqual({ kind: 'direct' });
    expect(primary.calls[0].timeoutMs).toBe(1000);
  });

  it('gives proxied attempts the catalog timeout', async () => {
    const primary = new ScriptedStrategy('structured-database');
    const { chain } = buildChain([primary], {
      defaultSite: { useProxy: true, allowDirect: false },
      timeoutSeconds: 10,
    });

    await chain.execute(REQUEST, '民法典#45', signal);

    expect(primary.calls[0].egress.kind).toBe('proxy');
    expect(primary.calls[0].timeoutMs).toBe(10_000);
  });

  it('selects proxies the strategy can speak through', async () => {
    class HttpOnly extends ScriptedStrategy {
      readonly proxyProtocols: readonly ProxyProtocol[] = ['http', 'https'];
    }
    const { chain, pool } = buildChain([new HttpOnly('browser-automation')], {
      defaultSite: { useProxy: true, allowDirect: false },
    });

    await chain.execute(REQUEST, '民法典#45', signal);

    expect(pool.getStats().rotation).toEqual({ 'any:1:http+https': 1 });
  });

  it('stops proxied retries at the catalog retry limit', async () => {
    const primary = new ScriptedStrategy(
      'structured-database',
      [],
      transportFailure('connection-reset'),
    );
    const { chain, clock } = buildChain([primary], {
      defaultSite: { useProxy: true, allowDirect: false },
      maxRetries: 2,
    });

    const task = await chain.execute(REQUEST, '民法典#45', signal);

    expect(primary.calls).toHaveLength(2);
    expect(task.finalVerdict).toBe(Verdict.TRANSIENT_ERROR);
    expect(clock.sleeps).toEqual([1000]);
  });

  it('times out an attempt that never settles', async () => {
    const stalled = new StalledStrategy();
    const { chain, clock } = buildChain([stalled], DIRECT_POLICY, undefined, {
      attemptTimeoutMs: 50,
    });

    const task = await chain.execute(REQUEST, '民法典#45', signal);

    expect(stalled.started).toBe(3);
    expect(task.finalVerdict).toBe(Verdict.TRANSIENT_ERROR);
    expect(task.attempts.map((a) => a.detail)).toEqual([
      'timeout: Attempt exceeded 50ms',
      'timeout: Attempt exceeded 50ms',
      'timeout: Attempt exceeded 50ms',
    ]);
    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  it('retries transient errors with growing backoff, then succeeds', async () => {
    const primary = new ScriptedStrategy('structured-database', [
      transportFailure('timeout'),
      transportFailure('connection-reset'),
    ]);
    const { chain, clock } = buildChain([primary]);

    const task = await chain.execute(REQUEST, '民法典#45', signal);

    expect(task.status).toBe('Succeeded');
    expect(task.attempts.map((a) => a.verdict)).toEqual([
      Verdict.TRANSIENT_ERROR,
      Verdict.TRANSIENT_ERROR,
      Verdict.SUCCESS,
    ]);
    expect(clock.sleeps).toEqual([1000, 2000]);
    expect(clock.sleeps[1] / clock.sleeps[0]).toBe(2);
  });

  it('escalates a hard block without retrying the strategy', async () => {
    const primary = new ScriptedStrategy('structured-database', [], BLOCKED);
    const secondary = new ScriptedStrategy('search-engine');
    const { chain, clock } = buildChain([primary, secondary]);

    const task = await chain.execute(REQUEST, '民法典#45', signal);

    expect(primary.calls).toHaveLength(1);
    expect(secondary.calls).toHaveLength(1);
    expect(task.status).toBe('Succeeded');
    expect(task.attempts.map((a) => [a.strategyName, a.verdict])).toEqual([
      ['structured-database', Verdict.HARD_BLOCK],
      ['search-engine', Verdict.SUCCESS],
    ]);
    expect(clock.sleeps).toEqual([]);
  });

  it('bounds same-strategy retries before escalating', async () => {
    const primary = new ScriptedStrategy(
      'structured-database',
      [],
      transportFailure('timeout'),
    );
    const secondary = new ScriptedStrategy('search-engine');
    const { chain } = buildChain([primary, secondary]);

    const task = await chain.execute(REQUEST, '民法典#45', signal);

    expect(primary.calls).toHaveLength(3);
    expect(secondary.calls).toHaveLength(1);
    expect(task.attempts).toHaveLength(4);
  });

  it('ends ProxyExhausted when every proxy is blocked and direct is refused', async () => {
    const strategies = [
      new ScriptedStrategy('structured-database', [], BLOCKED),
      new ScriptedStrategy('search-engine', [], BLOCKED),
      new ScriptedStrategy('browser-automation', [], BLOCKED),
      new ScriptedStrategy('direct-url', [], BLOCKED),
    ];
    const { chain, pool, endpoints } = buildChain(strategies, {
      defaultSite: { useProxy: true, allowDirect: false },
    });

    const task = await chain.execute(REQUEST, '民法典#45', signal);

    expect(task.status).toBe('Failed');
    expect(task.finalVerdict).toBe(Verdict.PROXY_EXHAUSTED);
    expect(task.attempts).toHaveLength(3);
    expect(task.attempts.every((a) => a.verdict === Verdict.HARD_BLOCK)).toBe(true);
    expect(new Set(task.attempts.map((a) => a.proxyUsed)).size).toBe(3);
    expect(endpoints.every((endpoint) => pool.isCoolingDown(endpoint))).toBe(true);
    expect(strategies[3].calls).toHaveLength(0);
  });

  it('turns a payload the inspector rejects into a parse failure', async () => {
    const inspector: PayloadInspector = {
      inspect: (_request, payload) =>
        payload.strategyName === 'structured-database'
          ? { ok: false, detail: 'no document title' }
          : { ok: true },
    };
    const primary = new ScriptedStrategy('structured-database');
    const secondary = new ScriptedStrategy('search-engine');
    const { chain } = buildChain([primary, secondary], DIRECT_POLICY, inspector);

    const task = await chain.execute(REQUEST, '民法典#45', signal);

    expect(task.status).toBe('Succeeded');
    expect(task.attempts[0]).toMatchObject({
      verdict: Verdict.PARSE_FAILURE,
      detail: 'no document title',
    });
    expect(task.payload?.strategyName).toBe('search-engine');
  });

  it('fails with the last verdict when every strategy gives up', async () => {
    const primary = new ScriptedStrategy(
      'structured-database',
      [],
      htmlResponse('<p>请输入验证码</p>'),
    );
    const { chain } = buildChain([primary]);

    const task = await chain.execute(REQUEST, '民法典#45', signal);

    expect(task.status).toBe('Failed');
    expect(task.finalVerdict).toBe(Verdict.SOFT_BLOCK);
    expect(task.detail).toBe('marker "验证码"');
  });

  it('fails a request no strategy supports', async () => {
    class Unsupported extends ScriptedStrategy {
      supports(): boolean {
        return false;
      }
    }
    const strategy = new Unsupported('direct-url');
    const { chain } = buildChain([strategy]);

    const task = await chain.execute(REQUEST, '民法典#45', signal);

    expect(task.finalVerdict).toBe(Verdict.PARSE_FAILURE);
    expect(task.detail).toBe('No acquisition strategy supports this request');
    expect(task.attempts).toHaveLength(0);
  });

  it('marks the attempt and the task cancelled when the signal fires mid-attempt', async () => {
    const blocking = new BlockingStrategy();
    const { chain } = buildChain([blocking]);
    const controller = new AbortController();

    const pending = chain.execute(REQUEST, '民法典#45', controller.signal);
    await flushPromises();
    expect(blocking.inFlight).toBe(1);
    controller.abort();
    const task = await pending;

    expect(task.status).toBe('Failed');
    expect(task.finalVerdict).toBe(Verdict.CANCELLED);
    expect(task.attempts.map((a) => a.verdict)).toEqual([Verdict.CANCELLED]);
  });

  it('does no work for an already cancelled signal', async () => {
    const primary = new ScriptedStrategy('structured-database');
    const { chain, rateLimiter } = buildChain([primary]);
    const controller = new AbortController();
    controller.abort();

    const task = await chain.execute(REQUEST, '民法典#45', controller.signal);

    expect(task.finalVerdict).toBe(Verdict.CANCELLED);
    expect(primary.calls).toHaveLength(0);
    expect(rateLimiter.grantedCount).toBe(0);
  });
});
