import { makeCatalog, makeEndpoint } from '@/shared/testing/fakes';
import { ProxyRegistryService } from './proxy-registry.service';
import { SitePolicyService } from './site-policy.service';

function makePolicy(fallbackToDirect = false): SitePolicyService {
  const catalog = makeCatalog([makeEndpoint('hk-primary')], {
    fallbackToDirect,
    defaultSite: { useProxy: false, allowDirect: true },
    sites: {
      'flk.npc.gov.cn': { useProxy: true, preferredTier: 'paid', allowDirect: false },
      '*.gov.cn': { useProxy: true, preferredTier: 'free' },
      '*.npc.gov.cn': { useProxy: true, preferredTier: 'paid' },
      '*.baidu.com': { useProxy: false },
    },
  });
  return new SitePolicyService(new ProxyRegistryService(catalog));
}

describe('SitePolicyService', () => {
  it('prefers an exact hostname over wildcards', () => {
    const resolved = makePolicy().resolve('https://flk.npc.gov.cn/api/');

    expect(resolved).toEqual({
      site: 'flk.npc.gov.cn',
      matchedBy: 'flk.npc.gov.cn',
      useProxy: true,
      preferredTier: 'paid',
      allowDirect: false,
    });
  });

  it('takes the longest matching wildcard', () => {
    const resolved = makePolicy().resolve('www.npc.gov.cn');

    expect(resolved.site).toBe('npc.gov.cn');
    expect(resolved.matchedBy).toBe('*.npc.gov.cn');
    expect(resolved.preferredTier).toBe('paid');
  });

  it('falls back to a shorter wildcard', () => {
    const resolved = makePolicy().resolve('www.court.gov.cn');

    expect(resolved.matchedBy).toBe('*.gov.cn');
    expect(resolved.preferredTier).toBe('free');
  });

  it('uses the default site when nothing matches', () => {
    const resolved = makePolicy().resolve('example.org');

    expect(resolved).toMatchObject({
      matchedBy: 'default',
      useProxy: false,
      allowDirect: true,
    });
  });

  it('takes allowDirect from the pool fallback when a site omits it', () => {
    expect(makePolicy(false).resolve('www.baidu.com').allowDirect).toBe(false);
    expect(makePolicy(true).resolve('www.baidu.com').allowDirect).toBe(true);
  });
});
