import { Cache, caching } from 'cache-manager';
import { flushPromises, makeSettings } from '@/shared/testing/fakes';
import { Verdict } from '../enums/verdict.enum';
import { EntityTask } from '../interfaces/acquisition.interface';
import { EntityTaskRecord } from '../models/entity-task';
import { DedupeCacheService } from './dedupe-cache.service';

const NOW = '2026-01-01T00:00:00.000Z';

function finishedTask(entityKey: string, verdict: Verdict = Verdict.SUCCESS): EntityTask {
  const record = new EntityTaskRecord(entityKey, entityKey, { name: entityKey });
  record.start(NOW);
  if (verdict === Verdict.SUCCESS) {
    return record.succeed(
      {
        strategyName: 'direct-url',
        sourceUrl: 'https://www.gov.cn/doc.htm',
        contentType: 'text/html',
        body: '<html></html>',
      },
      NOW,
    );
  }
  return record.fail(verdict, NOW);
}

describe('DedupeCacheService', () => {
  let cache: Cache;
  let service: DedupeCacheService;

  beforeEach(async () => {
    cache = await caching('memory', { max: 100, ttl: 60_000 });
    service = new DedupeCacheService(cache, makeSettings());
  });

  it('runs one resolution for concurrent claims on a key', async () => {
    let calls = 0;
    let release: (task: EntityTask) => void = () => undefined;
    const resolver = () => {
      calls++;
      return new Promise<EntityTask>((resolve) => {
        release = resolve;
      });
    };

    const claims = [1, 2, 3].map(() => service.claim('run-1', 'minfadian', resolver));
    await flushPromises();
    release(finishedTask('minfadian'));
    const results = await Promise.all(claims);

    expect(calls).toBe(1);
    expect(results.map((r) => r.fromCache)).toEqual([false, true, true]);
    expect(results[1].task).toBe(results[0].task);
  });

  it('skips entities a finished run already acquired', async () => {
    const resolver = jest.fn(async () => finishedTask('minfadian'));

    const first = await service.claim('run-1', 'minfadian', resolver);
    service.forgetRun('run-1');
    const second = await service.claim('run-2', 'minfadian', resolver);

    expect(resolver).toHaveBeenCalledTimes(1);
    expect(first.fromCache).toBe(false);
    expect(second).toEqual({ task: first.task, fromCache: true });
  });

  it('stores succeeded tasks under the entity key', async () => {
    await service.claim('run-1', 'minfadian', async () => finishedTask('minfadian'));

    const stored = await cache.get<EntityTask>('dedupe:minfadian');
    expect(stored?.status).toBe('Succeeded');
  });

  it('resolves failed entities again in a later run', async () => {
    const resolver = jest.fn(async () =>
      finishedTask('minfadian', Verdict.HARD_BLOCK),
    );

    const first = await service.claim('run-1', 'minfadian', resolver);
    const again = await service.claim('run-1', 'minfadian', resolver);
    service.forgetRun('run-1');
    const later = await service.claim('run-2', 'minfadian', resolver);

    expect(resolver).toHaveBeenCalledTimes(2);
    expect(again).toEqual({ task: first.task, fromCache: true });
    expect(later.fromCache).toBe(false);
    await expect(cache.get('dedupe:minfadian')).resolves.toBeUndefined();
  });

  it('does not store cancelled tasks', async () => {
    await service.claim('run-1', 'minfadian', async () =>
      finishedTask('minfadian', Verdict.CANCELLED),
    );

    await expect(cache.get('dedupe:minfadian')).resolves.toBeUndefined();
  });

  it('ignores a stored entry that is not a succeeded task', async () => {
    await cache.set('dedupe:minfadian', { status: 'Pending' });
    const resolver = jest.fn(async () => finishedTask('minfadian'));

    const result = await service.claim('run-1', 'minfadian', resolver);

    expect(resolver).toHaveBeenCalledTimes(1);
    expect(result.fromCache).toBe(false);
  });
});
