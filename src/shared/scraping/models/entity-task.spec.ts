import { IllegalTaskTransitionError } from '@/shared/errors/crawl.errors';
import { Verdict } from '../enums/verdict.enum';
import { EntityTaskRecord } from './entity-task';

const NOW = '2026-01-01T00:00:00.000Z';
const LATER = '2026-01-01T00:00:05.000Z';

describe('EntityTaskRecord', () => {
  const attempt = {
    entityKey: '民法典',
    strategyName: 'structured-database',
    site: 'flk.npc.gov.cn',
    proxyUsed: 'hk-primary',
    startedAt: NOW,
    durationMs: 120,
    verdict: Verdict.HARD_BLOCK,
    httpStatus: 403,
  };

  it('moves Pending → InProgress → Failed and freezes the result', () => {
    const record = new EntityTaskRecord('民法典', '民法典', { name: '民法典' });
    expect(record.currentStatus).toBe('Pending');

    record.start(NOW);
    record.addAttempt(attempt);
    const task = record.fail(Verdict.HARD_BLOCK, LATER, 'HTTP 403');

    expect(task).toEqual({
      entityKey: '民法典',
      rawQuery: '民法典',
      request: { name: '民法典' },
      status: 'Failed',
      attempts: [attempt],
      finalVerdict: Verdict.HARD_BLOCK,
      detail: 'HTTP 403',
      startedAt: NOW,
      finishedAt: LATER,
    });
    expect(Object.isFrozen(task)).toBe(true);
    expect(Object.isFrozen(task.attempts)).toBe(true);
    expect(Object.isFrozen(task.attempts[0])).toBe(true);
  });

  it('records the payload on success', () => {
    const record = new EntityTaskRecord('民法典', '民法典', { name: '民法典' });
    record.start(NOW);

    const task = record.succeed(
      {
        strategyName: 'search-engine',
        sourceUrl: 'https://cn.bing.com/search?q=x',
        contentType: 'text/html',
        body: '<html></html>',
      },
      LATER,
    );

    expect(task.status).toBe('Succeeded');
    expect(task.finalVerdict).toBe(Verdict.SUCCESS);
    expect(task.payload?.strategyName).toBe('search-engine');
  });

  it('rejects attempts before start and transitions after the end', () => {
    const record = new EntityTaskRecord('民法典', '民法典', { name: '民法典' });

    expect(() => record.addAttempt(attempt)).toThrow(IllegalTaskTransitionError);

    record.start(NOW);
    record.fail(Verdict.PARSE_FAILURE, LATER);

    expect(() => record.start(NOW)).toThrow(
      'Entity task 民法典 cannot move from Failed to InProgress',
    );
    expect(() => record.fail(Verdict.PARSE_FAILURE, LATER)).toThrow(
      IllegalTaskTransitionError,
    );
  });
});
