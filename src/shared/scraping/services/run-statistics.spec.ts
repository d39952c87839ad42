import { Verdict } from '../enums/verdict.enum';
import {
  AcquisitionAttempt,
  EntityTask,
} from '../interfaces/acquisition.interface';
import { RunStatisticsRecorder } from './run-statistics';

function attempt(
  site: string,
  verdict: Verdict,
  proxyUsed: string | null = null,
): AcquisitionAttempt {
  return {
    entityKey: '民法典',
    strategyName: 'structured-database',
    site,
    proxyUsed,
    startedAt: '2026-01-01T00:00:00.000Z',
    durationMs: 10,
    verdict,
  };
}

function task(
  attempts: AcquisitionAttempt[],
  status: EntityTask['status'],
  finalVerdict: Verdict,
): EntityTask {
  return {
    entityKey: '民法典',
    rawQuery: '民法典',
    request: { name: '民法典' },
    status,
    attempts,
    finalVerdict,
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:00:01.000Z',
  };
}

describe('RunStatisticsRecorder', () => {
  it('counts block verdicts per site', () => {
    const recorder = new RunStatisticsRecorder(2);

    recorder.record({
      request: { name: '民法典' },
      entityKey: '民法典',
      fromCache: false,
      task: task(
        [
          attempt('flk.npc.gov.cn', Verdict.HARD_BLOCK),
          attempt('www.baidu.com', Verdict.SOFT_BLOCK),
          attempt('www.baidu.com', Verdict.RATE_LIMITED),
          attempt('www.gov.cn', Verdict.SUCCESS, 'hk-primary'),
        ],
        'Succeeded',
        Verdict.SUCCESS,
      ),
    });
    recorder.record({
      request: { name: '刑法' },
      entityKey: '刑法',
      fromCache: false,
      task: task(
        [attempt('flk.npc.gov.cn', Verdict.SOFT_BLOCK)],
        'Failed',
        Verdict.SOFT_BLOCK,
      ),
    });

    expect(recorder.snapshot()).toEqual({
      totalEntities: 2,
      succeeded: 1,
      failed: 1,
      cancelled: 0,
      cacheHits: 0,
      notAdmitted: 0,
      attemptsTotal: 5,
      perStrategySuccessCount: { 'structured-database': 1 },
      perProxySuccessCount: { 'hk-primary': 1 },
      wafTriggeredCount: 3,
      wafTriggeredBySite: { 'flk.npc.gov.cn': 2, 'www.baidu.com': 1 },
    });
  });

  it('does not count the attempts of a cached task again', () => {
    const recorder = new RunStatisticsRecorder(1);

    recorder.record({
      request: { name: '民法典' },
      entityKey: '民法典',
      fromCache: true,
      task: task(
        [attempt('flk.npc.gov.cn', Verdict.HARD_BLOCK)],
        'Succeeded',
        Verdict.SUCCESS,
      ),
    });

    const stats = recorder.snapshot();
    expect(stats.cacheHits).toBe(1);
    expect(stats.wafTriggeredBySite).toEqual({});
    expect(stats.perStrategySuccessCount).toEqual({});
  });
});
