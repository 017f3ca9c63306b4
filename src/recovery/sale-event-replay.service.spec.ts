import {
  createEngineFixture,
  EngineFixture,
  testEngineConfig,
} from '../../test/support/engine-fixture.js';
import { runSaleScenario, toRecords } from '../../test/support/sale-scenario.js';
import { SaleEventRecord } from '../events/sale-event.entity.js';
import { SaleEventReplayService } from './sale-event-replay.service.js';
import { SaleStateReplayer } from './sale-state-replayer.js';

describe('SaleEventReplayService', () => {
  let records: SaleEventRecord[];
  let rebuilt: EngineFixture;
  let find: jest.Mock;
  let getJobCounts: jest.Mock;
  let resumeAfter: jest.Mock;

  function createService(
    overrides: Parameters<typeof testEngineConfig>[0] = {},
  ): SaleEventReplayService {
    return new SaleEventReplayService(
      { find },
      { getJobCounts },
      { resumeAfter },
      new SaleStateReplayer(
        rebuilt.engine,
        rebuilt.registry,
        rebuilt.ledger,
        rebuilt.native,
        rebuilt.tokens,
        rebuilt.directory,
      ),
      testEngineConfig({ replayOnBoot: true, ...overrides }),
    );
  }

  beforeEach(() => {
    const source = createEngineFixture();
    runSaleScenario(source);
    records = toRecords(source.sink.events);
    rebuilt = createEngineFixture();
    find = jest.fn().mockResolvedValue(records);
    getJobCounts = jest.fn().mockResolvedValue({ waiting: 0, active: 0, delayed: 0 });
    resumeAfter = jest.fn();
  });

  it('should replay the log and continue its numbering', async () => {
    await createService().onApplicationBootstrap();

    expect(find).toHaveBeenCalledTimes(1);
    expect(find.mock.calls[0][0]).toMatchObject({
      order: { sequence: 'ASC' },
      take: 500,
    });
    expect(resumeAfter).toHaveBeenCalledWith(records.length);
    expect(rebuilt.registry.get(7)?.saleVersion).toBe(2);
    expect(rebuilt.engine.isPaused()).toBe(true);
  });

  it('should wait for queued events before reading the log', async () => {
    getJobCounts
      .mockResolvedValueOnce({ waiting: 2, active: 1, delayed: 0 })
      .mockResolvedValueOnce({ waiting: 0, active: 0, delayed: 0 });

    await createService().onApplicationBootstrap();

    expect(getJobCounts).toHaveBeenCalledTimes(2);
    expect(getJobCounts).toHaveBeenCalledWith('waiting', 'active', 'delayed');
    expect(resumeAfter).toHaveBeenCalledWith(records.length);
  });

  it('should refuse to start while events are still queued', async () => {
    getJobCounts.mockResolvedValue({ waiting: 3, active: 0, delayed: 0 });

    await expect(
      createService({ replayQueueTimeoutMs: 0 }).onApplicationBootstrap(),
    ).rejects.toThrow('3 sale event(s) still queued after 0ms');
    expect(find).not.toHaveBeenCalled();
  });

  it('should start empty when replay is disabled', async () => {
    await createService({ replayOnBoot: false }).onApplicationBootstrap();

    expect(getJobCounts).not.toHaveBeenCalled();
    expect(find).not.toHaveBeenCalled();
    expect(rebuilt.registry.get(7)).toBeUndefined();
  });

  it('should stop at a record that does not fit the rebuilt state', async () => {
    find.mockResolvedValue(records.slice(1));

    await expect(createService().replay()).rejects.toThrow();
    expect(resumeAfter).not.toHaveBeenCalled();
  });
});
