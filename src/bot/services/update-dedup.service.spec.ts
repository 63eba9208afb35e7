import { ConfigService } from '@nestjs/config';
import { RedisService } from '../../redis';
import { UpdateDedupService } from './update-dedup.service';

describe('UpdateDedupService', () => {
  let dedup: UpdateDedupService;

  beforeEach(() => {
    dedup = new UpdateDedupService(new RedisService(new ConfigService({})));
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('claims an update once', async () => {
    expect(await dedup.begin(1)).toBe('new');
    expect(await dedup.begin(1)).toBe('processing');
    expect(await dedup.begin(2)).toBe('new');
  });

  it('reports completed updates as done', async () => {
    await dedup.begin(1);
    await dedup.complete(1);

    expect(await dedup.begin(1)).toBe('done');
  });

  it('releases an abandoned update for redelivery', async () => {
    await dedup.begin(1);
    await dedup.abandon(1);

    expect(await dedup.begin(1)).toBe('new');
  });

  it('frees a stuck claim after the processing TTL', async () => {
    jest.useFakeTimers();
    await dedup.begin(1);

    jest.advanceTimersByTime(121_000);

    expect(await dedup.begin(1)).toBe('new');
  });
});
