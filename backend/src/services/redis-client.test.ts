/**
 * RedisMarketStore Tests
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { Bool, Field, UInt64 } from 'o1js';
import { DIRECTION, Market, Position, PlatformConfig } from '../../../contracts/src/index.js';
import { randomAddress } from '../../../contracts/src/test-helpers.js';
import { FakeRedis } from '../test-helpers.js';
import { RedisMarketStore } from './redis-client.js';

function sampleMarket(): Market {
  return Market.create(UInt64.from(45_000_000_000n), UInt64.from(1000), UInt64.from(2000), UInt64.from(500));
}

describe('RedisMarketStore', () => {
  let redis: FakeRedis;
  let store: RedisMarketStore;

  beforeEach(() => {
    redis = new FakeRedis();
    store = new RedisMarketStore(redis);
  });

  it('should allocate market ids from 1 and index them', async () => {
    const first = await store.insertMarket(sampleMarket());
    const second = await store.insertMarket(sampleMarket());

    assert.strictEqual(first.toString(), '1');
    assert.strictEqual(second.toString(), '2');
    assert.strictEqual(await store.marketCount(), 2);
    assert.deepStrictEqual((await store.listMarketIds()).map(String), ['1', '2']);

    const stored = await store.getMarket(first);
    assert.strictEqual(stored?.referencePrice.toString(), '45000000000');
    assert.strictEqual(stored?.closeAt.toString(), '2000');
  });

  it('should write a position, its index entry and the market together', async () => {
    const marketId = await store.insertMarket(sampleMarket());
    const participant = randomAddress();
    const stake = UInt64.from(3_000_000);

    await store.commitPosition(
      marketId,
      sampleMarket().withStake(Bool(true), stake),
      participant,
      Position.open(DIRECTION.UP, stake, UInt64.from(1200))
    );

    const positions = await store.listPositions(marketId);
    assert.strictEqual(positions.length, 1);
    assert.ok(positions[0].participant.equals(participant).toBoolean());
    assert.strictEqual(positions[0].position.placedAt.toString(), '1200');
    assert.strictEqual((await store.getMarket(marketId))?.totalUpStake.toString(), '3000000');
  });

  it('should leave nothing behind when the commit aborts', async () => {
    const marketId = await store.insertMarket(sampleMarket());
    const participant = randomAddress();
    const stake = UInt64.from(3_000_000);

    redis.failNextExec = true;
    await assert.rejects(
      store.commitPosition(
        marketId,
        sampleMarket().withStake(Bool(true), stake),
        participant,
        Position.open(DIRECTION.UP, stake, UInt64.from(1200))
      ),
      /EXEC aborted/
    );

    assert.strictEqual(await store.getPosition(marketId, participant), undefined);
    assert.deepStrictEqual(await store.listPositions(marketId), []);
    assert.strictEqual((await store.getMarket(marketId))?.totalUpStake.toString(), '0');
  });

  it('should refuse a malformed record', async () => {
    redis.values.set('market:1', JSON.stringify({ referencePrice: 5 }));
    await assert.rejects(store.getMarket(Field(1)), /Malformed record at market:1/);
  });

  it('should persist the platform config', async () => {
    assert.strictEqual(await store.loadConfig(), undefined);

    const admin = randomAddress();
    await store.saveConfig(
      new PlatformConfig({
        admin,
        oracle: randomAddress(),
        treasury: admin,
        minimumStake: UInt64.from(7),
        platformFeeBasisPoints: UInt64.from(150),
      })
    );

    const loaded = await store.loadConfig();
    assert.ok(loaded?.admin.equals(admin).toBoolean());
    assert.strictEqual(loaded?.minimumStake.toString(), '7');
    assert.strictEqual(loaded?.platformFeeBasisPoints.toString(), '150');
  });
});

