/**
 * HTTP API Tests
 *
 * The app runs on an ephemeral local port over the in-memory store,
 * escrow and a manual clock.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { once } from 'node:events';
import type { Server } from 'node:http';
import type { PublicKey } from 'o1js';
import { createTestPlatform, randomAddress, type TestPlatform } from '../../contracts/src/test-helpers.js';
import { createApp } from './app.js';
import { CALLER_HEADER, bodyField } from './routes/http.js';

interface ApiResponse {
  status: number;
  body: unknown;
}

describe('HTTP API', () => {
  let platform: TestPlatform;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    platform = await createTestPlatform();
    server = createApp(platform.market, { devEscrow: platform.escrow }).listen(0, '127.0.0.1');
    await once(server, 'listening');
    const address = server.address();
    assert.ok(address !== null && typeof address === 'object');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    server.close();
    await once(server, 'close');
  });

  async function call(
    method: string,
    path: string,
    options: { caller?: PublicKey; body?: object } = {}
  ): Promise<ApiResponse> {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (options.caller) headers[CALLER_HEADER] = options.caller.toBase58();

    const response = await fetch(`${baseUrl}${path}`, {
      method,
      headers,
      body: options.body ? JSON.stringify(options.body) : undefined,
    });
    return { status: response.status, body: await response.json() };
  }

  async function createMarket(): Promise<void> {
    const created = await call('POST', '/api/markets', {
      caller: platform.admin,
      body: { referencePrice: '45000000000', openAt: '1000', closeAt: '2000' },
    });
    assert.strictEqual(created.status, 201);
  }

  async function fund(amount: string): Promise<PublicKey> {
    const participant = randomAddress();
    const deposited = await call('POST', '/api/dev/deposit', {
      body: { address: participant.toBase58(), amount },
    });
    assert.strictEqual(deposited.status, 200);
    return participant;
  }

  function assertError(response: ApiResponse, status: number, code: string) {
    assert.strictEqual(response.status, status);
    assert.strictEqual(bodyField(response.body, 'success'), false);
    assert.strictEqual(bodyField(response.body, 'code'), code);
  }

  it('should report health', async () => {
    const response = await call('GET', '/health');
    assert.strictEqual(response.status, 200);
    assert.deepStrictEqual(response.body, { success: true, status: 'ok', totalMarkets: 0 });
  });

  describe('Market creation', () => {
    it('should require a caller header', async () => {
      const response = await call('POST', '/api/markets', {
        body: { referencePrice: '1', openAt: '1000', closeAt: '2000' },
      });
      assertError(response, 401, 'UNAUTHORIZED');
    });

    it('should reject a non-admin caller with 403', async () => {
      const response = await call('POST', '/api/markets', {
        caller: randomAddress(),
        body: { referencePrice: '1', openAt: '1000', closeAt: '2000' },
      });
      assertError(response, 403, 'UNAUTHORIZED');
      assert.strictEqual(await platform.market.getTotalMarkets(), 0);
    });

    it('should reject malformed amounts', async () => {
      const response = await call('POST', '/api/markets', {
        caller: platform.admin,
        body: { referencePrice: '-5', openAt: '1000', closeAt: '2000' },
      });
      assertError(response, 400, 'INVALID_PARAMETERS');
    });

    it('should create a market and serve it with its phase', async () => {
      const created = await call('POST', '/api/markets', {
        caller: platform.admin,
        body: { referencePrice: '45000000000', openAt: 1000, closeAt: '2000' },
      });
      assert.strictEqual(created.status, 201);
      assert.deepStrictEqual(created.body, { success: true, marketId: '1' });

      const fetched = await call('GET', '/api/markets/1');
      assert.strictEqual(fetched.status, 200);
      assert.deepStrictEqual(bodyField(fetched.body, 'market'), {
        marketId: '1',
        referencePrice: '45000000000',
        settlementPrice: '0',
        totalUpStake: '0',
        totalDownStake: '0',
        openAt: '1000',
        closeAt: '2000',
        resolved: false,
        createdAt: '500',
        phase: 'PENDING',
      });

      const listed = await call('GET', '/api/markets');
      assert.strictEqual(bodyField(listed.body, 'count'), 1);
    });

    it('should answer 404 for an unknown market and 400 for a malformed id', async () => {
      assertError(await call('GET', '/api/markets/99'), 404, 'NOT_FOUND');
      assertError(await call('GET', '/api/markets/abc'), 400, 'INVALID_PARAMETERS');
    });
  });

  describe('Positions', () => {
    it('should reject a prediction before the window opens', async () => {
      await createMarket();
      const participant = await fund('10000000');

      const response = await call('POST', '/api/markets/1/positions', {
        caller: participant,
        body: { direction: 'UP', stakeAmount: '10000000' },
      });
      assertError(response, 409, 'MARKET_INACTIVE');
    });

    it('should reject an unknown direction', async () => {
      await createMarket();
      const participant = await fund('10000000');
      platform.clock.set(1500);

      const response = await call('POST', '/api/markets/1/positions', {
        caller: participant,
        body: { direction: 'SIDEWAYS', stakeAmount: '10000000' },
      });
      assertError(response, 400, 'INVALID_PREDICTION');
    });

    it('should answer 402 when the stake is not covered', async () => {
      await createMarket();
      const participant = await fund('1000000');
      platform.clock.set(1500);

      const response = await call('POST', '/api/markets/1/positions', {
        caller: participant,
        body: { direction: 'DOWN', stakeAmount: '2000000' },
      });
      assertError(response, 402, 'INSUFFICIENT_FUNDS');
    });

    it('should record a position once per participant', async () => {
      await createMarket();
      const participant = await fund('20000000');
      platform.clock.set(1500);

      const placed = await call('POST', '/api/markets/1/positions', {
        caller: participant,
        body: { direction: 'UP', stakeAmount: '10000000' },
      });
      assert.strictEqual(placed.status, 201);
      assert.deepStrictEqual(bodyField(placed.body, 'position'), {
        marketId: '1',
        participant: participant.toBase58(),
        direction: 'UP',
        stakeAmount: '10000000',
        claimed: false,
        placedAt: '1500',
      });

      const again = await call('POST', '/api/markets/1/positions', {
        caller: participant,
        body: { direction: 'DOWN', stakeAmount: '10000000' },
      });
      assertError(again, 409, 'POSITION_EXISTS');

      const listed = await call('GET', '/api/markets/1/positions');
      assert.strictEqual(bodyField(listed.body, 'count'), 1);
    });
  });

  describe('Settlement', () => {
    it('should run a market from creation to claims', async () => {
      await createMarket();
      const p1 = await fund('10000000');
      const p2 = await fund('20000000');

      platform.clock.set(1500);
      await call('POST', '/api/markets/1/positions', {
        caller: p1,
        body: { direction: 'UP', stakeAmount: '10000000' },
      });
      await call('POST', '/api/markets/1/positions', {
        caller: p2,
        body: { direction: 'DOWN', stakeAmount: '20000000' },
      });

      platform.clock.set(2000);
      const awaiting = await call('GET', '/api/markets/awaiting');
      assert.deepStrictEqual(awaiting.body, { success: true, count: 1, marketIds: ['1'] });

      const early = await call('POST', '/api/markets/1/claim', { caller: p1 });
      assertError(early, 409, 'MARKET_UNRESOLVED');

      const notOracle = await call('POST', '/api/markets/1/resolve', {
        caller: platform.admin,
        body: { settlementPrice: '47000000000' },
      });
      assertError(notOracle, 403, 'UNAUTHORIZED');

      const resolved = await call('POST', '/api/markets/1/resolve', {
        caller: platform.oracle,
        body: { settlementPrice: '47000000000' },
      });
      assert.strictEqual(resolved.status, 200);
      assert.strictEqual(bodyField(bodyField(resolved.body, 'market'), 'phase'), 'RESOLVED');

      const quote = await call('GET', `/api/markets/1/quote/${p1.toBase58()}`);
      assert.deepStrictEqual(quote.body, {
        success: true,
        gross: '30000000',
        fee: '600000',
        net: '29400000',
      });

      const claimed = await call('POST', '/api/markets/1/claim', { caller: p1 });
      assert.deepStrictEqual(claimed.body, { success: true, payout: '29400000' });

      assertError(await call('POST', '/api/markets/1/claim', { caller: p1 }), 409, 'ALREADY_CLAIMED');
      assertError(await call('POST', '/api/markets/1/claim', { caller: p2 }), 400, 'INVALID_PREDICTION');
      assertError(
        await call('POST', '/api/markets/1/claim', { caller: randomAddress() }),
        404,
        'NOT_FOUND'
      );

      const balance = await call('GET', `/api/dev/balance/${p1.toBase58()}`);
      assert.strictEqual(bodyField(balance.body, 'balance'), '29400000');
    });
  });

  describe('Platform config', () => {
    it('should serve the current config', async () => {
      const response = await call('GET', '/api/config');
      assert.deepStrictEqual(bodyField(response.body, 'config'), {
        admin: platform.admin.toBase58(),
        oracle: platform.oracle.toBase58(),
        treasury: platform.treasury.toBase58(),
        minimumStake: '1000000',
        platformFeeBasisPoints: '200',
      });
    });

    it('should let only the admin update it', async () => {
      const outsider = await call('PUT', '/api/config', {
        caller: randomAddress(),
        body: { platformFeeBasisPoints: '500' },
      });
      assertError(outsider, 403, 'UNAUTHORIZED');

      const tooHigh = await call('PUT', '/api/config', {
        caller: platform.admin,
        body: { platformFeeBasisPoints: '2000' },
      });
      assertError(tooHigh, 400, 'INVALID_PARAMETERS');

      const updated = await call('PUT', '/api/config', {
        caller: platform.admin,
        body: { platformFeeBasisPoints: '500', minimumStake: '10' },
      });
      assert.strictEqual(updated.status, 200);
      assert.strictEqual(bodyField(bodyField(updated.body, 'config'), 'platformFeeBasisPoints'), '500');
      assert.strictEqual(platform.market.getConfig().minimumStake.toString(), '10');
    });

    it('should reject a malformed address', async () => {
      const response = await call('PUT', '/api/config', {
        caller: platform.admin,
        body: { oracle: 'not-a-key' },
      });
      assertError(response, 400, 'INVALID_PARAMETERS');
    });
  });
});
