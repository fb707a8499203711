/**
 * Request parsing tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Field } from 'o1js';
import { DIRECTION, MARKET_ERROR, isMarketError } from '../../../contracts/src/index.js';
import { randomAddress } from '../../../contracts/src/test-helpers.js';
import { parseAmount, parseAddress, parseDirection, parseMarketId, directionLabel } from './market-service.js';

function assertCode(fn: () => unknown, code: string) {
  assert.throws(fn, (error: unknown) => isMarketError(error) && error.code === code);
}

describe('Request parsing', () => {
  it('should accept decimal strings and safe integers as amounts', () => {
    assert.strictEqual(parseAmount('18446744073709551615', 'x').toString(), '18446744073709551615');
    assert.strictEqual(parseAmount(42, 'x').toString(), '42');
    assert.strictEqual(parseAmount('0', 'x').toString(), '0');
  });

  it('should reject amounts outside the unsigned 64-bit range', () => {
    assertCode(() => parseAmount('18446744073709551616', 'x'), MARKET_ERROR.INVALID_PARAMETERS);
    assertCode(() => parseAmount(-1, 'x'), MARKET_ERROR.INVALID_PARAMETERS);
    assertCode(() => parseAmount(1.5, 'x'), MARKET_ERROR.INVALID_PARAMETERS);
    assertCode(() => parseAmount('1e6', 'x'), MARKET_ERROR.INVALID_PARAMETERS);
    assertCode(() => parseAmount(undefined, 'x'), MARKET_ERROR.INVALID_PARAMETERS);
  });

  it('should parse market ids', () => {
    assert.strictEqual(parseMarketId('7').toString(), '7');
    assertCode(() => parseMarketId('7a'), MARKET_ERROR.INVALID_PARAMETERS);
    assert.strictEqual(parseMarketId('18446744073709551615').toString(), '18446744073709551615');
    assertCode(() => parseMarketId('18446744073709551616'), MARKET_ERROR.INVALID_PARAMETERS);
  });

  it('should not wrap ids past the field order onto existing markets', () => {
    assertCode(() => parseMarketId((Field.ORDER + 1n).toString()), MARKET_ERROR.INVALID_PARAMETERS);
  });

  it('should map direction labels both ways', () => {
    assert.ok(parseDirection('UP').equals(DIRECTION.UP).toBoolean());
    assert.ok(parseDirection('DOWN').equals(DIRECTION.DOWN).toBoolean());
    assert.strictEqual(directionLabel(DIRECTION.DOWN), 'DOWN');
    assertCode(() => parseDirection('up'), MARKET_ERROR.INVALID_PREDICTION);
  });

  it('should parse base58 addresses', () => {
    const address = randomAddress();
    assert.ok(parseAddress(address.toBase58(), 'a').equals(address).toBoolean());
    assertCode(() => parseAddress(12, 'a'), MARKET_ERROR.INVALID_PARAMETERS);
  });
});
