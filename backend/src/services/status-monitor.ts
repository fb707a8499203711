/**
 * Market Status Monitor Service
 *
 * Phases are derived from the clock, so nothing is written here. The monitor
 * only reports markets whose window has closed and that still wait for the
 * oracle, once per market.
 */

import type { PredictionMarket, MarketId } from '../../../contracts/src/index.js';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Logs markets that newly entered CLOSED and returns their ids
 */
export async function checkAwaitingMarkets(
  market: PredictionMarket,
  reported: Set<string>
): Promise<MarketId[]> {
  const awaiting = await market.getMarketsAwaitingResolution();
  const fresh: MarketId[] = [];

  for (const marketId of awaiting) {
    const key = marketId.toString();
    if (reported.has(key)) continue;
    reported.add(key);
    fresh.push(marketId);
    console.log(`    Market #${key} → CLOSED (awaiting settlement price)`);
  }

  if (fresh.length > 0) {
    console.log(`    ${awaiting.length} market(s) awaiting resolution\n`);
  }

  return fresh;
}

/**
 * Status Monitor Service
 *
 * Runs every check interval; returns a function that stops it.
 */
export async function startStatusMonitor(
  market: PredictionMarket,
  intervalMs: number
): Promise<() => void> {
  console.log('\n STATUS MONITOR STARTED');
  console.log(`   Check interval: ${intervalMs / 1000}s`);
  console.log('   Monitors: OPEN → CLOSED (awaiting oracle)\n');

  const reported = new Set<string>();

  const tick = async () => {
    try {
      await checkAwaitingMarkets(market, reported);
    } catch (error) {
      console.error(' Status monitor error:', errorMessage(error));
    }
  };

  // Run immediately on startup
  await tick();

  const intervalId = setInterval(() => {
    void tick();
  }, intervalMs);

  return () => clearInterval(intervalId);
}
