import type { RpcClient } from '../rpc.js';
import { RpcError } from '../errors.js';
import { decodeWords, toInt256 } from '../signals/codec.js';
import type { FeedReading } from '../signals/schemas.js';
import type { FeedSource } from './sources.js';

// latestRoundData() → (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt, uint80 answeredInRound)
export const LATEST_ROUND_DATA = '0xfeaf968c';

export function decodeLatestRoundData(result: unknown): FeedReading {
  if (typeof result !== 'string') throw new RpcError('eth_call returned non-string result');
  let words: bigint[];
  try {
    words = decodeWords(result, 5);
  } catch (e) {
    // e.g. `0x` when nothing is deployed at the feed address
    throw new RpcError(`unexpected latestRoundData result: ${e instanceof Error ? e.message : String(e)}`);
  }
  const [, answer, , updatedAt] = words;
  return { rawValue: toInt256(answer), updatedAt: Number(updatedAt) * 1000 };
}

/** Price aggregator contract read over JSON-RPC. */
export class AggregatorFeedSource implements FeedSource {
  constructor(readonly id: string, private readonly address: string, private readonly rpc: RpcClient) {}

  async readLatest(): Promise<FeedReading> {
    const result = await this.rpc.call('eth_call', [{ to: this.address, data: LATEST_ROUND_DATA }, 'latest']);
    return decodeLatestRoundData(result);
  }
}
