import type { PlannerConfig } from "./schema";
import { byName, groupBy } from "./stats";
import type { Action, ChannelBatch } from "./types";

/**
 * Groups the head of the ranked queue by channel. `rankedQueue` must already
 * be in compareActions order; batches keep that order.
 */
export function buildChannelBatches(rankedQueue: readonly Action[], config: PlannerConfig): ChannelBatch[] {
  const pool = rankedQueue.slice(0, config.channel_batch_pool);
  const groups = groupBy(pool, (action) => action.channel);

  return [...groups.entries()]
    .map(([channel, members]) => ({
      channel,
      count: members.length,
      actions: members.slice(0, config.channel_batch_size),
    }))
    .sort((a, b) => b.count - a.count || byName(a.channel, b.channel))
    .slice(0, config.channel_batch_limit);
}
