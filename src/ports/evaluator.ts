/**
 * Reward Consumer Port
 *
 * The evaluation/training stage that receives one ScalarReward per tick.
 */

import type { TickContext } from '../types/event.js';
import type { ScalarReward } from '../types/reward.js';

export interface IRewardConsumer {
  consume(reward: ScalarReward, context: TickContext): void | Promise<void>;
}
