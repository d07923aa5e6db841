import { isEmptyData, StakingContext, TransactionOutput } from '../handler-types.js';
import { EmptyData } from '../types.js';

export function validateTx(data: unknown, sender: string): data is EmptyData {
    return isEmptyData(data, 'claim-reward', sender);
}

export async function processTx(_data: EmptyData, sender: string, ctx: StakingContext): Promise<TransactionOutput> {
    const reward = await ctx.ledger.claimReward(sender);
    const record = ctx.ledger.getStake(sender);
    return {
        reward: reward.toString(),
        totalClaimed: record.totalClaimed.toString(),
        lastClaimTime: record.lastClaimTime,
    };
}
