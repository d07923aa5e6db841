import { isEmptyData, StakingContext, TransactionOutput } from '../handler-types.js';
import { EmptyData } from '../types.js';

export function validateTx(data: unknown, sender: string): data is EmptyData {
    return isEmptyData(data, 'unstake', sender);
}

export async function processTx(_data: EmptyData, sender: string, ctx: StakingContext): Promise<TransactionOutput> {
    const principal = await ctx.ledger.unstake(sender);
    return { principal: principal.toString() };
}
