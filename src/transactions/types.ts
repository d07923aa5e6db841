export enum TransactionType {
    // Stake lifecycle
    STAKE = 1,
    UNSTAKE = 2,
    RESTAKE = 3,
    CLAIM_REWARD = 4,

    // Schedule catalog (operator only)
    SCHEDULE_UPSERT = 10,
    SCHEDULE_DISABLE = 11,
}

export const transactions: { [key in TransactionType]: string } = {
    [TransactionType.STAKE]: 'stake',
    [TransactionType.UNSTAKE]: 'unstake',
    [TransactionType.RESTAKE]: 'restake',
    [TransactionType.CLAIM_REWARD]: 'claim_reward',
    [TransactionType.SCHEDULE_UPSERT]: 'schedule_upsert',
    [TransactionType.SCHEDULE_DISABLE]: 'schedule_disable',
};

export interface StakeData {
    amount: string | bigint;
    scheduleIndex: number;
}

export interface RestakeData {
    scheduleIndex: number;
}

export interface ScheduleUpsertData {
    lockDays: number;
    percentage: number;
}

export interface ScheduleDisableData {
    index: number;
}

export type EmptyData = Record<string, never> | null | undefined;

export interface TransactionDataMap {
    [TransactionType.STAKE]: StakeData;
    [TransactionType.UNSTAKE]: EmptyData;
    [TransactionType.RESTAKE]: RestakeData;
    [TransactionType.CLAIM_REWARD]: EmptyData;
    [TransactionType.SCHEDULE_UPSERT]: ScheduleUpsertData;
    [TransactionType.SCHEDULE_DISABLE]: ScheduleDisableData;
}
