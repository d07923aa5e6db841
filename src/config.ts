import { ScheduleSeed } from './staking/staking-interfaces.js';

const config = {
    ledgerName: 'Locked Staking Ledger',
    stakingTokenSymbol: 'STK',
    stakingTokenPrecision: 8,
    // account holding pooled principal and reward funds
    poolAccount: 'staking-pool',
    operatorAccount: 'ledger-operator',
    secondsPerDay: 86400,
    percentDenominator: 100,
    maxValue: '999999999999999999999999999999',
    maxLockDays: 3650,
    maxPercentage: 100000,
    allowedUsernameChars: 'abcdefghijklmnopqrstuvwxyz0123456789.-',
    accountMinLength: 3,
    accountMaxLength: 32,
    defaultSchedules: [
        { lockDays: 90, percentage: 10 },
        { lockDays: 180, percentage: 20 },
        { lockDays: 360, percentage: 40 },
    ] as ReadonlyArray<ScheduleSeed>,
};

export default config;
