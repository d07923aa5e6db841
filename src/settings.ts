// Runtime settings sourced from environment variables
import 'dotenv/config';
import config from './config.js';

export const nodeName: string = process.env.NODE_NAME || 'ledger-node';
export const operatorAccount: string = process.env.OPERATOR_ACCOUNT || config.operatorAccount;
export const poolAccount: string = process.env.POOL_ACCOUNT || config.poolAccount;
export const mongoUrl: string = process.env.MONGO_URL || 'mongodb://localhost:27017';
export const mongoDb: string = process.env.MONGO_DB || 'staking';
// Seed the default reward schedules on first start
export const seedDefaultSchedules: boolean = process.env.SEED_DEFAULT_SCHEDULES !== 'false';

export default {
    nodeName,
    operatorAccount,
    poolAccount,
    mongoUrl,
    mongoDb,
    seedDefaultSchedules,
};
