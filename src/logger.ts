import winston from 'winston';
import fs from 'fs';
import path from 'path';

const ledgerLevels = {
    levels: {
        fatal: 0,
        error: 1,
        warn: 2,
        info: 3,
        verbose: 4,
        debug: 5,
        trace: 6,
    },
    colors: {
        fatal: 'redBG white',
        error: 'red',
        warn: 'yellow',
        info: 'green',
        verbose: 'blue',
        debug: 'white',
        trace: 'grey',
    },
};

type LedgerLevel = keyof typeof ledgerLevels.levels;

function isLedgerLevel(level: string): level is LedgerLevel {
    return Object.prototype.hasOwnProperty.call(ledgerLevels.levels, level);
}

function resolveLevel(raw: string | undefined): LedgerLevel {
    const level = (raw || 'info').toLowerCase();
    if (isLedgerLevel(level)) {
        return level;
    }
    console.warn(`Invalid LOG_LEVEL "${level}", falling back to "info". Valid levels: ${Object.keys(ledgerLevels.levels).join(', ')}`);
    return 'info';
}

winston.addColors(ledgerLevels.colors);

const level = resolveLevel(process.env.LOG_LEVEL);

const transports: Array<winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance> = [
    new winston.transports.Console({
        format: winston.format.combine(
            winston.format.colorize(),
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            winston.format.printf(({ timestamp, level, message, ...meta }) => {
                const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
                return `[${timestamp}] ${level}: ${message} ${metaStr}`;
            })
        ),
    }),
];

// File output only when LOG_DIR is set
const logsDir = process.env.LOG_DIR;
if (logsDir) {
    fs.mkdirSync(logsDir, { recursive: true });
    transports.push(
        new winston.transports.File({
            filename: path.join(logsDir, `ledger-${process.env.NODE_NAME || process.pid}.log`),
            format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        })
    );
}

const base = winston.createLogger({
    levels: ledgerLevels.levels,
    level,
    silent: process.env.LOG_SILENT === 'true',
    format: winston.format.errors({ stack: true }),
    transports,
});

const logger = Object.assign(base, {
    fatal: (message: string) => base.log('fatal', message),
    trace: (message: string) => base.log('trace', message),
});

export default logger;
