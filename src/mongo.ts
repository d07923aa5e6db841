import { Db, MongoClient } from 'mongodb';
import logger from './logger.js';
import settings from './settings.js';

let client: MongoClient | null = null;

export const mongo = {
    init: async (url: string = settings.mongoUrl, dbName: string = settings.mongoDb): Promise<Db> => {
        try {
            client = new MongoClient(url, {});
            await client.connect();
            const db = client.db(dbName);
            logger.info(`Connected to ${url}/${db.databaseName}`);
            await mongo.addMongoIndexes(db);
            return db;
        } catch (err) {
            logger.error('MongoDB init error:', err);
            throw err;
        }
    },

    addMongoIndexes: async (db: Db): Promise<void> => {
        await db.collection('stakes').createIndex({ isActive: 1 });
        await db.collection('events').createIndex({ seq: 1 }, { unique: true });
        await db.collection('events').createIndex({ actor: 1, timestamp: -1 });
        logger.debug('[mongo] Indexes ensured.');
    },

    close: async (): Promise<void> => {
        if (client) {
            await client.close();
            logger.info('[mongo] Connection closed.');
        }
        client = null;
    },
};

export default mongo;
