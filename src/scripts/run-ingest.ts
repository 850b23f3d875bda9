/**
 * Run Ingest Script
 * Ingests in-process, without the queue.
 *
 *   npm run ingest -- <userId>    one user
 *   npm run ingest -- --due       every user whose interval has elapsed
 *   npm run ingest -- --all       every user
 */
import { createAppContext } from '../app.js';
import { config } from '../config/index.js';
import { logger } from '../observability/logger.js';
import { isUserDue } from '../services/scheduler.service.js';
import { errorMessage } from '../utils/errors.js';

async function runIngest(): Promise<number> {
    const arg = process.argv[2];
    if (!arg) {
        console.error('Usage: run-ingest <userId> | --due | --all');
        return 2;
    }

    const { store, ingestService } = createAppContext(config);

    try {
        await store.ensureSchema();

        let userIds: number[];
        if (arg === '--all' || arg === '--due') {
            const now = new Date();
            const users = await store.listUsers();
            userIds = users.filter((user) => arg === '--all' || isUserDue(user, now)).map((user) => user.id);
        } else {
            const userId = Number(arg);
            if (!Number.isInteger(userId) || userId <= 0) {
                console.error(`Invalid user id: ${arg}`);
                return 2;
            }
            userIds = [userId];
        }

        logger.info('Starting ingestion run', { users: userIds.length });

        let failed = 0;
        for (const userId of userIds) {
            try {
                const outcome = await ingestService.ingest(userId);
                logger.info('User ingested', { userId, ...outcome.totals });
            } catch (error) {
                // One user's failure does not stop the batch
                failed++;
                logger.error('User ingestion failed', error, { userId, reason: errorMessage(error) });
            }
        }

        logger.info('Ingestion run complete', { users: userIds.length, failed });
        return failed > 0 ? 1 : 0;
    } finally {
        await store.close();
    }
}

// Run the script
runIngest()
    .then((code) => {
        process.exit(code);
    })
    .catch((error) => {
        console.error('Ingestion run failed:', error);
        process.exit(1);
    });
