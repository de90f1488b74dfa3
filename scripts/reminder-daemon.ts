#!/usr/bin/env ts-node
/**
 * Headless reminder runner
 *
 * Loads the lists, re-arms every future reminder and shows the notifications
 * as they come due. Exits once nothing is pending, or on SIGINT/SIGTERM.
 *
 * Usage:
 *   TODO_DATA_FILE=./todo_data.json ts-node scripts/reminder-daemon.ts
 */

import { validateConfig } from '../lib/config';
import { createTodoService } from '../lib/todo-service';
import { logError, logger } from '../lib/logger';

async function main(): Promise<void> {
    const check = validateConfig();
    if (!check.valid) {
        check.errors.forEach((error) => logger.fatal(error));
        process.exitCode = 1;
        return;
    }

    const service = createTodoService();
    const started = await service.start();
    if (!started.ok) {
        logger.fatal(started.error);
        process.exitCode = 1;
        return;
    }

    const { armed, cleared } = started.value;
    logger.info({ armed, cleared }, `${armed.length} reminder(s) pending`);

    const shutdown = (signal: NodeJS.Signals): void => {
        logger.info({ signal }, 'Shutting down');
        service.stop().catch((error: unknown) => {
            logError(error, { operation: 'shutdown' });
            process.exitCode = 1;
        });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
    logError(error, { operation: 'startup' });
    process.exitCode = 1;
});
