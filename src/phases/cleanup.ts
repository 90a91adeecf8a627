import * as Logging from '@/logging';
import * as Storage from '@/util/storage';
import { workRoot } from '@/acquisition';
import { errorMessage } from '@/errors';
import type { Station } from '@/flow';
import type { SharedContext } from '@/pipeline/types';

export type CleanupSignal = 'done';

/**
 * Removes whatever scratch space units left behind. A failure here is
 * logged and never fails the run.
 */
export const create = (): Station<SharedContext, CleanupSignal, string, boolean> => ({
    name: 'cleanup',

    async prepare(context) {
        return workRoot(context.config.tempDir);
    },

    async execute(directory) {
        const logger = Logging.getLogger();
        const storage = Storage.create({ log: (message, ...args) => logger.debug(message, ...args) });
        try {
            await storage.deleteDirectory(directory);
            return true;
        } catch (error) {
            logger.warn('Could not remove %s: %s', directory, errorMessage(error));
            return false;
        }
    },

    async finalize() {
        return 'done';
    },
});
