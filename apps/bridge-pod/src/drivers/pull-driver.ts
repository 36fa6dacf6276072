import { componentLogger, type Logger } from '../logger';
import { trackSyncFailure } from '../metrics';
import type { RoomNetwork, SyncBatch } from '../network/types';
import type { LocalCache } from '../storage/cache';
import type { CommandQueue } from '../sync/command-queue';
import type { CommandExecutor } from '../sync/executor';
import type { EventReconciler } from '../sync/reconciler';
import { runCommandLoop, sleep } from './command-loop';
import type { SyncDriver } from './types';

export const SYNC_TIMEOUT_MS = 30_000;
export const SYNC_BACKOFF_MS = 5_000;

export interface PullDriverOptions {
    network: RoomNetwork;
    cache: LocalCache;
    reconciler: EventReconciler;
    executor: CommandExecutor;
    graceMs: number;
    pollTimeoutMs?: number;
    backoffMs?: number;
    logger?: Logger;
}

/**
 * Long-polls /sync as the service user. The resume token is saved only after
 * a batch was reconciled, so a crash re-delivers rather than skips.
 */
export class PullDriver implements SyncDriver {
    readonly mode = 'pull' as const;
    private readonly log: Logger;

    constructor(private readonly options: PullDriverOptions) {
        this.log = options.logger ?? componentLogger('pull-driver');
    }

    async run(commands: CommandQueue, signal: AbortSignal): Promise<void> {
        this.log.info('pull driver started');
        await Promise.all([
            runCommandLoop(commands, this.options.executor, signal, { logger: this.log, graceMs: this.options.graceMs }),
            this.pollLoop(signal),
        ]);
        this.log.info('pull driver stopped');
    }

    private async pollLoop(signal: AbortSignal): Promise<void> {
        const { network, cache, reconciler } = this.options;
        const pollTimeoutMs = this.options.pollTimeoutMs ?? SYNC_TIMEOUT_MS;
        const backoffMs = this.options.backoffMs ?? SYNC_BACKOFF_MS;

        let since = await cache.getResumeToken();
        this.log.info({ since }, 'resuming sync');

        while (!signal.aborted) {
            let batch: SyncBatch;
            try {
                batch = await network.sync(since, pollTimeoutMs, signal);
            } catch (error) {
                if (signal.aborted) break;
                trackSyncFailure();
                this.log.warn({ err: error, backoffMs }, 'sync failed, backing off');
                await sleep(backoffMs, signal);
                continue;
            }

            await reconciler.reconcileBatch(batch.events);

            try {
                await cache.saveResumeToken(batch.nextBatch);
            } catch (error) {
                this.log.fatal({ err: error, nextBatch: batch.nextBatch }, 'failed to persist resume token');
            }
            since = batch.nextBatch;
        }
    }
}
