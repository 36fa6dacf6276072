import { isSyncError, toSyncError } from '@roomthread/protocol';
import type { Logger } from '../logger';
import { trackCommand, type CommandOutcome } from '../metrics';
import type { CommandQueue, PendingCommand } from '../sync/command-queue';
import type { CommandExecutor } from '../sync/executor';

/**
 * Resolves once every task settled or `ms` elapsed, whichever is first.
 * Returns false when the grace period ran out.
 */
export async function settleWithin(tasks: Iterable<Promise<unknown>>, ms: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<false>((resolve) => {
        timer = setTimeout(() => resolve(false), ms);
    });
    try {
        return await Promise.race([Promise.allSettled(tasks).then(() => true as const), expired]);
    } finally {
        clearTimeout(timer);
    }
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal.aborted) return resolve();
        const done = () => {
            clearTimeout(timer);
            signal.removeEventListener('abort', done);
            resolve();
        };
        const timer = setTimeout(done, ms);
        signal.addEventListener('abort', done, { once: true });
    });
}

async function handle(pending: PendingCommand, executor: CommandExecutor, log: Logger): Promise<void> {
    const { command, reply } = pending;
    const started = Date.now();
    let outcome: CommandOutcome;

    try {
        const result = await executor.execute(command);
        outcome = reply.resolve(result) ? 'ok' : 'timeout';
    } catch (error) {
        const failure = toSyncError(error);
        if (!isSyncError(error) || failure.code === 'internal') {
            log.error({ err: error, command: command.type }, 'command failed');
        } else {
            log.debug({ code: failure.code, command: command.type }, failure.message);
        }
        outcome = reply.reject(failure) ? 'error' : 'timeout';
    }

    if (outcome === 'timeout') {
        log.warn({ command: command.type }, 'command finished after its caller gave up');
    }
    trackCommand(command.type, outcome, Date.now() - started);
}

export interface CommandLoopOptions {
    logger: Logger;
    /** How long in-flight commands may run on after cancellation. */
    graceMs: number;
}

/**
 * Takes commands off the queue until `signal` aborts, running each one
 * concurrently and settling its reply exactly once.
 */
export async function runCommandLoop(
    queue: CommandQueue,
    executor: CommandExecutor,
    signal: AbortSignal,
    { logger, graceMs }: CommandLoopOptions,
): Promise<void> {
    const inFlight = new Set<Promise<void>>();

    for (;;) {
        const pending = await queue.take(signal);
        if (!pending) break;

        const task: Promise<void> = handle(pending, executor, logger).finally(() => inFlight.delete(task));
        inFlight.add(task);
    }

    if (inFlight.size > 0 && !(await settleWithin(inFlight, graceMs))) {
        logger.warn({ pending: inFlight.size }, 'commands still running after the grace period');
    }
}
