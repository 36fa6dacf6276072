import type { CommandQueue } from '../sync/command-queue';

export type DriverMode = 'pull' | 'push';

/**
 * A way of exchanging events with the room network. Runs the command loop
 * plus its own intake until `signal` aborts, then drains within the grace period.
 */
export interface SyncDriver {
    readonly mode: DriverMode;
    run(commands: CommandQueue, signal: AbortSignal): Promise<void>;
}
