import { serviceIdentity, type BridgeConfig } from '../config';
import type { RoomNetwork } from '../network/types';
import type { LocalCache } from '../storage/cache';
import type { CommandExecutor } from '../sync/executor';
import type { EventReconciler } from '../sync/reconciler';
import { PullDriver } from './pull-driver';
import { PushDriver } from './push-driver';
import type { SyncDriver } from './types';

export * from './types';
export { PullDriver } from './pull-driver';
export { PushDriver, createAppServiceApp } from './push-driver';

export interface DriverDependencies {
    network: RoomNetwork;
    cache: LocalCache;
    reconciler: EventReconciler;
    executor: CommandExecutor;
}

/** Picks the driver named by `config.mode`. */
export function createDriver(config: BridgeConfig, deps: DriverDependencies): SyncDriver {
    if (config.mode === 'push') {
        if (config.hsToken === null) {
            throw new Error('push mode needs a homeserver token');
        }
        return new PushDriver({
            hsToken: config.hsToken,
            identity: serviceIdentity(config),
            serverName: config.matrix.serverName,
            reconciler: deps.reconciler,
            executor: deps.executor,
            host: config.http.host,
            port: config.http.pushPort,
            graceMs: config.shutdownGraceMs,
        });
    }

    return new PullDriver({
        network: deps.network,
        cache: deps.cache,
        reconciler: deps.reconciler,
        executor: deps.executor,
        graceMs: config.shutdownGraceMs,
    });
}
