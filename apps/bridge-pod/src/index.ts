import http from 'http';
import { PowGuard } from '@roomthread/auth';
import { ConfigError, loadConfig, serviceIdentity, type BridgeConfig } from './config';
import { createDriver } from './drivers';
import { createHttpApp } from './http/app';
import { WebSocketHub } from './http/ws';
import { componentLogger, logger } from './logger';
import { MatrixClient } from './network/matrix-client';
import { RoomRouter } from './routing/room-router';
import { SqliteCache } from './storage/sqlite';
import { CommandQueue } from './sync/command-queue';
import { CommandExecutor } from './sync/executor';
import { NotificationBus } from './sync/notification-bus';
import { EventReconciler } from './sync/reconciler';
import { SessionProvider } from './sync/sessions';

function readConfig(): BridgeConfig {
    try {
        return loadConfig();
    } catch (error) {
        if (error instanceof ConfigError) {
            logger.fatal({ issues: error.issues }, 'invalid configuration');
            process.exit(1);
        }
        throw error;
    }
}

async function main(): Promise<void> {
    const config = readConfig();
    if (config.logLevel) logger.level = config.logLevel;

    const push = config.mode === 'push';
    const identity = serviceIdentity(config);
    const { serverName } = config.matrix;

    const cache = new SqliteCache(config.databasePath);
    const network = new MatrixClient({
        homeserverUrl: config.matrix.homeserverUrl,
        accessToken: config.matrix.accessToken,
        serviceUserId: identity.serviceUserId,
        serverName,
        appService: push,
    });
    const bus = new NotificationBus();
    const reconciler = new EventReconciler({ cache, network, bus, identity, lookupUnknownRooms: !push });
    const executor = new CommandExecutor({
        router: new RoomRouter({
            network,
            serverName,
            spacePrefix: config.matrix.spacePrefix,
            ownerId: config.matrix.ownerId,
        }),
        cache,
        sessions: new SessionProvider({ network, identity, serverName, impersonate: push }),
        identitySalt: config.identitySalt,
    });
    const queue = new CommandQueue(config.commands.queueSize);
    const driver = createDriver(config, { network, cache, reconciler, executor });

    const app = createHttpApp({
        queue,
        cache,
        bus,
        pow: new PowGuard({ secret: config.pow.secret, difficulty: config.pow.difficulty, singleUse: config.pow.singleUse }),
        auth: config.auth,
        identitySalt: config.identitySalt,
        commandTimeoutMs: config.commands.timeoutMs,
    });
    const server = http.createServer(app);
    const hub = new WebSocketHub(server, bus, componentLogger('ws'));

    const controller = new AbortController();
    const stop = (signal: NodeJS.Signals) => {
        if (controller.signal.aborted) return;
        logger.info({ signal }, 'shutting down');
        controller.abort();
    };
    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);

    await new Promise<void>((resolve) => server.listen(config.http.port, config.http.host, resolve));
    logger.info({ mode: config.mode, host: config.http.host, port: config.http.port }, 'bridge listening');

    try {
        await driver.run(queue, controller.signal);
    } finally {
        queue.close();
        await hub.close();
        server.closeAllConnections();
        await new Promise<void>((resolve) => server.close(() => resolve()));
        cache.close();
        logger.info('bridge stopped');
    }
}

main().catch((error: unknown) => {
    logger.fatal({ err: error }, 'bridge crashed');
    process.exit(1);
});
