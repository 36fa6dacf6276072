import { Counter, Gauge, Histogram, register } from 'prom-client';
import type { AppCommandType } from '@roomthread/protocol';

export type CommandOutcome = 'ok' | 'error' | 'timeout';
export type ReconcileResult = 'saved' | 'deleted' | 'skipped' | 'failed';

// Initialize Prometheus metrics
const metrics = {
    // Command metrics
    commandsTotal: new Counter({
        name: 'roomthread_commands_total',
        help: 'Commands handled by the executor, by kind and outcome',
        labelNames: ['kind', 'outcome'] as const,
    }),

    commandDuration: new Histogram({
        name: 'roomthread_command_duration_ms',
        help: 'Time from dequeue to settled reply in milliseconds',
        labelNames: ['kind'] as const,
        buckets: [10, 25, 50, 100, 250, 500, 1000, 2500, 5000],
    }),

    // Inbound event metrics
    eventsTotal: new Counter({
        name: 'roomthread_events_total',
        help: 'Inbound room events by kind and reconciliation result',
        labelNames: ['kind', 'result'] as const,
    }),

    syncFailures: new Counter({
        name: 'roomthread_sync_failures_total',
        help: 'Failed long-poll requests against the homeserver',
    }),

    // Subscriber metrics
    subscribers: new Gauge({
        name: 'roomthread_notification_subscribers',
        help: 'Live notification subscribers (SSE and WebSocket)',
        labelNames: ['transport'] as const,
    }),
};

register.setDefaultLabels({
    app: 'bridge-pod',
});

// Helper functions to track metrics
const trackCommand = (kind: AppCommandType, outcome: CommandOutcome, durationMs: number) => {
    metrics.commandsTotal.inc({ kind, outcome });
    metrics.commandDuration.observe({ kind }, durationMs);
};

const trackEvent = (kind: string, result: ReconcileResult) => {
    metrics.eventsTotal.inc({ kind, result });
};

const trackSyncFailure = () => {
    metrics.syncFailures.inc();
};

const trackSubscriber = (transport: 'sse' | 'ws', increment = true) => {
    const method = increment ? 'inc' : 'dec';
    metrics.subscribers[method]({ transport });
};

export { metrics, register, trackCommand, trackEvent, trackSyncFailure, trackSubscriber };
