import pino from 'pino';

export type Logger = pino.Logger;

export const logger: Logger = pino({
    name: 'bridge-pod',
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
});

export function componentLogger(component: string, parent: Logger = logger): Logger {
    return parent.child({ component });
}
