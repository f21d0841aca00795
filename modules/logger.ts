import pino, { type Logger } from 'pino';

export type { Logger };

export const createLogger = (name: string, level: string = process.env.LOG_LEVEL ?? 'info'): Logger =>
    pino({ name, level })

export const logger = createLogger('channel-listing')
