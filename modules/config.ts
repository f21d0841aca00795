import { z } from 'zod';
import type { ChannelConfig } from '../types';
import {
    DEFAULT_CLIENT_NAME,
    DEFAULT_CLIENT_VERSION,
    DEFAULT_REQUEST_TIMEOUT_MS,
    DEFAULT_USER_AGENT,
} from '../datas/constants';

// a blank line in env/.env (`YOUTUBE_HL=`) counts as unset
const unsetWhenBlank = <T extends z.ZodTypeAny>(schema: T) =>
    z.preprocess(value => (typeof value === 'string' && value.trim() === '' ? undefined : value), schema)

const EnvSchema = z.object({
    YOUTUBE_CLIENT_NAME: unsetWhenBlank(z.string().min(1).default(DEFAULT_CLIENT_NAME)),
    YOUTUBE_CLIENT_VERSION: unsetWhenBlank(z.string().min(1).default(DEFAULT_CLIENT_VERSION)),
    YOUTUBE_HL: unsetWhenBlank(z.string().min(1).default('en')),
    YOUTUBE_GL: unsetWhenBlank(z.string().min(1).default('US')),
    YOUTUBE_REQUEST_TIMEOUT_MS: unsetWhenBlank(z.coerce.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS)),
    YOUTUBE_USER_AGENT: unsetWhenBlank(z.string().min(1).default(DEFAULT_USER_AGENT)),
    LOG_LEVEL: unsetWhenBlank(z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')),
});

/**
 * Reads the listing configuration from environment variables.
 * Call `dotenv.config({ path: ENV_FILE_PATH })` first to pick up `env/.env`.
 */
export const loadConfig = (env: Record<string, string | undefined> = process.env): ChannelConfig => {
    const parsed = EnvSchema.parse(env)
    return {
        client: {
            clientName: parsed.YOUTUBE_CLIENT_NAME,
            clientVersion: parsed.YOUTUBE_CLIENT_VERSION,
            hl: parsed.YOUTUBE_HL,
            gl: parsed.YOUTUBE_GL,
        },
        requestTimeoutMs: parsed.YOUTUBE_REQUEST_TIMEOUT_MS,
        userAgent: parsed.YOUTUBE_USER_AGENT,
        logLevel: parsed.LOG_LEVEL,
    }
}
