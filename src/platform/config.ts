import dotenv from 'dotenv';
import path from 'path';

// Load environment variables from .env file
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface TimeOfDay {
    hours: number;
    minutes: number;
}

export interface Config {
    telegram: {
        token: string;
        proxy: {
            scheme: string;
            host: string;
            port: number;
        } | null;
    };
    gemini: {
        apiKey: string;
        model: string;
        timeoutMs: number;
    };
    quota: {
        dailyLimit: number;
        /** Local wall-clock time at which the request counter is zeroed */
        resetAt: TimeOfDay;
    };
    session: {
        ttlHours: number;
        sweepIntervalMinutes: number;
    };
    bot: {
        owner: string;
    };
    logging: {
        level: LogLevel;
        dir: string;
        toFile: boolean;
    };
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const TIME_OF_DAY_REGEX = /^([01]?\d|2[0-3]):([0-5]\d)$/;

const parsePositiveNumber = (name: string, raw: string | undefined, fallback: number): number => {
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value) || value <= 0) {
        throw new Error(`Config: ${name} must be a positive number, got "${raw}"`);
    }
    return value;
};

const parsePositiveInteger = (name: string, raw: string | undefined, fallback: number): number => {
    const value = parsePositiveNumber(name, raw, fallback);
    if (!Number.isInteger(value)) {
        throw new Error(`Config: ${name} must be an integer, got "${raw}"`);
    }
    return value;
};

export function parseTimeOfDay(raw: string): TimeOfDay {
    const match = TIME_OF_DAY_REGEX.exec(raw.trim());
    if (!match) {
        throw new Error(`Config: time of day must look like HH:MM, got "${raw}"`);
    }
    return { hours: Number(match[1]), minutes: Number(match[2]) };
}

const parseLogLevel = (raw: string | undefined): LogLevel => {
    const level = LOG_LEVELS.find((candidate) => candidate === raw?.toLowerCase());
    return level ?? 'info';
};

/**
 * Builds the typed configuration from an environment map.
 * Throws on malformed numeric or time values so a bad deployment fails at boot.
 */
export function loadConfig(env: Env): Config {
    return {
        telegram: {
            token: env.TELEGRAM_BOT_TOKEN || '',
            proxy: env.TELEGRAM_PROXY_SCHEME
                && env.TELEGRAM_PROXY_HOST
                && env.TELEGRAM_PROXY_PORT
                ? {
                    scheme: env.TELEGRAM_PROXY_SCHEME,
                    host: env.TELEGRAM_PROXY_HOST,
                    port: parsePositiveInteger('TELEGRAM_PROXY_PORT', env.TELEGRAM_PROXY_PORT, 0),
                }
                : null,
        },
        gemini: {
            apiKey: env.GOOGLE_API_KEY || '',
            model: env.GEMINI_MODEL || 'gemini-1.5-flash',
            timeoutMs: parsePositiveInteger('GEMINI_TIMEOUT_MS', env.GEMINI_TIMEOUT_MS, 60_000),
        },
        quota: {
            dailyLimit: parsePositiveInteger('DAILY_LIMIT', env.DAILY_LIMIT, 1500),
            resetAt: parseTimeOfDay(env.QUOTA_RESET_TIME || '00:00'),
        },
        session: {
            ttlHours: parsePositiveNumber('CHAT_TTL', env.CHAT_TTL, 24),
            sweepIntervalMinutes: parsePositiveNumber('SWEEP_INTERVAL_MINUTES', env.SWEEP_INTERVAL_MINUTES, 60),
        },
        bot: {
            owner: (env.BOT_OWNER || '').replace(/^@/, ''),
        },
        logging: {
            level: parseLogLevel(env.LOG_LEVEL),
            dir: env.LOG_DIR || path.resolve(process.cwd(), 'logs'),
            toFile: env.LOG_TO_FILE !== 'false',
        },
    };
}

const config: Config = loadConfig(process.env);

export default config;
