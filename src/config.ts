import * as dotenv from 'dotenv';

dotenv.config();

export type UnitSystem = 'metric' | 'imperial' | 'standard';

export type EnvSource = NodeJS.ProcessEnv | Record<string, string | undefined>;

const PLACEHOLDER_API_KEY = 'your_api_key_here';

/** Process exit status for configuration errors (EX_CONFIG) */
export const EXIT_CONFIG_ERROR = 78;

/**
 * Raised for any configuration problem detected at startup.
 * The daemon exits with a distinct status instead of polling with a broken setup.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export interface RetryPolicyConfig {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    jitterRatio: number;
}

export interface QuotaConfig {
    dailyLimit: number;
    perMinuteLimit: number;
}

export interface IngestionConfig {
    // OpenWeatherMap
    openWeatherApiKey: string;
    openWeatherBaseUrl: string;
    units: UnitSystem;
    requestTimeoutMs: number;
    quota: QuotaConfig;

    // Scheduling
    pollIntervalMs: number;
    shutdownGraceMs: number;
    retry: RetryPolicyConfig;

    // Storage
    databasePath: string;
    locationsFile: string;
}

export function getEnvVarOptional(name: string, defaultValue: string, env: EnvSource = process.env): string {
    const value = env[name];
    if (value === undefined || value.trim() === '') return defaultValue;
    return value.trim();
}

function getEnvVarPositiveInt(name: string, defaultValue: number, env: EnvSource): number {
    const value = env[name];
    if (value === undefined || value.trim() === '') return defaultValue;
    const parsed = Number(value.trim());
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new ConfigError(`${name} must be a positive integer`);
    }
    return parsed;
}

function getEnvVarRatio(name: string, defaultValue: number, env: EnvSource): number {
    const value = env[name];
    if (value === undefined || value.trim() === '') return defaultValue;
    const parsed = Number(value.trim());
    if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
        throw new ConfigError(`${name} must be a decimal between 0 and 1`);
    }
    return parsed;
}

function getUnitSystem(env: EnvSource): UnitSystem {
    const value = getEnvVarOptional('OPENWEATHER_UNITS', 'metric', env).toLowerCase();
    if (value === 'metric' || value === 'imperial' || value === 'standard') {
        return value;
    }
    throw new ConfigError('OPENWEATHER_UNITS must be "metric", "imperial" or "standard"');
}

/**
 * Build an immutable configuration snapshot from the environment.
 * Throws ConfigError when anything required is missing or invalid.
 */
export function loadConfig(env: EnvSource = process.env): IngestionConfig {
    const apiKey = getEnvVarOptional('OPENWEATHER_API_KEY', '', env);
    if (apiKey === '' || apiKey === PLACEHOLDER_API_KEY) {
        throw new ConfigError('OPENWEATHER_API_KEY is required (set it in .env or the environment)');
    }

    const retry: RetryPolicyConfig = {
        maxAttempts: getEnvVarPositiveInt('RETRY_MAX_ATTEMPTS', 3, env),
        baseDelayMs: getEnvVarPositiveInt('RETRY_BASE_DELAY_MS', 1000, env),
        maxDelayMs: getEnvVarPositiveInt('RETRY_MAX_DELAY_MS', 60000, env),
        jitterRatio: getEnvVarRatio('RETRY_JITTER_RATIO', 0.2, env),
    };
    if (retry.baseDelayMs > retry.maxDelayMs) {
        throw new ConfigError('RETRY_BASE_DELAY_MS must not exceed RETRY_MAX_DELAY_MS');
    }

    const config: IngestionConfig = {
        openWeatherApiKey: apiKey,
        openWeatherBaseUrl: getEnvVarOptional('OPENWEATHER_BASE_URL', 'https://api.openweathermap.org/data/2.5', env),
        units: getUnitSystem(env),
        requestTimeoutMs: getEnvVarPositiveInt('REQUEST_TIMEOUT_MS', 10000, env),
        quota: {
            dailyLimit: getEnvVarPositiveInt('OPENWEATHER_DAILY_LIMIT', 1000, env),
            perMinuteLimit: getEnvVarPositiveInt('OPENWEATHER_PER_MINUTE_LIMIT', 60, env),
        },

        pollIntervalMs: getEnvVarPositiveInt('SCRAPE_INTERVAL_MINUTES', 30, env) * 60 * 1000,
        shutdownGraceMs: getEnvVarPositiveInt('SHUTDOWN_GRACE_MS', 30000, env),
        retry,

        databasePath: getEnvVarOptional('DATABASE_PATH', 'data/weather.db', env),
        locationsFile: getEnvVarOptional('LOCATIONS_FILE', 'config/locations.json', env),
    };

    return Object.freeze(config);
}
