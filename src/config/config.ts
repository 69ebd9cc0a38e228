export const DEFAULT_RPC_URL = 'https://ethereum.publicnode.com';

export interface AppConfig {
    rpcUrl: string;
    rpcTimeoutMs: number;
    port: number;
    host: string;
    logLevel: string;
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, key: string, defaultValue?: string): string {
    const value = env[key];
    if (value === undefined || value.trim() === '') {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Environment variable ${key} is not set.`);
    }
    return value.trim();
}

function getEnvVarAsInt(env: Env, key: string, defaultValue?: number): number {
    const value = getEnvVar(env, key, defaultValue?.toString());
    if (!/^\d+$/.test(value)) {
        throw new Error(`Environment variable ${key} must be a non-negative integer, but got '${value}'.`);
    }
    return parseInt(value, 10);
}

function getEnvVarAsUrl(env: Env, key: string, defaultValue?: string): string {
    const value = getEnvVar(env, key, defaultValue);
    let url: URL;
    try {
        url = new URL(value);
    } catch (error) {
        throw new Error(`Environment variable ${key} must be a URL, but got '${value}'.`, { cause: error });
    }
    if (url.protocol !== 'https:' && url.protocol !== 'http:') {
        throw new Error(`Environment variable ${key} must use http or https, but got '${url.protocol}'.`);
    }
    return value;
}

function getEnvVarAsLogLevel(env: Env, key: string, defaultValue: string): string {
    const value = getEnvVar(env, key, defaultValue).toLowerCase();
    if (!LOG_LEVELS.includes(value)) {
        throw new Error(`Environment variable ${key} must be one of ${LOG_LEVELS.join(', ')}, but got '${value}'.`);
    }
    return value;
}

/**
 * Reads the service configuration from an environment map.
 * Called once at start-up; the result is handed to every component that needs it.
 */
export function loadConfig(env: Env = process.env): AppConfig {
    const port = getEnvVarAsInt(env, 'PORT', 8000);
    if (port > 65535) {
        throw new Error(`Environment variable PORT must be at most 65535, but got '${port}'.`);
    }
    const rpcTimeoutMs = getEnvVarAsInt(env, 'RPC_TIMEOUT_MS', 10000);
    if (rpcTimeoutMs === 0) {
        throw new Error('Environment variable RPC_TIMEOUT_MS must be greater than 0.');
    }

    return {
        rpcUrl: getEnvVarAsUrl(env, 'RPC_URL', DEFAULT_RPC_URL),
        rpcTimeoutMs,
        port,
        host: getEnvVar(env, 'HOST', '0.0.0.0'),
        logLevel: getEnvVarAsLogLevel(env, 'LOG_LEVEL', 'info'),
    };
}
