import { parse } from 'dotenv';
import * as fs from 'fs';
import { ConfigError } from './errors';
import { OUTLET_ACTIONS, OutletAction, WattBoxConfig } from './types';

export const DEFAULT_URL = 'http://172.16.19.184';
export const DEFAULT_USERNAME = 'wattbox';
export const DEFAULT_PASSWORD = 'wattbox';
export const DEFAULT_ACTION: OutletAction = 'off';

export const ENV_KEYS = {
    url: 'WATTBOX_URL',
    username: 'WATTBOX_USERNAME',
    password: 'WATTBOX_PASSWORD',
    outlet: 'WATTBOX_OUTLET',
    action: 'WATTBOX_ACTION',
} as const;

export type EnvSource = Record<string, string | undefined>;

/**
 * Values taken from the command line. Anything left undefined falls
 * through to the .env file, then the environment, then the defaults.
 */
export type CliOptions = {
    url?: string;
    username?: string;
    password?: string;
    outlet?: string;
    action?: string;
    verbose?: boolean;
};

export interface ConfigSources {
    cli: CliOptions;
    dotenv: EnvSource;
    env: EnvSource;
}

/**
 * Parses a .env file without touching process.env, so its values can
 * outrank the real environment. A missing file is an empty source.
 */
export function loadDotenvFile(filePath: string): EnvSource {
    if (!fs.existsSync(filePath)) {
        return {};
    }
    return parse(fs.readFileSync(filePath));
}

export function normalizeBaseUrl(url: string): string {
    return url.trim().replace(/\/+$/, '');
}

function firstSet(...values: Array<string | undefined>): string | undefined {
    return values.find((value) => value !== undefined && value.trim() !== '');
}

function pick(sources: ConfigSources, field: keyof typeof ENV_KEYS): string | undefined {
    const key = ENV_KEYS[field];
    return firstSet(sources.cli[field], sources.dotenv[key], sources.env[key]);
}

export function parseOutlet(value: string): number {
    const trimmed = value.trim();
    if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(Number(trimmed)) || Number(trimmed) < 1) {
        throw new ConfigError(`Invalid outlet "${value}": expected a positive whole number`);
    }
    return Number(trimmed);
}

function isOutletAction(value: string): value is OutletAction {
    return OUTLET_ACTIONS.some((action) => action === value);
}

export function parseAction(value: string): OutletAction {
    const normalized = value.trim().toLowerCase();
    if (!isOutletAction(normalized)) {
        throw new ConfigError(`Invalid action "${value}": expected one of ${OUTLET_ACTIONS.join(', ')}`);
    }
    return normalized;
}

function parseBaseUrl(value: string): string {
    const normalized = normalizeBaseUrl(value);
    let parsed: URL;
    try {
        parsed = new URL(normalized);
    } catch {
        throw new ConfigError(`Invalid WattBox URL "${value}"`);
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
        throw new ConfigError(`Invalid WattBox URL "${value}": only http and https are supported`);
    }
    return normalized;
}

export function resolveConfig(sources: ConfigSources): WattBoxConfig {
    const outlet = pick(sources, 'outlet');
    if (outlet === undefined) {
        throw new ConfigError(`Outlet number is required (--outlet or ${ENV_KEYS.outlet})`);
    }

    return {
        url: parseBaseUrl(pick(sources, 'url') ?? DEFAULT_URL),
        username: pick(sources, 'username') ?? DEFAULT_USERNAME,
        password: pick(sources, 'password') ?? DEFAULT_PASSWORD,
        outlet: parseOutlet(outlet),
        action: parseAction(pick(sources, 'action') ?? DEFAULT_ACTION),
        verbose: sources.cli.verbose ?? false,
    };
}
