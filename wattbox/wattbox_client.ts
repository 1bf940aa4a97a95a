import * as http from 'http';
import * as https from 'https';
import fetch, { RequestInit, Response } from 'node-fetch';
import { basicAuthorization, DigestAuthSession } from './digest_auth';
import { WattBoxHttpError } from './errors';
import { normalizeBaseUrl } from './config';
import { Reporter } from './reporter';
import { AuthScheme, CommandResult, OutletAction, WattBoxConfig } from './types';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export const REQUEST_TIMEOUT_MS = 10000;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

// Devices ship self-signed certificates
const httpsAgent = new https.Agent({ rejectUnauthorized: false });
const httpAgent = new http.Agent();

export function resolveAgent(parsedUrl: URL): http.Agent {
    return parsedUrl.protocol === 'https:' ? httpsAgent : httpAgent;
}

export function buildOutletUrl(baseUrl: string, outlet: number, action: OutletAction): string {
    return `${normalizeBaseUrl(baseUrl)}/outlet/${action}?o=${outlet}`;
}

function requestTarget(url: string): string {
    const parsed = new URL(url);
    return `${parsed.pathname}${parsed.search}`;
}

// node-fetch leaves the socket paused until the body is read
async function discardBody(response: Response): Promise<void> {
    await response.text();
}

export interface WattBoxClientOptions {
    reporter: Reporter;
    fetchImpl?: FetchLike;
    timeoutMs?: number;
}

/**
 * Talks to one WattBox for one command: probes the device, settles on
 * HTTPS and an auth scheme, logs in, then switches the outlet.
 */
export class WattBoxClient {
    private baseUrl: string;
    private scheme: AuthScheme = 'basic';
    private readonly digest: DigestAuthSession;
    private readonly reporter: Reporter;
    private readonly fetchImpl: FetchLike;
    private readonly timeoutMs: number;

    constructor(private readonly config: WattBoxConfig, options: WattBoxClientOptions) {
        this.baseUrl = normalizeBaseUrl(config.url);
        this.digest = new DigestAuthSession(config.username, config.password);
        this.reporter = options.reporter;
        this.fetchImpl = options.fetchImpl ?? fetch;
        this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    }

    get currentBaseUrl(): string {
        return this.baseUrl;
    }

    get authScheme(): AuthScheme {
        return this.scheme;
    }

    async execute(): Promise<CommandResult> {
        await this.probe();
        await this.authenticate();
        return this.sendCommand(this.config.outlet, this.config.action);
    }

    /**
     * Unauthenticated look at /main: follows an upgrade to HTTPS and reads
     * which auth scheme the device asks for.
     */
    async probe(): Promise<void> {
        this.reporter.debug(`Connecting to ${this.baseUrl}...`);
        let response = await this.get(`${this.baseUrl}/main`, undefined, 'manual');
        await discardBody(response);

        if (REDIRECT_STATUSES.has(response.status)) {
            const location = response.headers.get('location') ?? '';
            this.reporter.debug(`Detected redirect to: ${location}`);

            if (location.startsWith('https://')) {
                this.baseUrl = new URL(location).origin;
                this.reporter.debug(`Switching to HTTPS: ${this.baseUrl}`);
                response = await this.get(`${this.baseUrl}/main`, undefined, 'manual');
                await discardBody(response);
            }
        }

        if (this.digest.prime(response.headers.get('www-authenticate'))) {
            this.scheme = 'digest';
            this.reporter.debug('Using Digest authentication');
        } else {
            this.scheme = 'basic';
            this.reporter.debug('Using Basic authentication');
        }
    }

    async authenticate(): Promise<number> {
        this.reporter.debug(`Authenticating to ${this.baseUrl}/main...`);
        const response = await this.authorizedGet(`${this.baseUrl}/main`);
        await discardBody(response);
        this.reporter.debug(`Authentication successful (Status: ${response.status})`);
        this.reporter.debug(`Final URL: ${response.url}`);
        return response.status;
    }

    async sendCommand(outlet: number, action: OutletAction): Promise<CommandResult> {
        const url = buildOutletUrl(this.baseUrl, outlet, action);
        this.reporter.debug(`Sending command to ${url}...`);

        const response = await this.authorizedGet(url);
        this.reporter.debug(`Command successful (Status: ${response.status})`);

        return {
            action,
            outlet,
            status: response.status,
            url: response.url || url,
            body: await response.text(),
        };
    }

    private async authorizedGet(url: string): Promise<Response> {
        let response = await this.get(url, this.authorizationFor(url));

        if (response.status === 401 && this.scheme === 'basic') {
            const challenge = response.headers.get('www-authenticate');
            if (this.digest.prime(challenge)) {
                await discardBody(response);
                this.reporter.debug('Basic authentication rejected, retrying with Digest');
                this.scheme = 'digest';
                response = await this.get(url, this.authorizationFor(url));
            }
        }

        if (!response.ok) {
            throw await WattBoxHttpError.fromResponse(response);
        }
        return response;
    }

    private authorizationFor(url: string): string {
        if (this.scheme === 'digest') {
            return this.digest.buildHeader('GET', requestTarget(url));
        }
        return basicAuthorization(this.config.username, this.config.password);
    }

    private get(url: string, authorization?: string, redirect: RequestInit['redirect'] = 'follow'): Promise<Response> {
        const headers: Record<string, string> = {};
        if (authorization) {
            headers.Authorization = authorization;
        }
        return this.fetchImpl(url, {
            method: 'GET',
            headers,
            redirect,
            timeout: this.timeoutMs,
            agent: resolveAgent,
        });
    }
}
