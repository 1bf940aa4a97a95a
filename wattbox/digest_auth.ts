import * as crypto from 'crypto';

export interface DigestChallenge {
    realm: string;
    nonce: string;
    qop?: string;
    opaque?: string;
    algorithm: string;
}

interface SessionState extends DigestChallenge {
    hashKey: string;
    ha1: string;
    nc: number;
}

const HASHES: Record<string, string> = {
    'MD5': 'md5',
    'MD5-SESS': 'md5',
    'SHA-256': 'sha256',
    'SHA-256-SESS': 'sha256',
};

export function basicAuthorization(username: string, password: string): string {
    return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}

export function isDigestChallenge(header: string | null | undefined): boolean {
    return (header ?? '').toLowerCase().includes('digest');
}

/**
 * Reads the parameters of a Digest challenge. When the header carries
 * several challenges only the Digest one is read.
 */
export function parseWwwAuthenticate(header: string): DigestChallenge {
    const start = header.toLowerCase().indexOf('digest');
    const challenge = start >= 0 ? header.slice(start + 'digest'.length) : header;

    const params: Record<string, string> = {};
    const pattern = /([\w-]+)\s*=\s*(?:"((?:[^"\\]|\\.)*)"|([^\s,]*))/g;
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(challenge)) !== null) {
        params[match[1].toLowerCase()] = match[2] ?? match[3] ?? '';
    }

    let qop: string | undefined;
    if (params.qop !== undefined) {
        const offered = params.qop.split(',').map((value) => value.trim());
        qop = offered.includes('auth') ? 'auth' : offered[0];
    }

    return {
        realm: params.realm ?? '',
        nonce: params.nonce ?? '',
        qop,
        opaque: params.opaque,
        algorithm: params.algorithm ?? 'MD5',
    };
}

export function randomCnonce(): string {
    return crypto.randomBytes(16).toString('hex');
}

/**
 * Digest credentials for a single run. Primed from the device's challenge,
 * then builds one Authorization header per request.
 */
export class DigestAuthSession {
    private state: SessionState | null = null;

    constructor(
        private readonly username: string,
        private readonly password: string,
        private readonly createCnonce: () => string = randomCnonce,
    ) {}

    get isPrimed(): boolean {
        return this.state !== null;
    }

    /**
     * Returns false when the header is not a Digest challenge.
     */
    prime(wwwAuthenticate: string | null | undefined): boolean {
        if (!wwwAuthenticate || !isDigestChallenge(wwwAuthenticate)) {
            return false;
        }

        const challenge = parseWwwAuthenticate(wwwAuthenticate);
        const hashKey = challenge.algorithm.toUpperCase();
        if (!(hashKey in HASHES)) {
            throw new Error(`Unsupported digest algorithm: ${challenge.algorithm}`);
        }

        this.state = {
            ...challenge,
            hashKey,
            // base HA1; -sess variants rehash it with the cnonce in buildHeader
            ha1: this.hash(hashKey, `${this.username}:${challenge.realm}:${this.password}`),
            nc: 0,
        };
        return true;
    }

    buildHeader(method: string, uri: string): string {
        if (!this.state) {
            throw new Error('Digest session has not received a challenge');
        }

        const state = this.state;
        state.nc++;
        const nc = state.nc.toString(16).padStart(8, '0');
        const cnonce = this.createCnonce();

        const ha1 = state.hashKey.endsWith('-SESS')
            ? this.hash(state.hashKey, `${state.ha1}:${state.nonce}:${cnonce}`)
            : state.ha1;
        const ha2 = this.hash(state.hashKey, `${method}:${uri}`);
        const response = state.qop
            ? this.hash(state.hashKey, `${ha1}:${state.nonce}:${nc}:${cnonce}:${state.qop}:${ha2}`)
            : this.hash(state.hashKey, `${ha1}:${state.nonce}:${ha2}`);

        const parts = [
            `username="${this.username}"`,
            `realm="${state.realm}"`,
            `nonce="${state.nonce}"`,
            `uri="${uri}"`,
            `response="${response}"`,
        ];
        // echoed with the challenge's own spelling
        if (state.hashKey !== 'MD5') {
            parts.push(`algorithm=${state.algorithm}`);
        }
        if (state.qop) {
            parts.push(`qop=${state.qop}`, `nc=${nc}`, `cnonce="${cnonce}"`);
        }
        if (state.opaque !== undefined) {
            parts.push(`opaque="${state.opaque}"`);
        }
        return `Digest ${parts.join(', ')}`;
    }

    private hash(hashKey: string, value: string): string {
        return crypto.createHash(HASHES[hashKey]).update(value).digest('hex');
    }
}
