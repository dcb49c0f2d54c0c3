import { promises as fs } from 'node:fs';
import path from 'node:path';
import { google, type Auth } from 'googleapis';
import { ConfigError, StorageError } from '../../shared/errors';
import { getErrorMessage } from '../../shared/utils/errorMessage';

export const DRIVE_SCOPES = ['https://www.googleapis.com/auth/drive.file'];

interface ClientSecrets {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
}

export interface DriveAuthOptions {
    credentialsPath: string;
    tokenPath: string;
    /** Shows the consent URL and returns the code the user pastes back. */
    askForCode: (authUrl: string) => Promise<string>;
    /** Swaps a consent code for tokens; defaults to the OAuth client's token endpoint. */
    exchangeCode?: (client: Auth.OAuth2Client, code: string) => Promise<Auth.Credentials>;
    /**
     * Returns a usable access token for the cached credentials, refreshing them
     * on the client when needed. Defaults to `client.getAccessToken()`.
     */
    refreshAccessToken?: (client: Auth.OAuth2Client) => Promise<string | null | undefined>;
    scopes?: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseClientSecrets(raw: string, source: string): ClientSecrets {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new ConfigError(`${source} is not valid JSON`);
    }

    const section = isRecord(parsed) ? (parsed.installed ?? parsed.web) : undefined;
    if (!isRecord(section) || typeof section.client_id !== 'string' || typeof section.client_secret !== 'string') {
        throw new ConfigError(`${source} must contain an 'installed' or 'web' OAuth client with client_id and client_secret`);
    }

    const redirectUris = Array.isArray(section.redirect_uris) ? section.redirect_uris : [];
    const firstRedirect: unknown = redirectUris[0];

    return {
        clientId: section.client_id,
        clientSecret: section.client_secret,
        redirectUri: typeof firstRedirect === 'string' ? firstRedirect : 'http://localhost'
    };
}

export function parseCachedToken(raw: string): Auth.Credentials | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        return null;
    }
    if (!isRecord(parsed)) return null;

    const credentials: Auth.Credentials = {};
    if (typeof parsed.access_token === 'string') credentials.access_token = parsed.access_token;
    if (typeof parsed.refresh_token === 'string') credentials.refresh_token = parsed.refresh_token;
    if (typeof parsed.expiry_date === 'number') credentials.expiry_date = parsed.expiry_date;
    if (typeof parsed.token_type === 'string') credentials.token_type = parsed.token_type;
    if (typeof parsed.scope === 'string') credentials.scope = parsed.scope;

    return credentials.access_token || credentials.refresh_token ? credentials : null;
}

async function readOptional(filePath: string): Promise<string | null> {
    try {
        return await fs.readFile(filePath, 'utf8');
    } catch {
        return null;
    }
}

async function saveToken(tokenPath: string, credentials: Auth.Credentials): Promise<void> {
    await fs.mkdir(path.dirname(path.resolve(tokenPath)), { recursive: true });
    await fs.writeFile(tokenPath, JSON.stringify(credentials, null, 2), 'utf8');
}

const defaultRefreshAccessToken = async (client: Auth.OAuth2Client): Promise<string | null | undefined> => {
    const { token } = await client.getAccessToken();
    return token;
};

const defaultExchangeCode = async (client: Auth.OAuth2Client, code: string): Promise<Auth.Credentials> => {
    const { tokens } = await client.getToken(code);
    return tokens;
};

/**
 * Cached token first (refreshed through the refresh token when expiring),
 * then the interactive consent flow. The token file is rewritten whenever
 * the credentials change.
 */
export async function authorizeDrive(options: DriveAuthOptions): Promise<Auth.OAuth2Client> {
    const rawSecrets = await readOptional(options.credentialsPath);
    if (rawSecrets === null) {
        throw new ConfigError(`Drive OAuth client file not found: ${options.credentialsPath}`, 'DRIVE_CREDENTIALS_PATH');
    }
    const secrets = parseClientSecrets(rawSecrets, options.credentialsPath);
    const client = new google.auth.OAuth2(secrets.clientId, secrets.clientSecret, secrets.redirectUri);

    const rawToken = await readOptional(options.tokenPath);
    const cached = rawToken === null ? null : parseCachedToken(rawToken);

    if (cached) {
        client.setCredentials(cached);
        try {
            // Refreshes through the refresh token when the access token is missing or expiring
            const refresh = options.refreshAccessToken ?? defaultRefreshAccessToken;
            const token = await refresh(client);
            if (token) {
                if (token !== cached.access_token) {
                    await saveToken(options.tokenPath, {
                        ...cached,
                        ...client.credentials,
                        // refresh responses usually omit the refresh token
                        refresh_token: client.credentials.refresh_token ?? cached.refresh_token
                    });
                    console.log('[STORAGE] Refreshed Drive access token.');
                }
                return client;
            }
        } catch (error: unknown) {
            console.warn(`[STORAGE] Cached Drive token unusable (${getErrorMessage(error)}); starting authorization flow.`);
        }
    }

    const scopes = options.scopes ?? DRIVE_SCOPES;
    const authUrl = client.generateAuthUrl({ access_type: 'offline', scope: scopes, prompt: 'consent' });
    const code = (await options.askForCode(authUrl)).trim();
    if (!code) {
        throw new StorageError('No authorization code entered', 'AUTH');
    }

    const exchange = options.exchangeCode ?? defaultExchangeCode;
    let tokens: Auth.Credentials;
    try {
        tokens = await exchange(client, code);
    } catch (error: unknown) {
        throw new StorageError('Failed to exchange authorization code', 'AUTH', error);
    }

    client.setCredentials(tokens);
    await saveToken(options.tokenPath, tokens);
    console.log(`[STORAGE] Drive token stored to ${options.tokenPath}`);
    return client;
}
