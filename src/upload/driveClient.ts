import { createSign } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { UploadError, errorMessage } from '../shared/errors.js';
import { fetchWithTimeout, type FetchLike } from '../shared/http.js';
import { logger } from '../shared/logger.js';

const DRIVE_API = 'https://www.googleapis.com/drive/v3';
const DRIVE_UPLOAD_API = 'https://www.googleapis.com/upload/drive/v3';
const TOKEN_URL = 'https://oauth2.googleapis.com/token';
const DRIVE_SCOPE = 'https://www.googleapis.com/auth/drive';
const FOLDER_MIME = 'application/vnd.google-apps.folder';
const JWT_LIFETIME_SECONDS = 3600;
const TOKEN_EXPIRY_BUFFER_SECONDS = 60;

/**
 * Remote folder tree operations the uploader needs.
 */
export interface RemoteStore {
  findFolder(name: string, parentId: string): Promise<string | null>;
  createFolder(name: string, parentId: string): Promise<string>;
  fileExists(name: string, parentId: string): Promise<boolean>;
  uploadFile(localPath: string, name: string, parentId: string): Promise<void>;
}

export const ServiceAccountSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

export type ServiceAccount = z.infer<typeof ServiceAccountSchema>;

const TokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.number(),
});

const FileListSchema = z.object({
  files: z.array(z.object({ id: z.string(), name: z.string() })).default([]),
});

const CreatedSchema = z.object({ id: z.string() });

export function loadServiceAccount(credentialsPath: string): ServiceAccount {
  if (!fs.existsSync(credentialsPath)) {
    throw new UploadError(`Credentials file not found: ${credentialsPath}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(credentialsPath, 'utf-8'));
  } catch (err) {
    throw new UploadError(`Credentials file is not valid JSON: ${credentialsPath}`, {
      error: errorMessage(err),
    });
  }
  const parsed = ServiceAccountSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UploadError('Credentials file is not a service account key', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return {
    client_email: parsed.data.client_email,
    private_key: parsed.data.private_key.replace(/\\n/g, '\n'),
  };
}

/**
 * Folder id from a Drive folder URL ("/folders/<id>" or "?id=<id>"), or the input itself.
 */
export function parseDriveFolderId(folderUrl: string): string {
  if (folderUrl.includes('/folders/')) {
    return (folderUrl.split('/folders/').pop() ?? '').split('?')[0] ?? '';
  }
  if (folderUrl.includes('?id=')) {
    return (folderUrl.split('?id=').pop() ?? '').split('&')[0] ?? '';
  }
  return folderUrl.replace(/^\/+|\/+$/g, '');
}

function escapeQuery(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

export interface DriveClientOptions {
  accessToken?: string;
  serviceAccount?: ServiceAccount;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

/**
 * Google Drive v3 over REST. Authenticates with a pre-issued access token or
 * a service-account JWT exchanged at the OAuth2 token endpoint.
 */
export class DriveClient implements RemoteStore {
  private accessToken: string | null;
  private tokenExpiry = 0;
  private readonly timeoutMs: number;

  constructor(private readonly options: DriveClientOptions) {
    if (!options.accessToken && !options.serviceAccount) {
      throw new UploadError('Drive client needs an access token or service account credentials');
    }
    this.accessToken = options.accessToken ?? null;
    this.tokenExpiry = options.accessToken ? Number.POSITIVE_INFINITY : 0;
    this.timeoutMs = options.timeoutMs ?? 60000;
  }

  private createJwt(account: ServiceAccount, nowSeconds: number): string {
    const header = { alg: 'RS256', typ: 'JWT' };
    const payload = {
      iss: account.client_email,
      scope: DRIVE_SCOPE,
      aud: TOKEN_URL,
      exp: nowSeconds + JWT_LIFETIME_SECONDS,
      iat: nowSeconds,
    };
    const encodedHeader = Buffer.from(JSON.stringify(header)).toString('base64url');
    const encodedPayload = Buffer.from(JSON.stringify(payload)).toString('base64url');
    const signatureInput = `${encodedHeader}.${encodedPayload}`;

    const sign = createSign('RSA-SHA256');
    sign.update(signatureInput);
    sign.end();
    return `${signatureInput}.${sign.sign(account.private_key, 'base64url')}`;
  }

  async getAccessToken(): Promise<string> {
    const now = Math.floor(Date.now() / 1000);
    if (this.accessToken && this.tokenExpiry > now + TOKEN_EXPIRY_BUFFER_SECONDS) {
      return this.accessToken;
    }

    const account = this.options.serviceAccount;
    if (!account) {
      throw new UploadError('Drive access token expired and no service account to refresh it');
    }

    logger.debug('Requesting Drive access token');
    const response = await fetchWithTimeout(
      TOKEN_URL,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({
          grant_type: 'urn:ietf:params:oauth:grant-type:jwt-bearer',
          assertion: this.createJwt(account, now),
        }),
      },
      this.timeoutMs,
      undefined,
      this.options.fetchImpl,
    );

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new UploadError(`OAuth2 token request failed: ${response.status}`, {
        body: text.slice(0, 300),
      });
    }

    const parsed = TokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new UploadError('Unexpected OAuth2 token response');
    }
    this.accessToken = parsed.data.access_token;
    this.tokenExpiry = now + parsed.data.expires_in;
    return this.accessToken;
  }

  private async request(url: string, init: RequestInit = {}): Promise<unknown> {
    const token = await this.getAccessToken();
    const headers = new Headers(init.headers);
    headers.set('Authorization', `Bearer ${token}`);

    const response = await fetchWithTimeout(
      url,
      { ...init, headers },
      this.timeoutMs,
      undefined,
      this.options.fetchImpl,
    );
    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new UploadError(`Drive API error: ${response.status}`, {
        url,
        body: text.slice(0, 300),
      });
    }
    return response.json();
  }

  private async listByQuery(query: string): Promise<Array<{ id: string; name: string }>> {
    const params = new URLSearchParams({ q: query, fields: 'files(id, name)' });
    const parsed = FileListSchema.safeParse(await this.request(`${DRIVE_API}/files?${params.toString()}`));
    if (!parsed.success) {
      throw new UploadError('Unexpected Drive file list response');
    }
    return parsed.data.files;
  }

  async findFolder(name: string, parentId: string): Promise<string | null> {
    const files = await this.listByQuery(
      `mimeType='${FOLDER_MIME}' and name='${escapeQuery(name)}' and '${escapeQuery(parentId)}' in parents and trashed=false`,
    );
    return files[0]?.id ?? null;
  }

  async createFolder(name: string, parentId: string): Promise<string> {
    const body = await this.request(`${DRIVE_API}/files?fields=id`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ name, mimeType: FOLDER_MIME, parents: [parentId] }),
    });
    const parsed = CreatedSchema.safeParse(body);
    if (!parsed.success) {
      throw new UploadError(`Unexpected response creating folder ${name}`);
    }
    return parsed.data.id;
  }

  async fileExists(name: string, parentId: string): Promise<boolean> {
    const files = await this.listByQuery(
      `name='${escapeQuery(name)}' and '${escapeQuery(parentId)}' in parents and trashed=false`,
    );
    return files.length > 0;
  }

  async uploadFile(localPath: string, name: string, parentId: string): Promise<void> {
    const boundary = `pinharvest-${Date.now().toString(36)}`;
    const metadata = JSON.stringify({ name, parents: [parentId] });
    const content = await fs.promises.readFile(localPath, 'base64');
    const mimeType = path.extname(localPath) === '.json' ? 'application/json' : 'image/jpeg';

    const body =
      `--${boundary}\r\nContent-Type: application/json; charset=UTF-8\r\n\r\n${metadata}\r\n` +
      `--${boundary}\r\nContent-Type: ${mimeType}\r\nContent-Transfer-Encoding: base64\r\n\r\n` +
      `${content}\r\n--${boundary}--`;

    await this.request(`${DRIVE_UPLOAD_API}/files?uploadType=multipart&fields=id`, {
      method: 'POST',
      headers: { 'Content-Type': `multipart/related; boundary=${boundary}` },
      body,
    });
  }
}
