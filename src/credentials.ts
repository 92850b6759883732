import fs from 'fs-extra';
import { auth } from '@googleapis/drive';
import { z } from 'zod';
import type { AppConfig } from './config.js';
import { AuthError, errorMessage } from './errors.js';
import { logger } from './logger.js';

export type GoogleAuthClient = InstanceType<typeof auth.OAuth2>;

/**
 * Source of backend credentials, injected into the upload strategies.
 * Acquiring or refreshing tokens interactively is someone else's job.
 */
export interface CredentialProvider {
  getYandexToken(): Promise<string>;
  getGoogleAuth(): Promise<GoogleAuthClient>;
  /** Forgets memoized credentials so the next call reads them again. */
  invalidate(): void;
}

const authorizedUserSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  refresh_token: z.string().min(1),
  token: z.string().optional(),
});

export type AuthorizedUser = z.infer<typeof authorizedUserSchema>;

/**
 * Reads the authorized-user JSON file written by a previous OAuth consent.
 */
export const readAuthorizedUser = async (tokenPath: string): Promise<AuthorizedUser> => {
  if (!(await fs.pathExists(tokenPath))) {
    throw new AuthError(`Google Drive token file not found: ${tokenPath}`);
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(tokenPath);
  } catch (error) {
    throw new AuthError(`Google Drive token file is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = authorizedUserSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new AuthError(`Google Drive token file is missing fields: ${fields}`);
  }
  return parsed.data;
};

export class ConfigCredentialProvider implements CredentialProvider {
  private googleAuth: GoogleAuthClient | null = null;
  private yandexToken: string | null = null;

  constructor(private readonly config: Pick<AppConfig, 'yandexDiskToken' | 'googleTokenPath'>) {}

  async getYandexToken(): Promise<string> {
    if (this.yandexToken) {
      return this.yandexToken;
    }
    const token = this.config.yandexDiskToken;
    if (!token) {
      throw new AuthError('YANDEX_DISK_TOKEN is not configured.');
    }
    this.yandexToken = token;
    logger.debug('auth', 'Yandex Disk token loaded from configuration.');
    return token;
  }

  async getGoogleAuth(): Promise<GoogleAuthClient> {
    if (this.googleAuth) {
      return this.googleAuth;
    }
    const user = await readAuthorizedUser(this.config.googleTokenPath);
    const client = new auth.OAuth2(user.client_id, user.client_secret);
    client.setCredentials({ refresh_token: user.refresh_token, access_token: user.token });
    this.googleAuth = client;
    logger.debug('auth', `Google Drive credentials loaded from ${this.config.googleTokenPath}`);
    return client;
  }

  invalidate(): void {
    this.googleAuth = null;
    this.yandexToken = null;
  }
}
