import {
  AuthenticationResult,
  ClientCredentialRequest,
  ConfidentialClientApplication,
  Configuration,
  DeviceCodeRequest,
  LogLevel,
  PublicClientApplication
} from '@azure/msal-node';
import { AzureConfig } from '../config/types';
import { AuthenticationError, toError } from './base/errors';
import { logger } from '../utils/logger';

/**
 * Delegated scopes for an operator sign-in. Read-only, nothing more.
 */
export const DELEGATED_READ_SCOPES = [
  'User.Read.All',
  'AuditLog.Read.All',
  'Directory.Read.All'
];

export const APP_ONLY_SCOPES = ['https://graph.microsoft.com/.default'];

export type DeviceCodePrompt = DeviceCodeRequest['deviceCodeCallback'];

const defaultPrompt: DeviceCodePrompt = response => {
  console.log(`\n${response.message}\n`);
};

export class MsalTokenManager {
  private readonly app:
    | { kind: 'confidential'; client: ConfidentialClientApplication }
    | { kind: 'public'; client: PublicClientApplication };
  private readonly scopes: string[];
  private current: AuthenticationResult | null = null;
  private readonly REFRESH_WINDOW = 5 * 60 * 1000; // 5 minutes before expiry

  constructor(
    private readonly config: AzureConfig,
    private readonly prompt: DeviceCodePrompt = defaultPrompt
  ) {
    const msalConfig: Configuration = {
      auth: {
        clientId: config.clientId,
        authority: `https://login.microsoftonline.com/${config.tenantId}`,
        clientSecret: config.clientSecret
      },
      system: {
        loggerOptions: {
          loggerCallback: (_level, message, containsPii) => {
            if (!containsPii) {
              logger.debug(`MSAL: ${message}`);
            }
          },
          piiLoggingEnabled: false,
          logLevel: LogLevel.Info
        }
      }
    };

    if (config.authMode === 'client-credentials') {
      this.app = { kind: 'confidential', client: new ConfidentialClientApplication(msalConfig) };
      this.scopes = APP_ONLY_SCOPES;
    } else {
      this.app = { kind: 'public', client: new PublicClientApplication(msalConfig) };
      this.scopes = DELEGATED_READ_SCOPES;
    }
  }

  get mode(): AzureConfig['authMode'] {
    return this.config.authMode;
  }

  get requestedScopes(): readonly string[] {
    return this.scopes;
  }

  /**
   * Return a bearer token, signing in on first use
   */
  async getAccessToken(): Promise<string> {
    if (this.current && !this.shouldRefreshToken(this.current.expiresOn)) {
      return this.current.accessToken;
    }

    try {
      const response = await this.acquireToken();
      if (!response?.accessToken) {
        throw new Error('No token returned by the identity platform');
      }

      this.current = response;
      logger.debug('Access token acquired', {
        mode: this.config.authMode,
        scopes: response.scopes
      });
      return response.accessToken;
    } catch (error) {
      const cause = toError(error);
      logger.error('Failed to acquire access token:', { message: cause.message });
      throw new AuthenticationError(`Sign-in to the directory failed: ${cause.message}`, cause);
    }
  }

  /**
   * Forget every token this run obtained
   */
  async clear(): Promise<void> {
    this.current = null;
    const { client } = this.app;
    const cache = client.getTokenCache();
    const accounts = await cache.getAllAccounts();
    for (const account of accounts) {
      await cache.removeAccount(account);
    }
    client.clearCache();
    logger.debug('MSAL token cache cleared');
  }

  private async acquireToken(): Promise<AuthenticationResult | null> {
    if (this.app.kind === 'confidential') {
      const request: ClientCredentialRequest = {
        scopes: this.scopes,
        skipCache: false
      };
      return this.app.client.acquireTokenByClientCredential(request);
    }

    const account = this.current?.account;
    if (account) {
      return this.app.client.acquireTokenSilent({ account, scopes: this.scopes });
    }

    const request: DeviceCodeRequest = {
      scopes: this.scopes,
      deviceCodeCallback: this.prompt
    };
    return this.app.client.acquireTokenByDeviceCode(request);
  }

  private shouldRefreshToken(expiresOn: Date | null): boolean {
    if (!expiresOn) return true;
    return expiresOn.getTime() - Date.now() < this.REFRESH_WINDOW;
  }
}
