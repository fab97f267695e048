import { Client } from '@microsoft/microsoft-graph-client';
import { AzureConfig } from '../config/types';
import { DirectoryAccount } from '../types/audit.types';
import {
  GraphQueryDefinition,
  GraphSubscribedSku,
  GraphUser,
  isGraphSubscribedSku,
  isGraphUser,
  licensedUsersQuery,
  subscribedSkusQuery
} from '../queries/graph';
import { buildGraphRequest, parseGraphResponse, toDirectoryFetchError } from '../utils/graph-utils';
import { DeviceCodePrompt, MsalTokenManager } from './msal-token-manager.service';
import { logger } from '../utils/logger';

const directoryLogger = logger.child({ service: 'DirectoryClient' });

/**
 * An authenticated, read-only view of the directory
 */
export interface DirectorySession {
  listAccounts(): Promise<DirectoryAccount[]>;
  close(): Promise<void>;
}

/**
 * Token source the session depends on. {@link MsalTokenManager} in production.
 */
export interface AccessTokenSource {
  getAccessToken(): Promise<string>;
  clear(): Promise<void>;
}

export type SkuNameMap = ReadonlyMap<string, string>;

export function buildSkuNameMap(skus: GraphSubscribedSku[]): SkuNameMap {
  return new Map(skus.map(sku => [sku.skuId.toLowerCase(), sku.skuPartNumber]));
}

function parseSignIn(value: string | null | undefined): Date | null {
  if (!value) return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Map a Graph user onto the audit's account shape, naming licenses by SKU part number where known
 */
export function toDirectoryAccount(user: GraphUser, skuNames: SkuNameMap): DirectoryAccount {
  const licenses = (user.assignedLicenses ?? []).map(license => ({
    skuId: license.skuId,
    name: skuNames.get(license.skuId.toLowerCase()) ?? license.skuId
  }));

  return {
    id: user.id,
    displayName: user.displayName ?? '',
    userPrincipalName: user.userPrincipalName ?? '',
    licenses,
    lastSignIn: parseSignIn(user.signInActivity?.lastSignInDateTime)
  };
}

export class GraphDirectorySession implements DirectorySession {
  private client: Client | null;

  constructor(client: Client, private readonly tokens: AccessTokenSource) {
    this.client = client;
  }

  async listAccounts(): Promise<DirectoryAccount[]> {
    const skus = await this.getAllPages(subscribedSkusQuery, isGraphSubscribedSku, 'Reading subscribed licenses');
    const skuNames = buildSkuNameMap(skus);
    directoryLogger.debug(`Resolved ${skuNames.size} subscribed SKUs`);

    const users = await this.getAllPages(licensedUsersQuery, isGraphUser, 'Listing directory accounts');
    return users.map(user => toDirectoryAccount(user, skuNames));
  }

  async close(): Promise<void> {
    if (!this.client) return;
    this.client = null;
    await this.tokens.clear();
    directoryLogger.debug('Directory session closed');
  }

  /**
   * Follow @odata.nextLink until the collection is exhausted
   */
  private async getAllPages<T>(
    definition: GraphQueryDefinition,
    isItem: (value: unknown) => value is T,
    operation: string
  ): Promise<T[]> {
    const client = this.requireClient();
    const allItems: T[] = [];

    try {
      const request = buildGraphRequest(client.api(definition.query.endpoint), {
        select: definition.query.select,
        top: definition.query.top
      });

      let page = parseGraphResponse(await request.get(), isItem);
      allItems.push(...page.data);
      let pageCount = 1;

      while (page.nextLink) {
        page = parseGraphResponse(await client.api(page.nextLink).get(), isItem);
        allItems.push(...page.data);
        pageCount++;
      }

      directoryLogger.debug(`${definition.id}: ${allItems.length} items in ${pageCount} page(s)`);
      return allItems;
    } catch (error) {
      throw toDirectoryFetchError(error, operation);
    }
  }

  private requireClient(): Client {
    if (!this.client) {
      throw new Error('Directory session is closed');
    }
    return this.client;
  }
}

export interface ConnectOptions {
  prompt?: DeviceCodePrompt;
  /** Log every Graph request and response */
  debugLogging?: boolean;
}

/**
 * Sign in and open a read-only Graph session
 */
export async function connectDirectory(
  config: AzureConfig,
  options: ConnectOptions = {}
): Promise<DirectorySession> {
  const tokens = new MsalTokenManager(config, options.prompt);
  directoryLogger.debug('Requesting directory access', {
    mode: tokens.mode,
    scopes: tokens.requestedScopes
  });

  // Sign in up front so an authentication failure surfaces before any fetch
  await tokens.getAccessToken();

  const client = Client.init({
    authProvider: async done => {
      try {
        done(null, await tokens.getAccessToken());
      } catch (error) {
        done(error, null);
      }
    },
    defaultVersion: 'v1.0',
    debugLogging: options.debugLogging ?? false
  });

  return new GraphDirectorySession(client, tokens);
}
