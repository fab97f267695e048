import {
  AccountInfo,
  AuthenticationResult,
  ConfidentialClientApplication,
  PublicClientApplication
} from '@azure/msal-node';
import {
  APP_ONLY_SCOPES,
  DELEGATED_READ_SCOPES,
  DeviceCodePrompt,
  MsalTokenManager
} from './msal-token-manager.service';
import { AuthenticationError } from './base/errors';
import { AzureConfig } from '../config/types';

jest.mock('@azure/msal-node');

const MockedPublicClientApplication = jest.mocked(PublicClientApplication);
const MockedConfidentialClientApplication = jest.mocked(ConfidentialClientApplication);

describe('MsalTokenManager', () => {
  const deviceCodeConfig: AzureConfig = {
    tenantId: 'test-tenant-id',
    clientId: 'test-client-id',
    authMode: 'device-code'
  };

  const appOnlyConfig: AzureConfig = {
    tenantId: 'test-tenant-id',
    clientId: 'test-client-id',
    clientSecret: 'test-secret',
    authMode: 'client-credentials'
  };

  const testAccount: AccountInfo = {
    homeAccountId: 'home-id',
    environment: 'login.microsoftonline.com',
    tenantId: 'test-tenant-id',
    username: 'auditor@contoso.test',
    localAccountId: 'local-id'
  };

  // Helper function to create complete AuthenticationResult mocks
  const createMockAuthResult = (overrides: Partial<AuthenticationResult> = {}): AuthenticationResult => ({
    accessToken: 'mock-access-token',
    expiresOn: new Date(Date.now() + 3600000),
    scopes: DELEGATED_READ_SCOPES,
    tokenType: 'Bearer',
    uniqueId: 'test-unique-id',
    account: testAccount,
    idToken: '',
    idTokenClaims: {},
    tenantId: 'test-tenant-id',
    authority: 'https://login.microsoftonline.com/test-tenant-id',
    fromCache: false,
    correlationId: 'test-correlation-id',
    ...overrides
  });

  const tokenCache = {
    getAllAccounts: jest.fn(),
    removeAccount: jest.fn()
  };

  const publicClient = {
    acquireTokenByDeviceCode: jest.fn(),
    acquireTokenSilent: jest.fn(),
    getTokenCache: jest.fn(() => tokenCache),
    clearCache: jest.fn()
  };

  const confidentialClient = {
    acquireTokenByClientCredential: jest.fn(),
    getTokenCache: jest.fn(() => tokenCache),
    clearCache: jest.fn()
  };

  beforeEach(() => {
    MockedPublicClientApplication.mockImplementation(() => publicClient as unknown as PublicClientApplication);
    MockedConfidentialClientApplication.mockImplementation(() => confidentialClient as unknown as ConfidentialClientApplication);
    tokenCache.getAllAccounts.mockResolvedValue([]);
    tokenCache.removeAccount.mockResolvedValue(undefined);
  });

  describe('device code sign-in', () => {
    it('should ask only for the read scopes and show the prompt', async () => {
      const prompt = jest.fn();
      publicClient.acquireTokenByDeviceCode.mockResolvedValue(createMockAuthResult());

      const manager = new MsalTokenManager(deviceCodeConfig, prompt);
      const token = await manager.getAccessToken();

      expect(token).toBe('mock-access-token');
      expect(manager.mode).toBe('device-code');
      expect(MockedPublicClientApplication).toHaveBeenCalledWith(expect.objectContaining({
        auth: expect.objectContaining({
          clientId: 'test-client-id',
          authority: 'https://login.microsoftonline.com/test-tenant-id'
        })
      }));
      expect(publicClient.acquireTokenByDeviceCode).toHaveBeenCalledWith({
        scopes: ['User.Read.All', 'AuditLog.Read.All', 'Directory.Read.All'],
        deviceCodeCallback: prompt
      });
      expect(MockedConfidentialClientApplication).not.toHaveBeenCalled();
    });

    it('should print the sign-in instructions when no prompt is given', async () => {
      const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      publicClient.acquireTokenByDeviceCode.mockResolvedValue(createMockAuthResult());

      await new MsalTokenManager(deviceCodeConfig).getAccessToken();
      const [[request]] = publicClient.acquireTokenByDeviceCode.mock.calls;
      const prompt: DeviceCodePrompt = request.deviceCodeCallback;
      prompt({
        userCode: 'ABCD-1234',
        deviceCode: 'test-device-code',
        verificationUri: 'https://microsoft.com/devicelogin',
        expiresIn: 900,
        interval: 5,
        message: 'To sign in, enter the code ABCD-1234'
      });

      expect(log).toHaveBeenCalledWith('\nTo sign in, enter the code ABCD-1234\n');
      log.mockRestore();
    });

    it('should reuse a token that is still fresh', async () => {
      publicClient.acquireTokenByDeviceCode.mockResolvedValue(createMockAuthResult());
      const manager = new MsalTokenManager(deviceCodeConfig, jest.fn());

      await manager.getAccessToken();
      await manager.getAccessToken();

      expect(publicClient.acquireTokenByDeviceCode).toHaveBeenCalledTimes(1);
    });

    it('should renew silently when the token is about to expire', async () => {
      publicClient.acquireTokenByDeviceCode.mockResolvedValue(
        createMockAuthResult({ expiresOn: new Date(Date.now() + 60000) })
      );
      publicClient.acquireTokenSilent.mockResolvedValue(createMockAuthResult({ accessToken: 'renewed-token' }));
      const manager = new MsalTokenManager(deviceCodeConfig, jest.fn());

      await manager.getAccessToken();
      const token = await manager.getAccessToken();

      expect(token).toBe('renewed-token');
      expect(publicClient.acquireTokenSilent).toHaveBeenCalledWith({
        account: testAccount,
        scopes: DELEGATED_READ_SCOPES
      });
      expect(publicClient.acquireTokenByDeviceCode).toHaveBeenCalledTimes(1);
    });

    it('should raise an AuthenticationError when the sign-in is declined', async () => {
      const declined = new Error('authorization_declined: the user declined the sign-in');
      publicClient.acquireTokenByDeviceCode.mockRejectedValue(declined);
      const manager = new MsalTokenManager(deviceCodeConfig, jest.fn());

      const failure = manager.getAccessToken();

      await expect(failure).rejects.toBeInstanceOf(AuthenticationError);
      await expect(failure).rejects.toMatchObject({
        message: 'Sign-in to the directory failed: authorization_declined: the user declined the sign-in',
        cause: declined
      });
    });

    it('should raise an AuthenticationError when no token comes back', async () => {
      publicClient.acquireTokenByDeviceCode.mockResolvedValue(null);
      const manager = new MsalTokenManager(deviceCodeConfig, jest.fn());

      await expect(manager.getAccessToken()).rejects.toThrow(
        'Sign-in to the directory failed: No token returned by the identity platform'
      );
    });
  });

  describe('client credentials sign-in', () => {
    it('should use the confidential client with the default Graph scope', async () => {
      confidentialClient.acquireTokenByClientCredential.mockResolvedValue(
        createMockAuthResult({ accessToken: 'app-token', account: null, scopes: APP_ONLY_SCOPES })
      );

      const manager = new MsalTokenManager(appOnlyConfig);
      const token = await manager.getAccessToken();

      expect(token).toBe('app-token');
      expect(manager.requestedScopes).toEqual(['https://graph.microsoft.com/.default']);
      expect(MockedConfidentialClientApplication).toHaveBeenCalledWith(expect.objectContaining({
        auth: expect.objectContaining({ clientSecret: 'test-secret' })
      }));
      expect(confidentialClient.acquireTokenByClientCredential).toHaveBeenCalledWith({
        scopes: ['https://graph.microsoft.com/.default'],
        skipCache: false
      });
      expect(MockedPublicClientApplication).not.toHaveBeenCalled();
    });
  });

  describe('clear', () => {
    it('should remove cached accounts and force a new sign-in', async () => {
      publicClient.acquireTokenByDeviceCode.mockResolvedValue(createMockAuthResult());
      tokenCache.getAllAccounts.mockResolvedValue([testAccount]);
      const manager = new MsalTokenManager(deviceCodeConfig, jest.fn());

      await manager.getAccessToken();
      await manager.clear();
      await manager.getAccessToken();

      expect(tokenCache.removeAccount).toHaveBeenCalledWith(testAccount);
      expect(publicClient.clearCache).toHaveBeenCalledTimes(1);
      expect(publicClient.acquireTokenByDeviceCode).toHaveBeenCalledTimes(2);
      expect(publicClient.acquireTokenSilent).not.toHaveBeenCalled();
    });
  });
});
