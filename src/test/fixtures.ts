import { AuditConfiguration } from '../config/types';
import { AssignedLicense, DirectoryAccount } from '../types/audit.types';

export const NOW = new Date('2026-06-01T12:00:00Z');

const DAY_MS = 24 * 60 * 60 * 1000;

export const daysAgo = (days: number, from: Date = NOW): Date =>
  new Date(from.getTime() - days * DAY_MS);

/** Licenses of subscribed SKUs, with made-up SKU ids derived from the part numbers */
export const skuIdFor = (name: string): string => `sku-${name.toLowerCase()}`;

export const skus = (...names: string[]): AssignedLicense[] =>
  names.map(name => ({ skuId: skuIdFor(name), name }));

export const account = (overrides: Partial<DirectoryAccount> = {}): DirectoryAccount => ({
  id: overrides.userPrincipalName ?? 'user-id',
  displayName: 'Test User',
  userPrincipalName: 'test.user@contoso.test',
  licenses: skus(),
  lastSignIn: null,
  ...overrides
});

/** Alice, Bob, Charlie and Dana: three candidates and one account without a watched license */
export const sampleAccounts = (): DirectoryAccount[] => [
  account({
    id: 'a1',
    displayName: 'Alice',
    userPrincipalName: 'alice@contoso.test',
    licenses: skus('ENTERPRISEPREMIUM'),
    lastSignIn: daysAgo(124)
  }),
  account({
    id: 'b2',
    displayName: 'Bob',
    userPrincipalName: 'bob@contoso.test',
    licenses: skus('VISIOCLIENT'),
    lastSignIn: daysAgo(95)
  }),
  account({
    id: 'c3',
    displayName: 'Charlie',
    userPrincipalName: 'charlie@contoso.test',
    licenses: skus('POWER_BI_PRO'),
    lastSignIn: null
  }),
  account({
    id: 'd4',
    displayName: 'Dana',
    userPrincipalName: 'dana@contoso.test',
    licenses: skus('EXCHANGESTANDARD'),
    lastSignIn: daysAgo(400)
  })
];

export const testConfig = (overrides: Partial<AuditConfiguration> = {}): AuditConfiguration => ({
  highCostLicenses: ['ENTERPRISEPREMIUM', 'VISIOCLIENT', 'POWER_BI_PRO'],
  inactivityThresholdDays: 90,
  report: {
    outputDirectory: '/tmp',
    prefix: 'InactiveHighCostLicenses_'
  },
  azure: {
    tenantId: 'test-tenant-id',
    clientId: 'test-client-id',
    authMode: 'device-code'
  },
  logLevel: 'error',
  ...overrides
});
