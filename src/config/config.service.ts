import path from 'path';
import {
  AuditConfiguration,
  AzureAuthMode,
  ConfigOverrides,
  ConfigValidationResult
} from './types';
import { ConfigurationError } from '../services/base/errors';
import { logger } from '../utils/logger';

export const DEFAULT_HIGH_COST_LICENSES = [
  'ENTERPRISEPREMIUM',
  'SPE_E5',
  'VISIOCLIENT',
  'POWER_BI_PRO',
  'PROJECTPROFESSIONAL'
];

export const DEFAULT_INACTIVITY_THRESHOLD_DAYS = 90;

export const DEFAULT_REPORT_PREFIX = 'InactiveHighCostLicenses_';

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

type Env = Record<string, string | undefined>;

const splitList = (value: string): string[] =>
  value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);

const parseLogLevel = (value: string | undefined): AuditConfiguration['logLevel'] => {
  const match = LOG_LEVELS.find(level => level === value);
  return match ?? 'info';
};

/**
 * Builds the run configuration from the environment and command-line flags
 */
export class ConfigurationService {
  constructor(private readonly env: Env = process.env) {}

  /**
   * Load, validate and freeze the configuration. Throws when invalid.
   */
  load(overrides: ConfigOverrides = {}): Readonly<AuditConfiguration> {
    const config = this.loadConfiguration(overrides);
    const result = this.validateConfiguration(config);

    if (result.warnings.length > 0) {
      logger.warn('Configuration warnings:', { warnings: result.warnings });
    }

    if (!result.isValid) {
      throw new ConfigurationError(
        `Invalid configuration: ${result.errors.join('; ')}`,
        result.errors
      );
    }

    Object.freeze(config.highCostLicenses);
    Object.freeze(config.report);
    Object.freeze(config.azure);
    return Object.freeze(config);
  }

  loadConfiguration(overrides: ConfigOverrides = {}): AuditConfiguration {
    const env = this.env;

    const licenseSource = overrides.licenses ?? env.HIGH_COST_LICENSES;
    const highCostLicenses = licenseSource !== undefined
      ? splitList(licenseSource)
      : [...DEFAULT_HIGH_COST_LICENSES];

    const thresholdSource = overrides.threshold ?? env.INACTIVITY_THRESHOLD_DAYS;
    const inactivityThresholdDays = thresholdSource !== undefined
      ? Number(thresholdSource.trim())
      : DEFAULT_INACTIVITY_THRESHOLD_DAYS;

    const clientSecret = env.AZURE_CLIENT_SECRET || undefined;
    const authMode: AzureAuthMode = clientSecret ? 'client-credentials' : 'device-code';

    return {
      highCostLicenses,
      inactivityThresholdDays,
      report: {
        outputDirectory: path.resolve(overrides.outDir ?? env.REPORT_OUTPUT_DIR ?? process.cwd()),
        prefix: env.REPORT_PREFIX ?? DEFAULT_REPORT_PREFIX
      },
      azure: {
        tenantId: overrides.tenant ?? env.AZURE_TENANT_ID ?? 'organizations',
        clientId: overrides.clientId ?? env.AZURE_CLIENT_ID ?? '',
        clientSecret,
        authMode
      },
      logLevel: overrides.verbose ? 'debug' : parseLogLevel(env.LOG_LEVEL)
    };
  }

  validateConfiguration(config: AuditConfiguration): ConfigValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!Number.isInteger(config.inactivityThresholdDays) || config.inactivityThresholdDays < 1) {
      errors.push('INACTIVITY_THRESHOLD_DAYS must be a positive whole number of days');
    }

    if (config.highCostLicenses.length === 0) {
      errors.push('HIGH_COST_LICENSES must name at least one license');
    }

    if (!config.azure.clientId) {
      errors.push('AZURE_CLIENT_ID is required');
    }

    if (config.azure.authMode === 'client-credentials' && config.azure.tenantId === 'organizations') {
      errors.push('AZURE_TENANT_ID is required when AZURE_CLIENT_SECRET is set');
    }

    if (/[\\/]/.test(config.report.prefix)) {
      errors.push('REPORT_PREFIX must not contain path separators');
    }

    const unique = new Set(config.highCostLicenses.map(license => license.toLowerCase()));
    if (unique.size < config.highCostLicenses.length) {
      warnings.push('HIGH_COST_LICENSES contains duplicate entries');
    }

    if (config.inactivityThresholdDays > 365) {
      warnings.push(`Inactivity threshold of ${config.inactivityThresholdDays} days is longer than a year`);
    }

    return {
      isValid: errors.length === 0,
      errors,
      warnings
    };
  }
}
