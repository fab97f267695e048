/**
 * Configuration Types and Interfaces
 */

export type AzureAuthMode = 'device-code' | 'client-credentials';

export interface AzureConfig {
  tenantId: string;
  clientId: string;
  clientSecret?: string;
  authMode: AzureAuthMode;
}

export type LogLevelName = 'error' | 'warn' | 'info' | 'debug';

export interface ReportConfig {
  outputDirectory: string;
  prefix: string;
}

export interface AuditConfiguration {
  highCostLicenses: string[];
  inactivityThresholdDays: number;
  report: ReportConfig;
  azure: AzureConfig;
  logLevel: LogLevelName;
}

/**
 * Values given on the command line. They win over the environment.
 */
export interface ConfigOverrides {
  licenses?: string;
  threshold?: string;
  outDir?: string;
  tenant?: string;
  clientId?: string;
  verbose?: boolean;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}
