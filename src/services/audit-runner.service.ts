import type { DirectorySession } from './directory-client.service';
import type { DeviceCodePrompt } from './msal-token-manager.service';
import { AuditConfiguration, AzureConfig, LogLevelName } from '../config/types';
import { AuditOutcome, AuditStage } from '../types/audit.types';
import { checkDependencies, DependencyCheckResult } from './dependency-check.service';
import { findLicenseCandidates } from './license-audit.service';
import { ExportService, exportService } from './export.service';
import { MissingDependencyError, isAuditError, toError } from './base/errors';
import { logger } from '../utils/logger';

export type DirectoryConnector = (config: AzureConfig, logLevel: LogLevelName) => Promise<DirectorySession>;

export interface AuditRunnerDependencies {
  checkDependencies: () => DependencyCheckResult;
  connect: DirectoryConnector;
  exporter: ExportService;
  now: () => Date;
}

/**
 * Load the Graph-backed connector lazily, so a missing client library is
 * reported by the dependency check rather than by a failed import.
 */
export const createGraphConnector = (prompt?: DeviceCodePrompt): DirectoryConnector =>
  async (config, logLevel) => {
    const { connectDirectory } = await import('./directory-client.service');
    return connectDirectory(config, { prompt, debugLogging: logLevel === 'debug' });
  };

export const defaultDependencies = (): AuditRunnerDependencies => ({
  checkDependencies: () => checkDependencies(),
  connect: createGraphConnector(),
  exporter: exportService,
  now: () => new Date()
});

/**
 * One audit run: dependency check, sign-in, fetch, filter, report.
 * The directory session is always closed once it has been opened.
 */
export class AuditRunner {
  private readonly deps: AuditRunnerDependencies;

  constructor(deps: Partial<AuditRunnerDependencies> = {}) {
    this.deps = { ...defaultDependencies(), ...deps };
  }

  /**
   * The failed outcome when the directory client libraries cannot be loaded, otherwise `null`
   */
  verifyDependencies(): AuditOutcome | null {
    const dependencies = this.deps.checkDependencies();
    if (dependencies.ok) return null;

    logger.error(`Required directory client libraries are missing: ${dependencies.missing.join(', ')}`);
    logger.error(`Install them with: ${dependencies.installHint}`);
    return this.fail('DEPENDENCY_CHECK', new MissingDependencyError(
      `Missing modules: ${dependencies.missing.join(', ')}`,
      dependencies.missing
    ));
  }

  async run(config: Readonly<AuditConfiguration>): Promise<AuditOutcome> {
    const now = this.deps.now();

    const missing = this.verifyDependencies();
    if (missing) return missing;

    logger.info(`Connecting to the directory (tenant ${config.azure.tenantId}, ${config.azure.authMode})...`);
    let session: DirectorySession;
    try {
      session = await this.deps.connect(config.azure, config.logLevel);
    } catch (error) {
      return this.fail('AUTH', error);
    }

    let stage: AuditStage = 'FETCH';
    try {
      const accounts = await session.listAccounts();
      logger.info(`Analyzing ${accounts.length} accounts for inactive high-cost licenses...`);

      stage = 'FILTER';
      const candidates = findLicenseCandidates(accounts, config, now);

      stage = 'REPORT';
      if (candidates.length === 0) {
        logger.info(`No candidates found: every account holding a watched license signed in within ${config.inactivityThresholdDays} days.`);
        return { status: 'NO_CANDIDATES', accountsScanned: accounts.length, candidates: [] };
      }

      const rows = this.deps.exporter.toReportRows(candidates);
      const reportPath = this.deps.exporter.reportFilePath(config.report, now);
      await this.deps.exporter.writeCsvReport(rows, reportPath);

      logger.info(`Audit complete: ${candidates.length} of ${accounts.length} accounts are license optimization candidates.`);
      logger.info(`Report written to ${reportPath}`);
      this.deps.exporter.renderConsoleTable(rows);

      return {
        status: 'REPORT_WRITTEN',
        accountsScanned: accounts.length,
        candidates,
        reportPath
      };
    } catch (error) {
      return this.fail(stage, error);
    } finally {
      await this.closeSession(session);
    }
  }

  private async closeSession(session: DirectorySession): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      logger.warn('Failed to close the directory session cleanly', { message: toError(error).message });
    }
  }

  private fail(stage: AuditStage, error: unknown): AuditOutcome {
    const cause = toError(error);
    if (isAuditError(cause)) {
      logger.error(`${stage} failed [${cause.code}]: ${cause.message}`);
    } else {
      logger.error(`${stage} failed with an unexpected error: ${cause.message}`, { stack: cause.stack });
    }
    return { status: 'FAILED', stage, error: cause };
  }
}
