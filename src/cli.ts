import { Command } from 'commander';
import { ConfigurationService } from './config/config.service';
import { AuditConfiguration, ConfigOverrides } from './config/types';
import { AuditRunner } from './services/audit-runner.service';
import { ConfigurationError, isAuditError, toError } from './services/base/errors';
import { exitCodeFor } from './types/audit.types';
import { logger, setLogLevel } from './utils/logger';

export function buildProgram(
  runner: AuditRunner = new AuditRunner(),
  configService: ConfigurationService = new ConfigurationService()
): Command {
  const program = new Command();

  program
    .name('license-audit')
    .description('Report accounts that hold high-cost licenses but have not signed in for a long time')
    .version(process.env.npm_package_version || '1.0.0')
    .option('-l, --licenses <list>', 'comma-separated license SKU part numbers (or SKU ids) to watch')
    .option('-t, --threshold <days>', 'days without a sign-in before an account is flagged')
    .option('-o, --out-dir <dir>', 'directory the CSV report is written to')
    .option('--tenant <id>', 'directory tenant id or domain')
    .option('--client-id <id>', 'application (client) id used to sign in')
    .option('-v, --verbose', 'debug logging')
    .action(async (options: ConfigOverrides) => {
      const missing = runner.verifyDependencies();
      if (missing) {
        process.exitCode = exitCodeFor(missing);
        return;
      }

      let config: Readonly<AuditConfiguration>;
      try {
        config = configService.load(options);
      } catch (error) {
        const cause = toError(error);
        logger.error(cause.message);
        if (cause instanceof ConfigurationError) {
          logger.error('Set the values in the environment or a .env file, or pass them as options (see --help).');
        }
        process.exitCode = 1;
        return;
      }

      setLogLevel(config.logLevel);
      logger.debug('Audit configuration', {
        highCostLicenses: config.highCostLicenses,
        inactivityThresholdDays: config.inactivityThresholdDays,
        outputDirectory: config.report.outputDirectory
      });

      const outcome = await runner.run(config);
      process.exitCode = exitCodeFor(outcome);
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<number> {
  try {
    await buildProgram().parseAsync(argv);
  } catch (error) {
    const cause = toError(error);
    logger.error(isAuditError(cause) ? cause.message : `Unexpected failure: ${cause.message}`);
    process.exitCode = 1;
  }
  return typeof process.exitCode === 'number' ? process.exitCode : 0;
}
