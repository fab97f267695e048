import { writeFile } from 'fs/promises';
import path from 'path';
import { createObjectCsvStringifier } from 'csv-writer';
import {
  LicenseCandidate,
  REPORT_COLUMNS,
  ReportRow,
  UNKNOWN_INACTIVITY
} from '../types/audit.types';
import { ReportConfig } from '../config/types';
import { ReportWriteError, toError } from './base/errors';
import { toIsoDate } from '../utils/dates';
import { logger } from '../utils/logger';

export interface ExportResult {
  path: string;
  rowCount: number;
  bytes: number;
}

export class ExportService {
  toReportRows(candidates: readonly LicenseCandidate[]): ReportRow[] {
    return candidates.map(candidate => ({
      DisplayName: candidate.displayName,
      UserPrincipalName: candidate.userPrincipalName,
      InactiveForDays: candidate.inactiveDays === null
        ? UNKNOWN_INACTIVITY
        : String(candidate.inactiveDays),
      HighCostLicense: candidate.highCostLicense,
      LastSignIn: candidate.lastSignIn
    }));
  }

  /**
   * Print rows as a console table, columns in report order
   */
  renderConsoleTable(rows: readonly ReportRow[]): void {
    console.table(rows, [...REPORT_COLUMNS]);
  }

  /**
   * `<outputDirectory>/<prefix><YYYY-MM-DD>.csv`, dated in UTC
   */
  reportFilePath(config: ReportConfig, now: Date): string {
    return path.join(config.outputDirectory, `${config.prefix}${toIsoDate(now)}.csv`);
  }

  toCsv(rows: readonly ReportRow[]): string {
    const csvStringifier = createObjectCsvStringifier({
      header: REPORT_COLUMNS.map(column => ({ id: column, title: column }))
    });

    return (csvStringifier.getHeaderString() ?? '') + csvStringifier.stringifyRecords([...rows]);
  }

  /**
   * Write the rows to a UTF-8 CSV file, replacing any file already at that path
   */
  async writeCsvReport(rows: readonly ReportRow[], filePath: string): Promise<ExportResult> {
    const content = Buffer.from(this.toCsv(rows), 'utf-8');

    try {
      await writeFile(filePath, content);
    } catch (error) {
      const cause = toError(error);
      logger.error('Failed to write report file', { path: filePath, message: cause.message });
      throw new ReportWriteError(`Could not write report to ${filePath}: ${cause.message}`, filePath, cause);
    }

    logger.debug(`Wrote ${rows.length} rows to ${filePath}`);
    return {
      path: filePath,
      rowCount: rows.length,
      bytes: content.length
    };
  }
}

export const exportService = new ExportService();
