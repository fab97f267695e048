/**
 * Shared types for the license waste audit
 */

/**
 * A license assigned to an account. `name` is the SKU part number when the
 * tenant subscribes to the SKU, otherwise the SKU id.
 */
export interface AssignedLicense {
  skuId: string;
  name: string;
}

/**
 * An account as enumerated from the directory. Read-only input to the audit.
 */
export interface DirectoryAccount {
  id: string;
  displayName: string;
  userPrincipalName: string;
  /** Assigned licenses, in the order the directory returned them */
  licenses: AssignedLicense[];
  /** Last interactive sign-in; `null` when the directory has none on record */
  lastSignIn: Date | null;
}

/** Marker written in place of a date for accounts that never signed in */
export const NEVER_SIGNED_IN = 'Never';

/** Shown in the inactivity column when no sign-in is on record */
export const UNKNOWN_INACTIVITY = 'N/A';

export const LICENSE_SEPARATOR = ', ';

export interface LicenseCandidate {
  displayName: string;
  userPrincipalName: string;
  /** Whole days since last sign-in; `null` means no activity on record */
  inactiveDays: number | null;
  highCostLicense: string;
  /** `YYYY-MM-DD` (UTC) or {@link NEVER_SIGNED_IN} */
  lastSignIn: string;
}

export interface AuditRules {
  highCostLicenses: readonly string[];
  inactivityThresholdDays: number;
}

export const REPORT_COLUMNS = [
  'DisplayName',
  'UserPrincipalName',
  'InactiveForDays',
  'HighCostLicense',
  'LastSignIn'
] as const;

export type ReportColumn = typeof REPORT_COLUMNS[number];

export type ReportRow = Record<ReportColumn, string>;

export type AuditStage =
  | 'DEPENDENCY_CHECK'
  | 'AUTH'
  | 'FETCH'
  | 'FILTER'
  | 'REPORT';

export type AuditOutcome =
  | {
      status: 'REPORT_WRITTEN';
      accountsScanned: number;
      candidates: LicenseCandidate[];
      reportPath: string;
    }
  | {
      status: 'NO_CANDIDATES';
      accountsScanned: number;
      candidates: [];
    }
  | {
      status: 'FAILED';
      stage: AuditStage;
      error: Error;
    };

export const exitCodeFor = (outcome: AuditOutcome): number =>
  outcome.status === 'FAILED' ? 1 : 0;
