import {
  AuditRules,
  DirectoryAccount,
  LICENSE_SEPARATOR,
  LicenseCandidate,
  NEVER_SIGNED_IN
} from '../types/audit.types';
import { toIsoDate, wholeDaysBetween } from '../utils/dates';

/**
 * Names of the watched licenses the account holds, in the account's own order.
 * A watched identifier matches either the SKU part number or the SKU id.
 */
export function matchHighCostLicenses(
  account: DirectoryAccount,
  highCostLicenses: readonly string[]
): string[] {
  const watched = new Set(highCostLicenses.map(license => license.toLowerCase()));
  const seen = new Set<string>();
  const matched: string[] = [];

  for (const license of account.licenses) {
    const skuId = license.skuId.toLowerCase();
    if (seen.has(skuId)) continue;
    if (watched.has(license.name.toLowerCase()) || watched.has(skuId)) {
      seen.add(skuId);
      matched.push(license.name);
    }
  }

  return matched;
}

/**
 * Flag accounts that hold a high-cost license but have been inactive for longer
 * than the threshold. Accounts with no sign-in on record are always flagged.
 *
 * Pure: the result depends only on the arguments, and keeps the order of `accounts`.
 */
export function findLicenseCandidates(
  accounts: readonly DirectoryAccount[],
  rules: AuditRules,
  now: Date
): LicenseCandidate[] {
  const candidates: LicenseCandidate[] = [];

  for (const account of accounts) {
    const matched = matchHighCostLicenses(account, rules.highCostLicenses);
    if (matched.length === 0) continue;

    const base = {
      displayName: account.displayName,
      userPrincipalName: account.userPrincipalName,
      highCostLicense: matched.join(LICENSE_SEPARATOR)
    };

    if (!account.lastSignIn) {
      candidates.push({ ...base, inactiveDays: null, lastSignIn: NEVER_SIGNED_IN });
      continue;
    }

    const inactiveDays = wholeDaysBetween(account.lastSignIn, now);
    // Strictly greater: an account exactly at the threshold is still considered active
    if (inactiveDays > rules.inactivityThresholdDays) {
      candidates.push({ ...base, inactiveDays, lastSignIn: toIsoDate(account.lastSignIn) });
    }
  }

  return candidates;
}
