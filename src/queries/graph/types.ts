/**
 * Microsoft Graph API Query Types and Interfaces
 */

export interface GraphQueryDefinition {
  id: string;
  query: {
    endpoint: string;
    select: string[];
    top?: number;
  };
}

// Common Graph API response types

export interface GraphAssignedLicense {
  skuId: string;
  disabledPlans?: string[];
}

export interface GraphUser {
  id: string;
  displayName?: string | null;
  userPrincipalName?: string | null;
  assignedLicenses?: GraphAssignedLicense[];
  signInActivity?: {
    lastSignInDateTime?: string | null;
    lastNonInteractiveSignInDateTime?: string | null;
  } | null;
}

export interface GraphSubscribedSku {
  skuId: string;
  skuPartNumber: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

export function isGraphUser(value: unknown): value is GraphUser {
  return isRecord(value) && typeof value.id === 'string';
}

export function isGraphSubscribedSku(value: unknown): value is GraphSubscribedSku {
  return isRecord(value) &&
    typeof value.skuId === 'string' &&
    typeof value.skuPartNumber === 'string';
}
