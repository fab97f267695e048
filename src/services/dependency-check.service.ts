/**
 * Verifies the directory client libraries can be loaded before any work starts
 */

export const DIRECTORY_CLIENT_MODULES = [
  '@microsoft/microsoft-graph-client',
  '@azure/msal-node'
] as const;

export type DependencyCheckResult =
  | { ok: true }
  | { ok: false; missing: string[]; installHint: string };

export type ModuleResolver = (moduleName: string) => string;

export function checkDependencies(
  modules: readonly string[] = DIRECTORY_CLIENT_MODULES,
  resolve: ModuleResolver = require.resolve
): DependencyCheckResult {
  const missing = modules.filter(moduleName => {
    try {
      resolve(moduleName);
      return false;
    } catch {
      return true;
    }
  });

  if (missing.length === 0) {
    return { ok: true };
  }

  return {
    ok: false,
    missing,
    installHint: `npm install ${missing.join(' ')}`
  };
}
