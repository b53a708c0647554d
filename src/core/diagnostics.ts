/**
 * Structured diagnostics returned by the expansion core
 *
 * Structural problems (malformed declarations, name collisions) are errors;
 * reference and lookup mismatches are warnings. Neither stops the run.
 */

export type DiagnosticSeverity = 'warning' | 'error';

export enum DiagnosticCode {
  // Reference errors
  UNKNOWN_PROVIDER = 'UNKNOWN_PROVIDER',
  UNKNOWN_ENVIRONMENT = 'UNKNOWN_ENVIRONMENT',
  UNKNOWN_INTERFACE_ENVIRONMENT = 'UNKNOWN_INTERFACE_ENVIRONMENT',
  MISSING_ZONE_SUBNET = 'MISSING_ZONE_SUBNET',
  MISSING_ZONE_OVERRIDE = 'MISSING_ZONE_OVERRIDE',
  INCOMPLETE_ROLE = 'INCOMPLETE_ROLE',

  // Structural errors
  MALFORMED_SUBNET = 'MALFORMED_SUBNET',
  MALFORMED_ROLE_ENTRY = 'MALFORMED_ROLE_ENTRY',
  MALFORMED_INTERFACE = 'MALFORMED_INTERFACE',
  MISSING_DEFAULT_SERVERS = 'MISSING_DEFAULT_SERVERS',
  DUPLICATE_PROFILE = 'DUPLICATE_PROFILE',
  DUPLICATE_HOSTNAME = 'DUPLICATE_HOSTNAME',
  INTERNAL = 'INTERNAL',
}

/**
 * Where a diagnostic was raised
 */
export interface DiagnosticScope {
  provider?: string;
  environment?: string;
  role?: string;
}

export interface Diagnostic extends DiagnosticScope {
  severity: DiagnosticSeverity;
  code: DiagnosticCode;
  message: string;
  details?: unknown;
}

export function warning(
  code: DiagnosticCode,
  message: string,
  scope: DiagnosticScope = {},
  details?: unknown
): Diagnostic {
  return { severity: 'warning', code, message, ...scope, ...(details === undefined ? {} : { details }) };
}

export function error(
  code: DiagnosticCode,
  message: string,
  scope: DiagnosticScope = {},
  details?: unknown
): Diagnostic {
  return { severity: 'error', code, message, ...scope, ...(details === undefined ? {} : { details }) };
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some(d => d.severity === 'error');
}

/**
 * Fill in scope fields a lower stage did not know about
 */
export function withScope(diagnostic: Diagnostic, scope: DiagnosticScope): Diagnostic {
  return { ...scope, ...diagnostic };
}
