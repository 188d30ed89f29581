/**
 * Diagnostics (errors/warnings) produced by validation.
 *
 * The goal is to keep all "user-facing" feedback structured:
 * - `code`: stable identifier for programmatic handling.
 * - `message`: human-readable description.
 * - `line`: 1-based source line (when applicable).
 */
export type DiagnosticSeverity = 'error' | 'warning';

export interface Diagnostic {
  severity: DiagnosticSeverity;
  code: string;
  message: string;
  line?: number;
}

/**
 * Helper for building an error diagnostic.
 */
export function errorDiagnostic(
  code: string,
  message: string,
  line?: number
): Diagnostic {
  return { severity: 'error', code, message, line };
}

export function warningDiagnostic(
  code: string,
  message: string,
  line?: number
): Diagnostic {
  return { severity: 'warning', code, message, line };
}
