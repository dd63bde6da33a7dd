export type Severity = 'warning' | 'error';

export type ValidationCategory =
  | 'pattern-coverage'
  | 'graph-acyclicity'
  | 'version-monotonicity'
  | 'range-compatibility'
  | 'external-duplication';

export interface ValidationIssue {
  severity: Severity;
  category: ValidationCategory;
  message: string;
  packages: string[];
}

/**
 * User-facing rendering of any failure or issue.
 */
export interface Diagnostic {
  severity: Severity;
  category: string;
  message: string;
  packages: string[];
}
