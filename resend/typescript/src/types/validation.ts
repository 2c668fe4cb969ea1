/**
 * Request validation result types
 */

/**
 * A single failed check against a request field
 */
export interface Violation {
  /**
   * Field path, e.g. `to[2]` or `attachments[0].filename`
   */
  field: string;
  message: string;
  /**
   * Position of the offending element when validating a batch
   */
  index?: number;
}

export interface ValidationResult {
  valid: boolean;
  violations: Violation[];
}

/**
 * Context a request is validated in; batch elements carry extra restrictions
 */
export type ValidationContext = 'single' | 'batch';
