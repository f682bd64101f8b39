/**
 * Machine-readable validation issue codes
 */
export type ValidationIssueCode =
  | 'REQUIRED'
  | 'INVALID_FORMAT'
  | 'INVALID_ENUM'
  | 'OUT_OF_RANGE'
  | 'EMPTY_ITEMS';

/**
 * A single problem found in a request before it is sent
 */
export interface ValidationIssue {
  /** Path of the offending field, e.g. `items[1].quantity` */
  field: string;
  code: ValidationIssueCode;
  message: string;
}
