export type RecordValidationError =
  | { type: "invalid_format"; index: number }
  | { type: "missing_field"; field: string; index: number }
  | { type: "invalid_date"; value: string; index: number }
  | { type: "invalid_email"; value: string; index: number };

export interface ValidationResult {
  /** True exactly when `errors` is empty. */
  isValid: boolean;
  errors: RecordValidationError[];
}
