import { isValid, parse } from "date-fns";
import type { RecordValidationError, ValidationResult } from "@mailsync/types";
import { ORIGIN_ADDRESS_FIELDS, SYNC_DATE_FORMAT } from "@mailsync/types";
import { isRawRecord, readField } from "./loose-value.js";

const EMAIL_PATTERN = /^[A-Z0-9a-z._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,64}$/;

const REFERENCE_DATE = new Date(2000, 0, 1);

export function isValidSyncDate(value: string): boolean {
  return isValid(parse(value, SYNC_DATE_FORMAT, REFERENCE_DATE));
}

export function isValidEmail(value: string): boolean {
  return EMAIL_PATTERN.test(value);
}

/**
 * Structural checks for one record. Errors come back in check order:
 * format, id, origin address, date, sender email.
 */
export function validateRecord(candidate: unknown, index: number): RecordValidationError[] {
  if (!isRawRecord(candidate)) {
    return [{ type: "invalid_format", index }];
  }

  const errors: RecordValidationError[] = [];

  if (readField(candidate, "id").kind === "absent") {
    errors.push({ type: "missing_field", field: "id", index });
  }

  const hasOrigin = ORIGIN_ADDRESS_FIELDS.some(
    (field) => readField(candidate, field).kind !== "absent",
  );
  if (!hasOrigin) {
    errors.push({ type: "missing_field", field: ORIGIN_ADDRESS_FIELDS.join("/"), index });
  }

  const date = readField(candidate, "date");
  if (date.kind === "string" && !isValidSyncDate(date.value)) {
    errors.push({ type: "invalid_date", value: date.value, index });
  }

  const fromAddress = readField(candidate, "from_address");
  if (fromAddress.kind === "mapping") {
    const email = readField(fromAddress.value, "email");
    if (email.kind === "string" && !isValidEmail(email.value)) {
      errors.push({ type: "invalid_email", value: email.value, index });
    }
  }

  return errors;
}

/**
 * Validate a whole batch. Never throws; defects are returned as data, records
 * in batch order.
 */
export function validateBatch(batch: readonly unknown[]): ValidationResult {
  // Array.from visits holes of a sparse batch (as undefined), so each one is
  // reported as invalid_format instead of being skipped.
  const errors = Array.from(batch, (candidate, index) => validateRecord(candidate, index)).flat();
  return { isValid: errors.length === 0, errors };
}
