/**
 * Runtime validation guards for external boundaries.
 */

import type { PatientId } from "@clinic-relay/shared-types";
import { UserError, ErrorCodes, createPatientId } from "@clinic-relay/shared-types";

/** Max length of one file name segment. */
export const MAX_FILE_NAME_LENGTH = 255;

/** Validate a patient identifier coming from a request body, query or path. */
export function validatePatientId(value: unknown, fieldName = "pid"): PatientId {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new UserError(
      ErrorCodes.INVALID_PATIENT_ID,
      `${fieldName} is required and cannot be empty.`,
    );
  }
  try {
    return createPatientId(value);
  } catch {
    throw new UserError(
      ErrorCodes.INVALID_PATIENT_ID,
      `${fieldName} must be a single path segment: "${value}"`,
    );
  }
}

/**
 * Validate a document file name: one path segment, no dot-segments.
 * Returned unchanged, so distinct names never share a blob key.
 */
export function validateFileName(value: unknown, fieldName = "file_name"): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new UserError(
      ErrorCodes.INVALID_FILE_NAME,
      `${fieldName} is required and cannot be empty.`,
    );
  }
  if (/[/\\]/.test(value) || value === "." || value === "..") {
    throw new UserError(
      ErrorCodes.INVALID_FILE_NAME,
      `${fieldName} must be a single path segment: "${value}"`,
    );
  }
  if (value.length > MAX_FILE_NAME_LENGTH) {
    throw new UserError(
      ErrorCodes.INVALID_FILE_NAME,
      `${fieldName} is longer than ${MAX_FILE_NAME_LENGTH} characters.`,
    );
  }
  return value;
}

/** Validate that a value is a string (empty allowed). */
export function requireString(value: unknown, fieldName: string): string {
  if (typeof value !== "string") {
    throw new UserError(
      ErrorCodes.INVALID_REQUEST,
      `${fieldName} must be a string.`,
    );
  }
  return value;
}

/** Narrow an unknown JSON value to a plain object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
