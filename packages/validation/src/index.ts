/**
 * @clinic-relay/validation: runtime guards for external boundaries.
 */

export {
  validatePatientId,
  validateFileName,
  requireString,
  isRecord,
  MAX_FILE_NAME_LENGTH,
} from "./guards.js";
