/**
 * Control frame decoding for duplex sessions.
 *
 * `{"status": true}` → stop, `{"type":"start", ...}` → start, any other
 * JSON → unknown. Text that is not a JSON object is malformed.
 */

import type { ControlMessage } from "@clinic-relay/shared-types";
import { UserError, ErrorCodes } from "@clinic-relay/shared-types";
import { isRecord, validatePatientId } from "@clinic-relay/validation";

/**
 * Decode one text frame.
 * @throws UserError(MALFORMED_CONTROL_FRAME) when the text is not a JSON object
 * @throws UserError(INVALID_PATIENT_ID) when a start frame carries an unusable `patient_id`
 */
export function parseControlFrame(text: string): ControlMessage {
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch {
    throw new UserError(ErrorCodes.MALFORMED_CONTROL_FRAME, "Control frame is not valid JSON.");
  }
  if (!isRecord(decoded)) {
    throw new UserError(
      ErrorCodes.MALFORMED_CONTROL_FRAME,
      "Control frame must be a JSON object.",
    );
  }

  // Stop takes precedence, as in `{"type":"start","status":true}`.
  if (decoded["status"] === true) {
    return { kind: "stop" };
  }

  if (decoded["type"] === "start") {
    const { patient_id: rawPatientId, ...fields } = decoded;
    return {
      kind: "start",
      patientId:
        rawPatientId === undefined || rawPatientId === null
          ? undefined
          : validatePatientId(rawPatientId, "patient_id"),
      fields,
    };
  }

  return { kind: "unknown" };
}
