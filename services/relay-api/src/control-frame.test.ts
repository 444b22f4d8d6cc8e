import { describe, it, expect } from "vitest";
import { parseControlFrame } from "./control-frame.js";
import { UserError, ErrorCodes } from "@clinic-relay/shared-types";

describe("parseControlFrame", () => {
  it("decodes a start frame with its variant fields", () => {
    expect(
      parseControlFrame('{"type":"start","patient_id":"P0007","script_file":"intake.json"}'),
    ).toEqual({
      kind: "start",
      patientId: "P0007",
      fields: { type: "start", script_file: "intake.json" },
    });
  });

  it("leaves the patient id unset when omitted", () => {
    expect(parseControlFrame('{"type":"start"}')).toEqual({
      kind: "start",
      patientId: undefined,
      fields: { type: "start" },
    });
  });

  it("treats a null patient id as omitted", () => {
    expect(parseControlFrame('{"type":"start","patient_id":null}')).toMatchObject({
      kind: "start",
      patientId: undefined,
    });
  });

  it("rejects a patient id that is not a single path segment", () => {
    expect(() => parseControlFrame('{"type":"start","patient_id":"../etc"}')).toThrow(
      expect.objectContaining({ code: ErrorCodes.INVALID_PATIENT_ID }),
    );
  });

  it("decodes the stop signal", () => {
    expect(parseControlFrame('{"status":true}')).toEqual({ kind: "stop" });
  });

  it("only treats a literal true status as stop", () => {
    expect(parseControlFrame('{"status":"true"}')).toEqual({ kind: "unknown" });
    expect(parseControlFrame('{"status":false}')).toEqual({ kind: "unknown" });
  });

  it("ignores other shapes", () => {
    expect(parseControlFrame('{"type":"ping"}')).toEqual({ kind: "unknown" });
  });

  it("rejects truncated JSON", () => {
    expect(() => parseControlFrame('{"type":')).toThrow(UserError);
    expect(() => parseControlFrame('{"type":')).toThrow("Control frame is not valid JSON.");
  });

  it("rejects JSON that is not an object", () => {
    expect(() => parseControlFrame("[1,2]")).toThrow("Control frame must be a JSON object.");
    expect(() => parseControlFrame("42")).toThrow(
      expect.objectContaining({ code: ErrorCodes.MALFORMED_CONTROL_FRAME }),
    );
  });
});
