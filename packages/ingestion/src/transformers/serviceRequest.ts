import type { RawServiceRequest, TransformResult } from "../types.js";
import { normalizeTimestamp } from "./timestamp.js";

const INTEGER_STRING = /^\s*[+-]?\d+\s*$/;

type KeyParse =
  | { ok: true; value: number }
  | { ok: false; reason: "missing_key" | "invalid_key" };

/**
 * Coerce the natural key to an integer. Accepts integers and strings of
 * digits with an optional sign; anything outside the safe-integer range is
 * invalid because it cannot round-trip through a JS number.
 */
export function parseNaturalKey(value: unknown): KeyParse {
  if (value === undefined || value === null || value === "") {
    return { ok: false, reason: "missing_key" };
  }
  let parsed: number;
  if (typeof value === "number") {
    parsed = value;
  } else if (typeof value === "string" && INTEGER_STRING.test(value)) {
    parsed = Number(value.trim());
  } else {
    return { ok: false, reason: "invalid_key" };
  }
  if (!Number.isSafeInteger(parsed)) {
    return { ok: false, reason: "invalid_key" };
  }
  return { ok: true, value: parsed };
}

/**
 * Parse a coordinate. Absent and empty values are plain nulls; `invalid` is
 * set when a value was present but not a finite number.
 */
export function parseCoordinate(value: unknown): {
  value: number | null;
  invalid: boolean;
} {
  if (value === undefined || value === null) {
    return { value: null, invalid: false };
  }
  if (typeof value === "number") {
    return Number.isFinite(value)
      ? { value, invalid: false }
      : { value: null, invalid: true };
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed === "") return { value: null, invalid: false };
    const parsed = Number(trimmed);
    return Number.isFinite(parsed)
      ? { value: parsed, invalid: false }
      : { value: null, invalid: true };
  }
  return { value: null, invalid: true };
}

function optionalText(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

function optionalTimestamp(value: unknown): string | null {
  return typeof value === "string" ? normalizeTimestamp(value) : null;
}

function label(value: unknown): string | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(value) : null;
  }
  return typeof value === "string" && value !== "" ? value : null;
}

/**
 * Turn one API record into a fact row. Records without a usable natural key
 * or creation time are skipped; bad coordinates become null and are reported
 * in `degradedFields`.
 */
export function toServiceRequestRow(raw: RawServiceRequest): TransformResult {
  const key = parseNaturalKey(raw.unique_key);
  if (!key.ok) {
    return { ok: false, reason: key.reason };
  }

  const createdDate = optionalTimestamp(raw.created_date);
  if (createdDate === null) {
    return { ok: false, reason: "missing_created_date" };
  }

  const degradedFields: string[] = [];
  const latitude = parseCoordinate(raw.latitude);
  if (latitude.invalid) degradedFields.push("latitude");
  const longitude = parseCoordinate(raw.longitude);
  if (longitude.invalid) degradedFields.push("longitude");

  return {
    ok: true,
    degradedFields,
    row: {
      uniqueKey: key.value,
      createdDate,
      closedDate: optionalTimestamp(raw.closed_date),
      resolutionDescription: optionalText(raw.resolution_description),
      incidentZip: optionalText(raw.incident_zip),
      latitude: latitude.value,
      longitude: longitude.value,
      labels: {
        agency: label(raw.agency),
        complaint_type: label(raw.complaint_type),
        descriptor: label(raw.descriptor),
        borough: label(raw.borough),
      },
    },
  };
}
