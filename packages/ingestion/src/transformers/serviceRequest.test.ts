import { describe, it, expect } from "vitest";
import {
  parseCoordinate,
  parseNaturalKey,
  toServiceRequestRow,
} from "./serviceRequest.js";

describe("parseNaturalKey", () => {
  it("accepts digit strings and integers", () => {
    expect(parseNaturalKey("59893211")).toEqual({ ok: true, value: 59893211 });
    expect(parseNaturalKey(" 42 ")).toEqual({ ok: true, value: 42 });
    expect(parseNaturalKey(7)).toEqual({ ok: true, value: 7 });
  });

  it("reports absent keys as missing", () => {
    expect(parseNaturalKey(undefined)).toEqual({
      ok: false,
      reason: "missing_key",
    });
    expect(parseNaturalKey(null)).toEqual({ ok: false, reason: "missing_key" });
    expect(parseNaturalKey("")).toEqual({ ok: false, reason: "missing_key" });
  });

  it("rejects non-integer keys", () => {
    for (const value of ["abc", "12.5", "1e3", 3.5, "99999999999999999", {}]) {
      expect(parseNaturalKey(value)).toEqual({
        ok: false,
        reason: "invalid_key",
      });
    }
  });
});

describe("parseCoordinate", () => {
  it("parses numeric strings and numbers", () => {
    expect(parseCoordinate("40.7128")).toEqual({
      value: 40.7128,
      invalid: false,
    });
    expect(parseCoordinate(-73.935)).toEqual({ value: -73.935, invalid: false });
  });

  it("treats absent and blank values as plain nulls", () => {
    expect(parseCoordinate(undefined)).toEqual({ value: null, invalid: false });
    expect(parseCoordinate("  ")).toEqual({ value: null, invalid: false });
  });

  it("flags values that are present but not numeric", () => {
    expect(parseCoordinate("north")).toEqual({ value: null, invalid: true });
    expect(parseCoordinate(Number.NaN)).toEqual({ value: null, invalid: true });
    expect(parseCoordinate(true)).toEqual({ value: null, invalid: true });
  });
});

describe("toServiceRequestRow", () => {
  const base = {
    unique_key: "1001",
    created_date: "2024-01-08T09:15:00.000",
    closed_date: "2024-01-09T10:00:00.250",
    resolution_description: "The Police Department responded.",
    incident_zip: "11201",
    latitude: "40.6930",
    longitude: "-73.9897",
    agency: "NYPD",
    complaint_type: "Noise - Residential",
    descriptor: "Loud Music/Party",
    borough: "BROOKLYN",
  };

  it("builds a normalized row", () => {
    expect(toServiceRequestRow(base)).toEqual({
      ok: true,
      degradedFields: [],
      row: {
        uniqueKey: 1001,
        createdDate: "2024-01-08T09:15:00+00:00",
        closedDate: "2024-01-09T10:00:00.250000+00:00",
        resolutionDescription: "The Police Department responded.",
        incidentZip: "11201",
        latitude: 40.693,
        longitude: -73.9897,
        labels: {
          agency: "NYPD",
          complaint_type: "Noise - Residential",
          descriptor: "Loud Music/Party",
          borough: "BROOKLYN",
        },
      },
    });
  });

  it("skips records without a key", () => {
    const { unique_key: _omitted, ...rest } = base;
    expect(toServiceRequestRow(rest)).toEqual({
      ok: false,
      reason: "missing_key",
    });
  });

  it("skips records with a non-numeric key", () => {
    expect(toServiceRequestRow({ ...base, unique_key: "SR-1001" })).toEqual({
      ok: false,
      reason: "invalid_key",
    });
  });

  it("skips records without a creation time", () => {
    expect(toServiceRequestRow({ ...base, created_date: "" })).toEqual({
      ok: false,
      reason: "missing_created_date",
    });
  });

  it("keeps malformed but present timestamps verbatim", () => {
    const result = toServiceRequestRow({
      ...base,
      created_date: "01/08/2024 09:15",
      closed_date: "pending",
    });
    expect(result.ok && result.row.createdDate).toBe("01/08/2024 09:15");
    expect(result.ok && result.row.closedDate).toBe("pending");
  });

  it("nulls bad coordinates and reports them", () => {
    const result = toServiceRequestRow({
      ...base,
      latitude: "unknown",
      longitude: "",
    });
    expect(result).toMatchObject({
      ok: true,
      degradedFields: ["latitude"],
      row: { latitude: null, longitude: null },
    });
  });

  it("leaves absent optional fields and labels null", () => {
    const result = toServiceRequestRow({
      unique_key: 5,
      created_date: "2024-01-08T00:00:00",
      borough: "",
    });
    expect(result).toEqual({
      ok: true,
      degradedFields: [],
      row: {
        uniqueKey: 5,
        createdDate: "2024-01-08T00:00:00+00:00",
        closedDate: null,
        resolutionDescription: null,
        incidentZip: null,
        latitude: null,
        longitude: null,
        labels: {
          agency: null,
          complaint_type: null,
          descriptor: null,
          borough: null,
        },
      },
    });
  });

  it("stringifies numeric zip codes", () => {
    const result = toServiceRequestRow({ ...base, incident_zip: 10001 });
    expect(result.ok && result.row.incidentZip).toBe("10001");
  });

  it("stringifies numeric dimension labels and drops non-finite ones", () => {
    const result = toServiceRequestRow({
      ...base,
      descriptor: 311,
      borough: Number.NaN,
    });
    expect(result.ok && result.row.labels.descriptor).toBe("311");
    expect(result.ok && result.row.labels.borough).toBeNull();
  });
});
