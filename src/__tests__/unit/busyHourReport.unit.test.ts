/**
 * @fileoverview Unit tests for the busiest-hour report: histogram building,
 * tie handling, hour formatting and timestamp rejection.
 *
 * @module __tests__/unit/busyHourReport
 */

import type { AccessRecord } from "../../records";
import {
  BUSY_HOUR_REPORT_HEADER,
  buildUnitHourHistograms,
  findBusiestHours,
  formatHour,
  generateBusyHourReport,
} from "../../reports/busyHourReport";
import { MALFORMED_ROWS, SAMPLE_BUSY_HOUR_REPORT_LINES, SAMPLE_ROWS } from "../fixtures/accessLog";

/**
 * Helper: Builds records for one unit at the given timestamps.
 */
function accessesAt(unit: string, timestamps: string[]): AccessRecord[] {
  return timestamps.map((AccessTimestamp) => ({ CardFirstName: unit, AccessTimestamp }));
}

describe("busy hour report", () => {
  it("should report the busiest hour of every unit", () => {
    const report = generateBusyHourReport(SAMPLE_ROWS);
    console.debug("Busy hour report", report);
    expect(report.split("\n")).toEqual(SAMPLE_BUSY_HOUR_REPORT_LINES);
  });

  it("should list tied hours in ascending order", () => {
    const records = accessesAt("unit101", [
      "2023-05-15T14:15:00",
      "2023-05-15T08:30:00",
      "2023-05-15T14:45:00",
      "2023-05-15T08:45:00",
    ]);
    expect(generateBusyHourReport(records)).toBe(`${BUSY_HOUR_REPORT_HEADER}\nunit101,8:00; 14:00`);
  });

  it("should sort tied hours numerically rather than as text", () => {
    const records = accessesAt("unit5", ["2023-05-15T10:00:00", "2023-05-15T09:00:00"]);
    expect(generateBusyHourReport(records)).toBe(`${BUSY_HOUR_REPORT_HEADER}\nunit5,9:00; 10:00`);
  });

  it("should count hours separately per unit", () => {
    const histograms = buildUnitHourHistograms([
      ...accessesAt("unit101", ["2023-05-15T08:30:00", "2023-05-15T08:45:00", "2023-05-16T14:00:00"]),
      ...accessesAt("unit102", ["2023-05-15T08:00:00"]),
    ]);
    expect(histograms.get("unit101")).toEqual(new Map([[8, 2], [14, 1]]));
    expect(histograms.get("unit102")).toEqual(new Map([[8, 1]]));
  });

  it("should return only the header when there are no records", () => {
    expect(generateBusyHourReport([])).toBe(BUSY_HOUR_REPORT_HEADER);
  });

  it("should skip records whose timestamp cannot be parsed", () => {
    const records = accessesAt("unit101", [
      "2023-05-15T08:30:00",
      "",
      "2023-05-15 09:30:00",
      "2023-05-15T9:30:00",
      "not a timestamp",
      "2023-05-15T09:30:00Z",
    ]);
    const histograms = buildUnitHourHistograms(records);
    expect(histograms.get("unit101")).toEqual(new Map([[8, 1]]));
    expect(generateBusyHourReport(records)).toBe(`${BUSY_HOUR_REPORT_HEADER}\nunit101,8:00`);
  });

  it("should count a timestamp padded with whitespace", () => {
    const records = accessesAt("unit101", [" 2023-05-15T08:30:00 ", "\t2023-05-15T08:45:00", "x2023-05-15T09:00:00"]);
    expect(buildUnitHourHistograms(records).get("unit101")).toEqual(new Map([[8, 2]]));
  });

  it("should omit a unit that has no parsable timestamp", () => {
    const records: AccessRecord[] = [
      ...accessesAt("unit101", ["2023-05-15T08:30:00"]),
      ...accessesAt("unit102", ["", "yesterday"]),
      { CardFirstName: "unit103" },
    ];
    expect(generateBusyHourReport(records)).toBe(`${BUSY_HOUR_REPORT_HEADER}\nunit101,8:00`);
  });

  it("should exclude records without a unit identifier", () => {
    const records = accessesAt("  ", ["2023-05-15T08:30:00"]);
    expect(buildUnitHourHistograms(records).size).toBe(0);
  });

  it("should ignore other columns when records are incomplete", () => {
    const report = generateBusyHourReport(MALFORMED_ROWS);
    expect(report.split("\n")).toEqual([BUSY_HOUR_REPORT_HEADER, "unit101,8:00", "unit102,9:00"]);
  });

  it("should bucket midnight and the last hour of the day", () => {
    const records = [
      ...accessesAt("unit1", ["2023-05-15T00:00:00"]),
      ...accessesAt("unit2", ["2023-05-15T23:59:59"]),
    ];
    expect(generateBusyHourReport(records).split("\n").slice(1)).toEqual(["unit1,0:00", "unit2,23:00"]);
  });
});

describe("busiest hour helpers", () => {
  it("should return every hour sharing the highest count", () => {
    expect(findBusiestHours(new Map([[14, 2], [8, 2], [9, 1]]))).toEqual([8, 14]);
  });

  it("should return no hours for an empty histogram", () => {
    expect(findBusiestHours(new Map())).toEqual([]);
  });

  it("should format hours without a leading zero", () => {
    expect(formatHour(0)).toBe("0:00");
    expect(formatHour(8)).toBe("8:00");
    expect(formatHour(23)).toBe("23:00");
  });
});
