/**
 * @fileoverview Unit tests for the unit-to-fob report: grouping, dedup,
 * ordering and handling of incomplete records.
 *
 * @module __tests__/unit/fobReport
 */

import type { AccessRecord } from "../../records";
import {
  FOB_REPORT_HEADER,
  buildUnitFobSets,
  generateFobReport,
  renderFobReport,
} from "../../reports/fobReport";
import { MALFORMED_ROWS, SAMPLE_FOB_REPORT_LINES, SAMPLE_ROWS } from "../fixtures/accessLog";

describe("unit fob report", () => {
  it("should list every unit with its fob ids", () => {
    const report = generateFobReport(SAMPLE_ROWS);
    console.debug("Fob report", report);
    expect(report.split("\n")).toEqual(SAMPLE_FOB_REPORT_LINES);
  });

  it("should join multiple fobs for a unit in sorted order", () => {
    const records: AccessRecord[] = [
      { CardFirstName: "unit104", CardBatch: "250", CardNumber: "98765" },
      { CardFirstName: "unit104", CardBatch: "240", CardNumber: "87654" },
    ];
    expect(generateFobReport(records)).toBe(`${FOB_REPORT_HEADER}\nunit104,240-87654; 250-98765`);
  });

  it("should list a repeated fob only once", () => {
    const records: AccessRecord[] = [
      { CardFirstName: "unit101", CardBatch: "210", CardNumber: "54321" },
      { CardFirstName: "unit101", CardBatch: "210", CardNumber: "54321" },
      { CardFirstName: "unit101", CardBatch: " 210 ", CardNumber: "54321" },
    ];
    const fobs = buildUnitFobSets(records);
    expect([...(fobs.get("unit101") ?? [])]).toEqual(["210-54321"]);
    expect(generateFobReport(records)).toBe(`${FOB_REPORT_HEADER}\nunit101,210-54321`);
  });

  it("should return only the header when there are no records", () => {
    expect(generateFobReport([])).toBe(FOB_REPORT_HEADER);
  });

  it("should exclude records without a unit identifier", () => {
    const records: AccessRecord[] = [
      { CardBatch: "230", CardNumber: "76543" },
      { CardFirstName: "  ", CardBatch: "231", CardNumber: "11111" },
      { CardFirstName: "", CardBatch: "232", CardNumber: "22222" },
    ];
    expect(buildUnitFobSets(records).size).toBe(0);
    expect(generateFobReport(records)).toBe(FOB_REPORT_HEADER);
  });

  it("should keep records with missing card fields using empty parts", () => {
    const report = generateFobReport(MALFORMED_ROWS);
    console.debug("Malformed fob report", report);
    expect(report.split("\n")).toEqual([
      FOB_REPORT_HEADER,
      "unit101,-54321",
      "unit102,220-65432",
    ]);
  });

  it("should order units by code point regardless of input order", () => {
    const records: AccessRecord[] = [
      { CardFirstName: "unit2", CardBatch: "1", CardNumber: "1" },
      { CardFirstName: "Unit3", CardBatch: "1", CardNumber: "2" },
      { CardFirstName: "unit10", CardBatch: "1", CardNumber: "3" },
    ];
    const forward = generateFobReport(records);
    const backward = generateFobReport([...records].reverse());
    expect(forward).toBe(backward);
    expect(forward.split("\n").slice(1)).toEqual(["Unit3,1-2", "unit10,1-3", "unit2,1-1"]);
  });

  it("should not mutate the input records", () => {
    const records = SAMPLE_ROWS.map((row) => Object.freeze({ ...row }));
    expect(() => generateFobReport(records)).not.toThrow();
    expect(records[0]).toEqual(SAMPLE_ROWS[0]);
  });

  it("should render an empty fob set as an empty cell", () => {
    expect(renderFobReport(new Map([["unit9", new Set<string>()]]))).toBe(`${FOB_REPORT_HEADER}\nunit9,`);
  });
});
