import { describe, expect, it } from "vitest";
import { SchemaValidationError } from "../errors";
import { unknownFieldPaths } from "./fieldSchema";
import { formatDimension, formatOutputVoltage, joinRange, projectFieldPayload } from "./projection";

describe("joinRange", () => {
  it("shares the unit when both ends carry the same one", () => {
    expect(joinRange("9V", "36V")).toBe("9~36 V");
    expect(joinRange("4.5 V", "9 V")).toBe("4.5~9 V");
  });

  it("keeps both ends verbatim when units differ", () => {
    expect(joinRange("9V", "36 VDC")).toBe("9V~36 VDC");
  });

  it("needs both ends", () => {
    expect(joinRange("9V", null)).toBeNull();
    expect(joinRange(null, "36V")).toBeNull();
  });
});

describe("formatters", () => {
  it("prefixes dual outputs once", () => {
    expect(formatOutputVoltage("12V", true)).toBe("±12V");
    expect(formatOutputVoltage("±12V", true)).toBe("±12V");
    expect(formatOutputVoltage("5V", false)).toBe("5V");
    expect(formatOutputVoltage(null, true)).toBeNull();
  });

  it("formats dimensions only when complete", () => {
    expect(formatDimension("21.8mm", "9.2mm", "11.1mm")).toBe("21.8mm x 9.2mm x 11.1mm");
    expect(formatDimension("21.8mm", null, "11.1mm")).toBeNull();
  });
});

describe("projectFieldPayload", () => {
  const payload = {
    model_number: "ABC1205",
    input_voltage_range: { lower: "4.5V", upper: "9V", evidence: "Input range 4.5-9V" },
    output_voltage: { value: "5V", dual_output: true, evidence: "Dual ±5V" },
    output_power: { value: " 2W ", evidence: "2 Watt", unit: "W" },
    package: null,
    dimension: { length: "19.5mm", width: "9.8mm", height: null, evidence: "" },
    applications: { values: [" Industrial ", "", "Telecom"], evidence: "Typical applications" },
    foo: "bar",
  };

  it("projects values onto the record fields", () => {
    const projected = projectFieldPayload("ABC-1205", payload);
    expect(projected.modelNumber).toBe("ABC-1205");
    expect(projected.reportedModelNumber).toBe("ABC1205");
    expect(projected.fields).toEqual({
      input_voltage_range: "4.5~9 V",
      output_voltage: "±5V",
      output_power: "2W",
      package: null,
      isolation: null,
      insulation: null,
      dimension: null,
    });
    expect(projected.applications).toEqual(["Industrial", "Telecom"]);
    expect(projected.evidence).toEqual({
      input_voltage_range: "Input range 4.5-9V",
      output_voltage: "Dual ±5V",
      output_power: "2 Watt",
      applications: "Typical applications",
    });
  });

  it("lists dropped unknown keys", () => {
    expect(projectFieldPayload("ABC-1205", payload).droppedKeys).toEqual(["output_power.unit", "foo"]);
    expect(unknownFieldPaths("not an object")).toEqual([]);
  });

  it("does not report a matching model number", () => {
    expect(projectFieldPayload("ABC-1205", { model_number: "ABC-1205" }).reportedModelNumber).toBeUndefined();
  });

  it("rejects wrongly typed payloads for that model", () => {
    expect(() => projectFieldPayload("ABC-1205", { output_power: { value: 12 } })).toThrow(SchemaValidationError);
    expect(() => projectFieldPayload("ABC-1205", { output_power: { value: 12 } })).toThrow(/output_power\.value/);
    expect(() => projectFieldPayload("ABC-1205", ["not", "an", "object"])).toThrow(/field payload rejected/);
  });
});
