import { describe, it, expect } from "vitest";
import { duration } from "../src/core/duration.js";
import {
  beginSpec,
  constraintExpression,
  emailAddress,
  gresSpecs,
  isValidFilenamePattern,
  listEntries,
  mailTypes,
  memorySize,
  reservationName,
  switchesSpec
} from "../src/options/rules.js";

describe("filename patterns", () => {
  it("accepts known placeholders with optional padding", () => {
    expect(isValidFilenamePattern("slurm-%j.out")).toBe(true);
    expect(isValidFilenamePattern("%x-%A_%a.log")).toBe(true);
    expect(isValidFilenamePattern("%12usd%17urf")).toBe(true);
    expect(isValidFilenamePattern("100%%")).toBe(true);
  });

  it("rejects unknown placeholders", () => {
    expect(isValidFilenamePattern("%k")).toBe(false);
    expect(isValidFilenamePattern("%0ksd")).toBe(false);
    expect(isValidFilenamePattern("trailing%")).toBe(false);
  });

  it("accepts anything once placeholders are escaped", () => {
    expect(isValidFilenamePattern("out\\%k")).toBe(true);
  });
});

describe("value rules", () => {
  it("checks memory sizes", () => {
    expect(memorySize.check(4096)).toBe(true);
    expect(memorySize.check("16G")).toBe(true);
    expect(memorySize.check("16GB")).toBe(false);
    expect(memorySize.check(0)).toBe(false);
  });

  it("checks constraint expressions", () => {
    expect(constraintExpression.check("haswell")).toBe(true);
    expect(constraintExpression.check("intel&gpu")).toBe(true);
    expect(constraintExpression.check("knl|haswell")).toBe(true);
    expect(constraintExpression.check("[rack1|rack2]")).toBe(true);
    expect(constraintExpression.check("gpu*2,ib")).toBe(true);
    expect(constraintExpression.check("intel&gpu|knl")).toBe(false);
    expect(constraintExpression.check("")).toBe(false);
  });

  it("checks reservation names", () => {
    expect(reservationName.check("maint_2024-q1")).toBe(true);
    expect(reservationName.check("Maint")).toBe(false);
  });

  it("checks e-mail addresses", () => {
    expect(emailAddress.check("someone@example.org")).toBe(true);
    expect(emailAddress.check("not-an-address")).toBe(false);
  });

  it("checks mail types", () => {
    expect(mailTypes.check(["BEGIN", "END"])).toBe(true);
    expect(mailTypes.check(["SOMETIMES"])).toBe(false);
  });

  it("rejects list entries with separators", () => {
    expect(listEntries.check(["node01", "node02"])).toBe(true);
    expect(listEntries.check(["node01,node02"])).toBe(false);
    expect(listEntries.check([""])).toBe(false);
  });

  it("checks gres specs", () => {
    expect(gresSpecs.check(["gpu", ["gpu", 2], ["gpu", 2, "k80"]])).toBe(true);
    expect(gresSpecs.check([["gpu", 0]])).toBe(false);
    expect(gresSpecs.check(["gpu:2"])).toBe(false);
  });

  it("checks switches", () => {
    expect(switchesSpec.check(4)).toBe(true);
    expect(switchesSpec.check([4, duration({ minutes: 5 })])).toBe(true);
    expect(switchesSpec.check([4, duration(-5)])).toBe(false);
    expect(switchesSpec.check(0)).toBe(false);
  });

  it("allows only known begin tokens", () => {
    expect(beginSpec.check("teatime")).toBe(true);
    expect(beginSpec.check(duration({ hours: 1 }))).toBe(true);
    expect(beginSpec.check(new Date(2030, 0, 1))).toBe(true);
    expect(beginSpec.check(new Date("not a date"))).toBe(false);
    expect(beginSpec.check(duration(-60))).toBe(false);
  });
});
