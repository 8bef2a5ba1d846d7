import { describe, expect, it } from "vitest";
import { getUnitSystem } from "grid-props-units";
import { getKeywordRegistry } from "grid-props-registry";
import { InvalidRecordError, TypeMismatchError, UnsupportedKeywordError } from "../src/errors.js";
import { GridDims } from "../src/grid.js";
import { PropertyCollection } from "../src/propertyCollection.js";
import {
  applyRegionCopy,
  applyRegionEdit,
  parseRegionOperator,
  regionCopyFromRecord,
  regionEditFromRecord,
  resolveRegionSet,
} from "../src/regionOps.js";
import type { RegionScope } from "../src/regionOps.js";
import { MILLIDARCY, MULTNUM_COLUMNS, fill, silentLogger } from "./decks.js";

function makeScope(): RegionScope {
  const registry = getKeywordRegistry();
  const grid = new GridDims(5, 5, 1);
  const scope: RegionScope = {
    registry,
    intProperties: new PropertyCollection("int", registry, grid),
    doubleProperties: new PropertyCollection("double", registry, grid),
    converter: getUnitSystem("METRIC"),
    defaultRegionKeyword: "MULTNUM",
    logger: silentLogger(),
  };
  const all = Array.from({ length: 25 }, (_, idx) => idx);
  scope.intProperties.getOrCreate("MULTNUM").assignCells(all, MULTNUM_COLUMNS, (v) => v);
  return scope;
}

function column(values: readonly number[], i: number): number[] {
  return [0, 1, 2, 3, 4].map((j) => values[i + 5 * j]);
}

describe("region operator parsing", () => {
  it("derives the operator from the keyword", () => {
    expect(parseRegionOperator("addreg")).toBe("add");
    expect(parseRegionOperator("MULTIREG")).toBe("multiply");
    expect(parseRegionOperator("EqualReg")).toBe("assign");
    expect(() => parseRegionOperator("COPYREG")).toThrow(InvalidRecordError);
  });

  it("maps region set letters to driver keywords", () => {
    expect(resolveRegionSet("ADDREG", "M")).toBe("MULTNUM");
    expect(resolveRegionSet("ADDREG", "f")).toBe("FLUXNUM");
    expect(resolveRegionSet("ADDREG", "O")).toBe("OPERNUM");
    expect(resolveRegionSet("ADDREG", "fipnum")).toBe("FIPNUM");
    expect(resolveRegionSet("ADDREG", undefined)).toBeUndefined();
    expect(() => resolveRegionSet("ADDREG", "X")).toThrow(/unknown region set 'X'/);
  });

  it("reads a request from a record", () => {
    expect(regionEditFromRecord("ADDREG", [" satnum ", 11, 1, "M"], "add")).toEqual({
      targetKeyword: "satnum",
      value: 11,
      regionId: 1,
      operator: "add",
      driverKeyword: "MULTNUM",
    });
    expect(regionEditFromRecord("MULTIREG", ["PORO", "0.5", 2], "multiply").driverKeyword).toBeUndefined();
    expect(() => regionEditFromRecord("ADDREG", ["PORO", 1, 1.5], "add")).toThrow(/must be an integer/);
  });

  it("takes the driver keyword from the item after the region set", () => {
    expect(regionEditFromRecord("ADDREG", ["SATNUM", 5, 1, null, "fipnum"], "add").driverKeyword).toBe("FIPNUM");
    expect(regionEditFromRecord("ADDREG", ["SATNUM", 5, 1, "M", "MULTNUM"], "add").driverKeyword).toBe("MULTNUM");
    expect(regionCopyFromRecord("COPYREG", ["PERMX", "PERMY", 1, null, "FIPNUM"]).driverKeyword).toBe("FIPNUM");
  });

  it("rejects a driver keyword that contradicts the region set", () => {
    expect(() => regionEditFromRecord("ADDREG", ["SATNUM", 5, 1, "M", "FIPNUM"], "add")).toThrow(
      "ADDREG: region set selects MULTNUM but driver keyword is FIPNUM"
    );
    expect(() => regionCopyFromRecord("COPYREG", ["PERMX", "PERMY", 1, "F", "OPERNUM"])).toThrow(InvalidRecordError);
  });

  it("rejects items after the driver keyword", () => {
    expect(() => regionEditFromRecord("MULTIREG", ["SATNUM", 2, 1, "M", null, "X"], "multiply")).toThrow(
      "MULTIREG: unexpected item 6"
    );
    expect(regionEditFromRecord("MULTIREG", ["SATNUM", 2, 1, "M", null, null], "multiply").driverKeyword).toBe("MULTNUM");
  });
});

describe("region edits", () => {
  it("adds only where the driver matches", () => {
    const scope = makeScope();
    const touched = applyRegionEdit({ targetKeyword: "SATNUM", value: 11, regionId: 1, operator: "add" }, scope);
    expect(touched).toBe(10);
    const satnum = scope.intProperties.getOrCreate("SATNUM").values();
    expect(column(satnum, 0)).toEqual(fill(5, 12));
    expect(column(satnum, 1)).toEqual(fill(5, 12));
    expect(column(satnum, 2)).toEqual(fill(5, 1));
  });

  it("multiplies without converting the factor", () => {
    const scope = makeScope();
    scope.doubleProperties.getOrCreate("PERMX").assignCells(
      Array.from({ length: 25 }, (_, idx) => idx),
      fill(25, 2),
      (v) => v * MILLIDARCY
    );
    applyRegionEdit({ targetKeyword: "PERMX", value: 3, regionId: 2, operator: "multiply" }, scope);
    const permx = scope.doubleProperties.getOrCreate("PERMX");
    expect(permx.get(0, 0, 0)).toBeCloseTo(2 * MILLIDARCY, 28);
    expect(permx.get(4, 4, 0)).toBeCloseTo(6 * MILLIDARCY, 28);
  });

  it("distinguishes multiply from add on an integer target", () => {
    const scope = makeScope();
    applyRegionEdit({ targetKeyword: "SATNUM", value: 11, regionId: 1, operator: "multiply", driverKeyword: "MULTNUM" }, scope);
    expect(scope.intProperties.getOrCreate("SATNUM").get(0, 0, 0)).toBe(11);
  });

  it("converts assigned and added physical values", () => {
    const scope = makeScope();
    applyRegionEdit({ targetKeyword: "PERMY", value: 5, regionId: 1, operator: "assign" }, scope);
    applyRegionEdit({ targetKeyword: "TEMPI", value: 10, regionId: 2, operator: "add" }, scope);
    expect(scope.doubleProperties.getOrCreate("PERMY").get(1, 3, 0)).toBeCloseTo(5 * MILLIDARCY, 28);
    expect(scope.doubleProperties.getOrCreate("PERMY").get(2, 3, 0)).toBe(0);
    expect(scope.doubleProperties.getOrCreate("TEMPI").get(3, 0, 0)).toBeCloseTo(298.15, 10);
    expect(scope.doubleProperties.getOrCreate("TEMPI").get(0, 0, 0)).toBeCloseTo(288.15, 10);
  });

  it("materializes an unset driver with its default", () => {
    const scope = makeScope();
    const touched = applyRegionEdit({ targetKeyword: "SATNUM", value: 2, regionId: 1, operator: "add", driverKeyword: "FLUXNUM" }, scope);
    expect(touched).toBe(25);
    expect(scope.intProperties.names()).toEqual(["MULTNUM", "FLUXNUM", "SATNUM"]);
  });

  it("warns when no cell belongs to the region", () => {
    const scope = makeScope();
    const touched = applyRegionEdit({ targetKeyword: "SATNUM", value: 2, regionId: 9, operator: "add" }, scope);
    expect(touched).toBe(0);
    expect(scope.logger.warn).toHaveBeenCalledWith("add on SATNUM: no cell of MULTNUM equals region 9");
  });

  it("requires an integer, region-eligible driver", () => {
    const scope = makeScope();
    expect(() =>
      applyRegionEdit({ targetKeyword: "SATNUM", value: 1, regionId: 1, operator: "add", driverKeyword: "PERMX" }, scope)
    ).toThrow(TypeMismatchError);
    expect(() =>
      applyRegionEdit({ targetKeyword: "SATNUM", value: 1, regionId: 1, operator: "add", driverKeyword: "ACTNUM" }, scope)
    ).toThrow(/cannot classify regions/);
    expect(() =>
      applyRegionEdit({ targetKeyword: "NONO", value: 1, regionId: 1, operator: "add" }, scope)
    ).toThrow(UnsupportedKeywordError);
  });

  it("leaves the target untouched when any cell of the region would turn fractional", () => {
    const scope = makeScope();
    const satnum = scope.intProperties.getOrCreate("SATNUM");
    satnum.iset(0, 2);
    expect(() => applyRegionEdit({ targetKeyword: "SATNUM", value: 1.5, regionId: 1, operator: "multiply" }, scope)).toThrow(
      "SATNUM: integer property cannot hold 1.5"
    );
    expect(satnum.values()).toEqual([2, ...fill(24, 1)]);
  });

  it("rejects fractional edits of integer targets", () => {
    const scope = makeScope();
    expect(() => applyRegionEdit({ targetKeyword: "SATNUM", value: 0.5, regionId: 1, operator: "add" }, scope)).toThrow(
      InvalidRecordError
    );
  });
});

describe("region copy", () => {
  it("copies committed values inside the region", () => {
    const scope = makeScope();
    const all = Array.from({ length: 25 }, (_, idx) => idx);
    scope.doubleProperties.getOrCreate("PERMX").assignCells(all, fill(25, 7), (v) => v);
    const touched = applyRegionCopy({ sourceKeyword: "PERMX", targetKeyword: "PERMZ", regionId: 2 }, scope);
    expect(touched).toBe(15);
    const permz = scope.doubleProperties.getOrCreate("PERMZ");
    expect(column(permz.values(), 1)).toEqual(fill(5, 0));
    expect(column(permz.values(), 4)).toEqual(fill(5, 7));
  });

  it("refuses to copy across kinds", () => {
    const scope = makeScope();
    expect(() => applyRegionCopy({ sourceKeyword: "PORO", targetKeyword: "SATNUM", regionId: 1 }, scope)).toThrow(
      /Cannot copy double PORO into int SATNUM/
    );
  });
});
