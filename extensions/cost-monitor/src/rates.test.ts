import { describe, it, expect } from "vitest";
import { InvalidConfigurationError } from "./errors.js";
import { classifyDiskType, createRateTable, machineTypeMonthly } from "./rates.js";

const input = {
  machineTypes: { "e2-micro": "6.11", "e2-small": 12.23 },
  staticIpMonthly: "7.30",
  standardDiskGbMonthly: "0.04",
  ssdDiskGbMonthly: "0.17",
  networkFreeTierGb: 1,
  networkEgressPerGb: "0.12",
};

describe("createRateTable", () => {
  it("converts every rate to a decimal", () => {
    const rates = createRateTable(input);

    expect(machineTypeMonthly(rates, "e2-small")?.toString()).toBe("12.23");
    expect(rates.staticIpMonthly.toFixed(2)).toBe("7.30");
    expect(rates.diskGbMonthly.ssd.toString()).toBe("0.17");
    expect(rates.networkFreeTierGb.toString()).toBe("1");
  });

  it("is frozen", () => {
    const rates = createRateTable(input);

    expect(Object.isFrozen(rates)).toBe(true);
    expect(Object.isFrozen(rates.diskGbMonthly)).toBe(true);
  });

  it("rejects negative rates and lists each one", () => {
    let caught: unknown;
    try {
      createRateTable({ ...input, staticIpMonthly: "-1", machineTypes: { "e2-micro": -2 } });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(InvalidConfigurationError);
    if (caught instanceof InvalidConfigurationError) {
      expect(caught.issues).toEqual([
        "rates.machineTypes.e2-micro: must be >= 0 (got -2)",
        "rates.staticIpMonthly: must be >= 0 (got -1)",
      ]);
    }
  });

  it("rejects values that are not numbers", () => {
    expect(() => createRateTable({ ...input, networkEgressPerGb: "twelve cents" })).toThrow(
      "rates.networkEgressPerGb: not a number (twelve cents)",
    );
  });
});

describe("machineTypeMonthly", () => {
  it("returns undefined for unknown or missing machine types", () => {
    const rates = createRateTable(input);

    expect(machineTypeMonthly(rates, "n2-standard-8")).toBeUndefined();
    expect(machineTypeMonthly(rates, undefined)).toBeUndefined();
  });
});

describe("classifyDiskType", () => {
  it("maps ssd variants to the ssd rate", () => {
    expect(classifyDiskType("pd-ssd")).toBe("ssd");
    expect(classifyDiskType("pd-balanced")).toBe("standard");
    expect(classifyDiskType("pd-standard")).toBe("standard");
    expect(classifyDiskType(undefined)).toBe("standard");
  });
});
