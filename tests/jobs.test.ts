import test from "node:test";
import assert from "node:assert/strict";
import { ValuationError } from "../lib/valuation/errors";
import { isValuationJobName, processValuationJob } from "../lib/valuation/jobs";
import { approxEqual } from "./helpers";

const rejectsWith = (code: string) => (error: unknown) =>
  error instanceof ValuationError && error.code === code;

test("DcfValuationJob returns the serialized valuation and insights", () => {
  const result = processValuationJob("DcfValuationJob", {});

  assert.ok("job" in result && result.job === "DcfValuationJob");
  approxEqual(result.valuation.enterpriseValue, 240.54509391435011, 1e-9);
  assert.equal(result.valuation.revenue.length, 5);
  assert.deepEqual(result.insights.warnings, []);
});

test("percent payloads value identically to fraction payloads", () => {
  const percent = processValuationJob("DcfValuationJob", {
    unit: "PERCENT",
    assumptions: { wacc: 10, terminalGrowth: 3 },
  });
  const fraction = processValuationJob("DcfValuationJob", {
    assumptions: { wacc: 0.1, terminalGrowth: 0.03 },
  });

  assert.ok("job" in percent && percent.job === "DcfValuationJob");
  assert.ok("job" in fraction && fraction.job === "DcfValuationJob");
  assert.equal(percent.valuation.enterpriseValue, fraction.valuation.enterpriseValue);
});

test("SensitivityGridJob masks infeasible cells", () => {
  const result = processValuationJob("SensitivityGridJob", {
    axes: { wacc: [0.02, 0.1], terminalGrowth: [0.03] },
  });

  assert.ok("job" in result && result.job === "SensitivityGridJob");
  assert.equal(result.grid.matrix[0][0], null);
  approxEqual(result.grid.matrix[0][1] ?? Number.NaN, 240.54509391435011, 1e-9);
  assert.equal(result.grid.infeasibleCells.length, 1);
  assert.equal(result.grid.infeasibleCells[0].error.code, "INFEASIBLE_TERMINAL_GROWTH");
  assert.equal(result.grid.infeasibleCells[0].wacc, 0.02);
});

test("WaccSensitivityJob returns the scalar and its base value", () => {
  const result = processValuationJob("WaccSensitivityJob", {});

  assert.ok("job" in result && result.job === "WaccSensitivityJob");
  approxEqual(result.waccSensitivity.sensitivity, 0.14933572685681266, 1e-12);
  approxEqual(result.waccSensitivity.baseEnterpriseValue, 240.54509391435011, 1e-9);
});

test("WaccSensitivityJob throws on a degenerate perturbation", () => {
  assert.throws(
    () => processValuationJob("WaccSensitivityJob", { assumptions: { wacc: 0.035 } }),
    rejectsWith("DEGENERATE_PERTURBATION")
  );
});

test("invalid payloads throw before any valuation runs", () => {
  assert.throws(
    () => processValuationJob("DcfValuationJob", { assumptions: { wacc: 0.02 } }),
    rejectsWith("INVALID_ASSUMPTION")
  );
  assert.throws(
    () => processValuationJob("SensitivityGridJob", { axes: { wacc: [] } }),
    rejectsWith("INVALID_SWEEP")
  );
  assert.throws(
    () => processValuationJob("DcfValuationJob", { unit: "BPS" }),
    rejectsWith("INVALID_ASSUMPTION")
  );
});

test("unknown job names are reported, not thrown", () => {
  assert.deepEqual(processValuationJob("RebuildEverythingJob", {}), {
    status: "UNKNOWN_JOB_TYPE",
    name: "RebuildEverythingJob",
  });
  assert.equal(isValuationJobName("RebuildEverythingJob"), false);
  assert.equal(isValuationJobName("SensitivityGridJob"), true);
});
