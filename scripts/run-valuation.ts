// scripts/run-valuation.ts
// Prints the default DCF scenario, its sensitivity grid and WACC sensitivity.
// Usage: npm run valuation:demo [-- path/to/assumptions.json]

import { readFileSync } from 'node:fs';
import type { Decimal } from '../lib/math';
import {
  DEFAULT_ASSUMPTIONS,
  parseAssumptions,
  runSensitivityGrid,
  runValuation,
  summarizeValuation,
  unwrap,
  waccSensitivity,
} from '../lib/valuation';

const separator = '='.repeat(80);
const money = (value: Decimal) => `$${value.toFixed(1)}M`;
const pct = (value: Decimal, dp = 1) => `${value.times(100).toFixed(dp)}%`;

function loadAssumptions() {
  const path = process.argv[2];
  if (!path) return DEFAULT_ASSUMPTIONS;

  console.log(`[Demo] Loading assumptions from ${path}`);
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return unwrap(parseAssumptions(raw));
}

function main() {
  console.log(separator);
  console.log('DCF Valuation');
  console.log(separator);

  const assumptions = loadAssumptions();
  const result = unwrap(runValuation(assumptions));
  const insights = summarizeValuation(result);

  // ==========================================================================
  // Projection
  // ==========================================================================
  console.log('\nYear   Revenue      EBIT     NOPAT       FCF   Disc.F       PV');
  result.revenue.forEach((revenue, index) => {
    const cols = [
      revenue.toFixed(2),
      result.ebit[index].toFixed(2),
      result.nopat[index].toFixed(2),
      result.fcf[index].toFixed(2),
      result.discountFactors[index].toFixed(4),
      result.pvFcf[index].toFixed(2),
    ];
    console.log(`${String(index + 1).padStart(4)} ${cols.map((c) => c.padStart(9)).join(' ')}`);
  });

  // ==========================================================================
  // Summary
  // ==========================================================================
  console.log();
  console.log(`Terminal Value:            ${money(result.terminalValue)}`);
  console.log(`PV of Terminal Value:      ${money(result.pvTerminalValue)}`);
  console.log(`PV of Cash Flows (Y1-5):   ${money(result.pvForecastPeriod)}`);
  console.log(`Enterprise Value:          ${money(result.enterpriseValue)}`);
  if (insights.terminalValueShare) {
    console.log(`Terminal Value Share:      ${pct(insights.terminalValueShare)}`);
  }
  if (insights.revenueCagr) {
    console.log(`Revenue CAGR:              ${pct(insights.revenueCagr, 2)}`);
  }
  for (const warning of insights.warnings) {
    console.warn(`[Demo] ⚠️  ${warning.code}: ${warning.message}`);
  }

  const sensitivity = waccSensitivity(assumptions);
  if (sensitivity.ok) {
    console.log(`WACC Sensitivity:          ±1% WACC = ±${pct(sensitivity.value.sensitivity)} EV`);
  } else {
    console.warn(`[Demo] WACC sensitivity unavailable: ${sensitivity.error.message}`);
  }

  // ==========================================================================
  // Sensitivity Grid
  // ==========================================================================
  const grid = runSensitivityGrid(assumptions);
  console.log(`\nSensitivity: Enterprise Value ($M), rows = terminal growth, columns = WACC`);
  console.log(`${'g \\ WACC'.padStart(9)} ${grid.waccValues.map((w) => pct(w).padStart(8)).join(' ')}`);
  grid.matrix.forEach((row, rowIndex) => {
    const cells = row.map((cell) => (cell === null ? 'n/a' : cell.toFixed(1)).padStart(8));
    console.log(`${pct(grid.terminalGrowthValues[rowIndex], 2).padStart(9)} ${cells.join(' ')}`);
  });

  console.log(separator);
}

main();
