// lib/valuation/index.ts
// DCF Valuation Engine - Module Exports

export * from './types';
export * from './errors';
export * from './outcome';
export * from './projection';
export * from './discounting';
export * from './aggregator';
export * from './sensitivity';
export * from './assumptions';
export * from './insights';
export * from './serialize';
export * from './jobs';
