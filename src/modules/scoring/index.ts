// ===========================================
// RISK SCORING - MODULE INDEX
// ===========================================

export { RiskScoringEngine } from './risk-engine.js';
export { computeInvestScore, growthTrend } from './invest-score.js';
export { analyzeLiquidity, LIQUIDITY_NEUTRAL } from './analyzers/liquidity.js';
export { analyzeHolders, HOLDERS_UNKNOWN } from './analyzers/holders.js';
export { analyzeTradingPattern, isRoundAmount, TRADING_NEUTRAL } from './analyzers/trading-pattern.js';
export { analyzeMaturity, tokenAgeHours } from './analyzers/maturity.js';
export type { AnalyzerInput, AnalyzerResult } from './analyzers/types.js';
