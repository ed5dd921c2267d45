// Core primitives
export { Timeline } from "./core/timeline.js";
export type { TimelineConfig, PeriodInfo, PeriodPhase } from "./core/timeline.js";
export { Series } from "./core/series.js";
export { pmt, semiAnnualRate, formatAmount, TOLERANCE } from "./core/math-utils.js";
export { irr, npv } from "./core/irr.js";
export { periodsToAnnual, rollupColumns } from "./core/rollup.js";
export type { RollupMode } from "./core/rollup.js";
export { createLogger, silentLogger } from "./core/log.js";
export type { Logger, LogLevel } from "./core/log.js";
export {
  ConfigurationError,
  BalanceSheetIdentityError,
  FdIncomeMismatchError,
  IntercompanyAsymmetryError,
  SequenceError,
} from "./core/errors.js";
export type { IdentityQuantities } from "./core/errors.js";

// Configuration
export { loadSettings, contractSchemaPath } from "./config.js";
export type { EngineSettings } from "./config.js";
export { validateContract, validateModelInputs, parseModelInputs, loadModelInputs } from "./validate/validate.js";

// Types (all type-only exports)
export type {
  WaterfallEngineInputs,
  ContractInput,
  ModelInput,
  FacilityKind,
  AmortizationProfile,
  FacilityInput,
  OperatingReserveInput,
  DebtServiceReserveInput,
  MezzanineDividendReserveInput,
  EntityReserveInput,
  ReservesInput,
  CashInflowInput,
  DividendPolicyInput,
  DepreciationMethod,
  DepreciationInput,
  TaxInput,
  IntercompanySaleInput,
  EntityInput,
  IntercompanyLinkInput,
} from "./types/inputs.js";
export type {
  FacilityPhase,
  FacilityPeriod,
  FacilitySchedule,
  ReserveAccrual,
  ReserveMovement,
  MezzanineDividendMovement,
  ReserveHistory,
  PeriodPnl,
  FacilityAllocation,
  AccelerationAllocation,
  IntercompanyFlow,
  UnmetNeeds,
  WaterfallRow,
  BalanceSheetRow,
  OverdraftPeriod,
  OverdraftSchedule,
  EntityResult,
} from "./types/results.js";
export type { ValidationResult, ValidationError } from "./types/module.js";

// Modules
export { FacilityState } from "./modules/facility/facility-state.js";
export type { FinalizeResult } from "./modules/facility/facility-state.js";
export { ReserveAccount, buildAccrual } from "./modules/reserves/reserve-account.js";
export { OperatingReserve } from "./modules/reserves/operating-reserve.js";
export { DebtServiceReserve } from "./modules/reserves/debt-service-reserve.js";
export { MezzanineDividendReserve } from "./modules/reserves/mezzanine-dividend-reserve.js";
export { EntitySurplusReserve } from "./modules/reserves/entity-surplus-reserve.js";
export { IntercompanyOverdraft } from "./modules/reserves/intercompany-overdraft.js";
export type { OverdraftRole } from "./modules/reserves/intercompany-overdraft.js";
export { computePeriodPnl, calcTax } from "./modules/pnl/period-pnl.js";
export type { PeriodPnlInputs, TaxResult } from "./modules/pnl/period-pnl.js";
export { DepreciationSchedule } from "./modules/pnl/depreciation.js";
export { allocateWaterfall, rankInstruments } from "./modules/waterfall/waterfall-allocator.js";
export type {
  WaterfallInputs,
  WaterfallCashInflow,
  WaterfallFacilityInput,
  WaterfallLendingInput,
  WaterfallBorrowingInput,
  WaterfallMezzanineInput,
  DividendPolicy,
} from "./modules/waterfall/waterfall-allocator.js";
export { runEntity } from "./modules/entity/entity-loop.js";
export type {
  EntityRunContext,
  EntityRunOptions,
  IntercompanyLendingPlan,
  IntercompanyBorrowingPlan,
} from "./modules/entity/entity-loop.js";
export { runModel, MATERIALITY_THRESHOLD } from "./modules/intercompany/orchestrator.js";
export type {
  ModelResult,
  RunModelOptions,
  PassRecord,
  PassNumber,
  IntercompanyCorrection,
  EntityFailure,
} from "./modules/intercompany/orchestrator.js";
export { consolidate, summarizeDscr } from "./modules/consolidation/holding.js";
export type {
  HoldingResult,
  ConsolidatedPeriod,
  ConsolidationScope,
  DscrPoint,
  DscrSummary,
  TaggedFacilitySchedule,
} from "./modules/consolidation/holding.js";

// Analytics and scenarios
export {
  DEFAULT_DISCOUNT_RATE,
  annualCashflows,
  coverageRatios,
  dscrSeries,
  equityIrr,
  extractMetrics,
  llcrSeries,
  plcrSeries,
  projectIrr,
  rateOfReturn,
} from "./modules/analytics/metrics.js";
export type { AnnualCashflows, EntityMetrics } from "./modules/analytics/metrics.js";
export {
  applyAdjustment,
  buildSweepValues,
  runMultiSweep,
  runScenario,
  runSweep,
  validateAdjustment,
  validateSweepVariable,
} from "./modules/scenario/scenario-runner.js";
export type {
  ScenarioAdjustment,
  ScenarioDriver,
  ScenarioOptions,
  ScenarioResult,
  SweepResult,
  SweepRow,
  SweepVariable,
} from "./modules/scenario/scenario-runner.js";

// Verification
export {
  auditModel,
  auditEntity,
  checkBalanceSheetIdentity,
  checkFdIncome,
  checkDsraGate,
  checkGapExcessExclusivity,
  checkReAmortization,
  checkIntercompanyElimination,
} from "./verify/identity.js";
export type { AuditCheck, AuditFinding, AuditReport } from "./verify/identity.js";

// Engine
export { WaterfallEngine, createSummaryReport } from "./engine/waterfall-engine.js";
export type {
  WaterfallEngineResult,
  WaterfallEngineValidation,
  WaterfallEngineOptions,
  WaterfallEngineSweep,
} from "./engine/waterfall-engine.js";

// Formatters
export {
  buildAnnualStatement,
  formatAnnualStatementAsText,
  formatAnnualStatementAsJson,
} from "./formatters/annual-statement.js";
export type { AnnualStatement, AnnualStatementJson, AnnualStatementRow } from "./formatters/annual-statement.js";
