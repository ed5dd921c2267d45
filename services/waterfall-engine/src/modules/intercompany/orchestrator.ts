import { Timeline } from "../../core/timeline.js";
import { sum } from "../../core/math-utils.js";
import { IntercompanyAsymmetryError } from "../../core/errors.js";
import { silentLogger, type Logger } from "../../core/log.js";
import type { EntityInput, IntercompanyLinkInput, WaterfallEngineInputs } from "../../types/inputs.js";
import type { EntityResult } from "../../types/results.js";
import {
  runEntity,
  type EntityRunContext,
  type IntercompanyBorrowingPlan,
  type IntercompanyLendingPlan,
} from "../entity/entity-loop.js";
import { consolidate, type HoldingResult } from "../consolidation/holding.js";

// Total deficit below which a link is left out of passes 2-4
export const MATERIALITY_THRESHOLD = 1.0;

export type PassNumber = 1 | 2 | 3 | 4;

export interface PassRecord {
  pass: PassNumber;
  entity_id: string;
  link_id: string | null;
  succeeded: boolean;
}

export interface IntercompanyCorrection {
  link_id: string;
  lender: string;
  borrower: string;
  material: boolean;
  rerun: string[];
  total_deficit: number;
  total_lent: number;
  total_repaid: number;
  settled: boolean; // Pass 4 ran for this link
}

export interface EntityFailure {
  entity_id: string;
  error: Error;
}

export interface ModelResult {
  name: string;
  currency: string;
  timeline: Timeline;
  entityOrder: string[];
  entities: Record<string, EntityResult>;
  corrections: IntercompanyCorrection[];
  passes: PassRecord[];
  failures: EntityFailure[];
  holding: HoldingResult;
}

export interface RunModelOptions {
  verify?: boolean;
  logger?: Logger;
  maxSettlementRounds?: number; // Defaults to one more than the number of links
}

interface EntityPlans {
  lending: IntercompanyLendingPlan[];
  borrowing: IntercompanyBorrowingPlan[];
}

/**
 * Runs every entity, then resolves intercompany overdrafts link by link:
 *
 * - Pass 1: all entities independently, no intercompany flows.
 * - Pass 2: the lender again, with the borrower's deficit vector as demand.
 * - Pass 3: the borrower again, receiving the lender's lent vector.
 * - Pass 4: the lender once more with the lent vector committed and the
 *   borrower's repayments as inflow, for links where the borrower repaid.
 *
 * Each pass builds fresh entity state; nothing is carried between runs except
 * the injected vectors. An entity that borrows on one link and lends on
 * another is re-run by the later link, which can move its repayments on the
 * earlier one, so pass 4 repeats until every lender holds its borrower's
 * current repayments or `maxSettlementRounds` is spent. A link whose sides
 * still differ fails both entities; the rest of the group is kept.
 */
export function runModel(inputs: WaterfallEngineInputs, options: RunModelOptions = {}): ModelResult {
  const logger = options.logger ?? silentLogger;
  const verify = options.verify ?? true;
  const timeline = new Timeline({
    startDate: inputs.model.start_date,
    periods: inputs.model.periods,
    constructionPeriods: inputs.model.construction_periods,
  });
  const context: EntityRunContext = { timeline, currency: inputs.model.currency };

  const entities = new Map<string, EntityInput>(inputs.entities.map((e) => [e.id, e]));
  const plans = new Map<string, EntityPlans>(
    inputs.entities.map((e) => [e.id, { lending: [], borrowing: [] }]),
  );
  const results = new Map<string, EntityResult>();
  const failures = new Map<string, Error>();
  const passes: PassRecord[] = [];

  const run = (entityId: string, pass: PassNumber, linkId: string | null): EntityResult | null => {
    const entity = entities.get(entityId);
    const entityPlans = plans.get(entityId);
    if (!entity || !entityPlans) {
      return null;
    }
    try {
      const result = runEntity(entity, context, {
        lending: entityPlans.lending,
        borrowing: entityPlans.borrowing,
        verify,
      });
      results.set(entityId, result);
      passes.push({ pass, entity_id: entityId, link_id: linkId, succeeded: true });
      return result;
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      failures.set(entityId, failure);
      results.delete(entityId);
      passes.push({ pass, entity_id: entityId, link_id: linkId, succeeded: false });
      logger.error("Entity run failed", { entity: entityId, pass, error: failure.message });
      return null;
    }
  };

  const invalidate = (entityId: string, reason: Error | string) => {
    if (!failures.has(entityId)) {
      const error = typeof reason === "string" ? new Error(reason) : reason;
      failures.set(entityId, error);
      results.delete(entityId);
      logger.warn("Entity run invalidated", { entity: entityId, reason: error.message });
    }
  };

  // Pass 1
  for (const entity of inputs.entities) {
    run(entity.id, 1, null);
  }
  logger.info("Pass 1 complete", { entities: results.size, failures: failures.size });

  // Passes 2 and 3
  const links = inputs.intercompany ?? [];
  const corrections: IntercompanyCorrection[] = [];
  for (const link of links) {
    const correction = correctLink(link);
    if (correction) {
      corrections.push(correction);
      logger.info("Intercompany correction", { ...correction });
    }
  }

  // Pass 4
  const maxRounds = options.maxSettlementRounds ?? corrections.length + 1;
  for (let round = 0; round < maxRounds; round++) {
    let moved = false;
    for (const correction of corrections) {
      if (settle(correction)) {
        moved = true;
      }
    }
    if (!moved) {
      break;
    }
  }

  for (const link of links) {
    const mismatch = findAsymmetry(link);
    if (mismatch) {
      logger.error("Intercompany balances do not eliminate", { link: link.id, error: mismatch.message });
      invalidate(link.lender, mismatch);
      invalidate(link.borrower, mismatch);
    }
  }
  dropBorrowersOfFailedLenders();

  const entityOrder = inputs.entities.map((e) => e.id).filter((id) => results.has(id));
  const succeeded = entityOrder.flatMap((id) => {
    const result = results.get(id);
    return result ? [result] : [];
  });

  return {
    name: inputs.model.name,
    currency: inputs.model.currency,
    timeline,
    entityOrder,
    entities: Object.fromEntries(results),
    corrections,
    passes,
    failures: Array.from(failures, ([entity_id, error]) => ({ entity_id, error })),
    holding: consolidate(succeeded, {
      links: links.filter((link) => results.has(link.lender) && results.has(link.borrower)),
      entities: inputs.entities.filter((entity) => results.has(entity.id)),
    }),
  };

  function correctLink(link: IntercompanyLinkInput): IntercompanyCorrection | null {
    if (failures.has(link.lender)) {
      invalidate(link.borrower, `lender ${link.lender} failed`);
      return null;
    }
    const borrowerPass1 = results.get(link.borrower);
    if (!borrowerPass1) {
      return null;
    }

    const deficit = [...borrowerPass1.deficit];
    const correction: IntercompanyCorrection = {
      link_id: link.id,
      lender: link.lender,
      borrower: link.borrower,
      material: sum(deficit) >= MATERIALITY_THRESHOLD,
      rerun: [],
      total_deficit: sum(deficit),
      total_lent: 0,
      total_repaid: 0,
      settled: false,
    };
    if (!correction.material) {
      return correction;
    }

    // Pass 2
    const lendingPlan: IntercompanyLendingPlan = {
      linkId: link.id,
      counterparty: link.borrower,
      rate: link.rate,
      demand: deficit,
    };
    plans.get(link.lender)?.lending.push(lendingPlan);
    const lender = run(link.lender, 2, link.id);
    correction.rerun.push(link.lender);
    if (!lender) {
      invalidate(link.borrower, `lender ${link.lender} failed`);
      return correction;
    }
    const lent = [...(lender.lent[link.id] ?? [])];
    // Later re-runs of the lender reproduce these advances exactly
    lendingPlan.committed = lent;
    correction.total_lent = sum(lent);

    // Pass 3
    plans.get(link.borrower)?.borrowing.push({
      linkId: link.id,
      counterparty: link.lender,
      rate: link.rate,
      received: lent,
    });
    const borrower = run(link.borrower, 3, link.id);
    correction.rerun.push(link.borrower);
    if (borrower) {
      correction.total_repaid = sum(borrower.repaid[link.id] ?? []);
    }
    return correction;
  }

  /**
   * Re-runs the lender when the borrower's repayments differ from the ones it
   * last received. Returns whether the lender ran.
   */
  function settle(correction: IntercompanyCorrection): boolean {
    if (!correction.material) {
      return false;
    }
    const lenderPlan = plans.get(correction.lender)?.lending.find((p) => p.linkId === correction.link_id);
    const borrower = results.get(correction.borrower);
    if (!lenderPlan || !borrower || !results.has(correction.lender)) {
      return false;
    }
    const repayments = [...(borrower.repaid[correction.link_id] ?? [])];
    correction.total_repaid = sum(repayments);
    if (sameVector(lenderPlan.repayments ?? [], repayments)) {
      return false;
    }
    lenderPlan.repayments = repayments;
    if (run(correction.lender, 4, correction.link_id)) {
      correction.settled = true;
      correction.rerun.push(correction.lender);
    } else {
      invalidate(correction.borrower, `lender ${correction.lender} failed during settlement`);
    }
    return true;
  }

  function dropBorrowersOfFailedLenders(): void {
    let dropped = true;
    while (dropped) {
      dropped = false;
      for (const link of links) {
        if (failures.has(link.lender) && results.has(link.borrower)) {
          invalidate(link.borrower, `lender ${link.lender} failed`);
          dropped = true;
        }
      }
    }
  }

  function findAsymmetry(link: IntercompanyLinkInput): IntercompanyAsymmetryError | null {
    const lender = results.get(link.lender);
    const borrower = results.get(link.borrower);
    if (!lender || !borrower) {
      return null;
    }
    const asset = lender.overdrafts.find((o) => o.link_id === link.id && o.role === "lender");
    const liability = borrower.overdrafts.find((o) => o.link_id === link.id && o.role === "borrower");
    for (const period of timeline.indices) {
      const assetBalance = asset?.schedule[period]?.closing_balance ?? 0;
      const liabilityBalance = liability?.schedule[period]?.closing_balance ?? 0;
      if (assetBalance !== liabilityBalance) {
        return new IntercompanyAsymmetryError(
          link.id,
          link.lender,
          link.borrower,
          period,
          assetBalance,
          liabilityBalance,
          inputs.model.currency,
        );
      }
    }
    return null;
  }
}

// Missing entries count as zero
function sameVector(a: readonly number[], b: readonly number[]): boolean {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if ((a[i] ?? 0) !== (b[i] ?? 0)) {
      return false;
    }
  }
  return true;
}
