import { generateDecisionSupport } from "./decision-support";
import { estimateYield } from "./yield-estimator";
import type { DecisionSupportReport, SeasonRecordInput, YieldEstimate } from "./yield.types";

export type SeasonAssessment = {
  predictedYield: YieldEstimate;
  decisionSupport: DecisionSupportReport | null;
};

export class YieldService {
  /** Runs the estimator, then decision support on its result. Never throws. */
  static assess(record: SeasonRecordInput): SeasonAssessment {
    const predictedYield = estimateYield(record);
    return {
      predictedYield,
      decisionSupport: generateDecisionSupport(record, predictedYield),
    };
  }
}
