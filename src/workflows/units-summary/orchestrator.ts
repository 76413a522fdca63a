import {
  runSucceeded,
  runUnitsSummary,
  UnitsSummaryOptions,
  UnitsSummaryResult,
} from "../../services/units-summary.service";

export { runSucceeded };

export async function runUnitsSummaryWorkflow(options?: UnitsSummaryOptions): Promise<UnitsSummaryResult> {
  return await runUnitsSummary(options);
}

export default runUnitsSummaryWorkflow;
