import { aggregateByCounterparty } from '../aggregate.js';
import { buildFlowGraph } from '../flow-graph.js';

import type { FlowGraph } from '../types.js';
import type { DisclosureReport } from '@/modules/extraction/index.js';

export interface BuildReportFlowGraphInput {
  report: DisclosureReport;
  /** Counterparties kept on each side */
  topN: number;
}

/**
 * Money flow of one disclosure report: the largest contributors feed the
 * organization, which feeds its largest recipients. Transactions with the
 * organization itself are left out.
 */
export const buildReportFlowGraph = (input: BuildReportFlowGraphInput): FlowGraph => {
  const entity = input.report.reportInfo.organizationName;
  const options = { limit: input.topN, exclude: entity };

  return buildFlowGraph({
    entity,
    inflows: aggregateByCounterparty(input.report.contributions, options),
    outflows: aggregateByCounterparty(input.report.expenditures, options),
  });
};
