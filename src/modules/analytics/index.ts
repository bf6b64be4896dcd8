export { aggregateByCounterparty, type AggregateOptions } from './core/aggregate.js';
export { buildFlowGraph, CONTRIBUTOR_SUFFIX, RECIPIENT_SUFFIX } from './core/flow-graph.js';
export { summarizeInStateShare } from './core/in-state-share.js';
export {
  buildReportFlowGraph,
  type BuildReportFlowGraphInput,
} from './core/usecases/build-report-flow-graph.js';

export type {
  CounterpartyTotal,
  FlowGraph,
  FlowGraphInput,
  FlowLink,
  FlowNode,
  InStateShare,
} from './core/types.js';
