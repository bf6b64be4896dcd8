import type { Decimal } from 'decimal.js';

/**
 * Total amount exchanged with one counterparty.
 */
export interface CounterpartyTotal {
  readonly name: string;
  readonly total: Decimal;
}

export interface FlowGraphInput {
  /** Name of the entity at the centre of the graph */
  readonly entity: string;
  /** Money received, by source */
  readonly inflows: readonly CounterpartyTotal[];
  /** Money spent, by recipient */
  readonly outflows: readonly CounterpartyTotal[];
}

export interface FlowNode {
  readonly name: string;
}

export interface FlowLink {
  /** Index of the source node */
  readonly source: number;
  /** Index of the target node */
  readonly target: number;
  readonly value: number;
}

/**
 * Sankey diagram data. Node names are unique; links only run from a source
 * node to the entity and from the entity to a sink node.
 */
export interface FlowGraph {
  readonly nodes: readonly FlowNode[];
  readonly links: readonly FlowLink[];
}

export interface InStateShare {
  readonly inState: Decimal;
  readonly outOfState: Decimal;
  /** Contributions whose address has no recognisable state */
  readonly unknown: Decimal;
  readonly total: Decimal;
  /** Percentages of the total, one decimal place */
  readonly inStatePercent: number;
  readonly outOfStatePercent: number;
  readonly unknownPercent: number;
}
