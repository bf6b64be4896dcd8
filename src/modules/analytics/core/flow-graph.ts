/**
 * Flow-Graph Builder
 *
 * Lays out sources, the entity and sinks as three layers. A counterparty
 * that both gave to and received from the entity becomes two nodes,
 * `<name> (Contributor)` and `<name> (Recipient)`, so every link runs
 * forward and the graph has no cycle. Counterparties named like the entity
 * are dropped.
 */

import type { FlowGraph, FlowGraphInput, FlowLink, FlowNode } from './types.js';

export const CONTRIBUTOR_SUFFIX = ' (Contributor)';
export const RECIPIENT_SUFFIX = ' (Recipient)';

export const buildFlowGraph = (input: FlowGraphInput): FlowGraph => {
  const { entity } = input;
  const inflows = input.inflows.filter((flow) => flow.name !== entity);
  const outflows = input.outflows.filter((flow) => flow.name !== entity);

  const sinkNames = new Set(outflows.map((flow) => flow.name));
  const shared = new Set(inflows.map((flow) => flow.name).filter((name) => sinkNames.has(name)));

  const nodes: FlowNode[] = [];
  // Every node name in use, the entity's included from the start
  const taken = new Set<string>([entity]);

  const addNode = (name: string): number => {
    nodes.push({ name });
    return nodes.length - 1;
  };

  // One node per counterparty per layer; a name clashing with another
  // layer's node gets the role suffix again until it is unique
  const layer = (suffix: string) => {
    const indexes = new Map<string, number>();
    return (name: string): number => {
      const existing = indexes.get(name);
      if (existing !== undefined) return existing;

      let label = shared.has(name) ? `${name}${suffix}` : name;
      while (taken.has(label)) {
        label = `${label}${suffix}`;
      }
      taken.add(label);

      const index = addNode(label);
      indexes.set(name, index);
      return index;
    };
  };

  const sourceNode = layer(CONTRIBUTOR_SUFFIX);
  const sinkNode = layer(RECIPIENT_SUFFIX);

  const incoming = inflows.map((flow) => ({ node: sourceNode(flow.name), total: flow.total }));
  const entityIndex = addNode(entity);
  const outgoing = outflows.map((flow) => ({ node: sinkNode(flow.name), total: flow.total }));

  const links: FlowLink[] = [
    ...incoming.map(({ node, total }) => ({
      source: node,
      target: entityIndex,
      value: total.toNumber(),
    })),
    ...outgoing.map(({ node, total }) => ({
      source: entityIndex,
      target: node,
      value: total.toNumber(),
    })),
  ];

  return { nodes, links };
};
