import { describe, expect, it } from 'vitest';

import { buildFlowGraph, buildReportFlowGraph, type FlowGraph } from '@/modules/analytics/index.js';
import { extractFiling } from '@/modules/extraction/index.js';

import { totals } from '../../fixtures/builders.js';
import { loadHtmlFixture } from '../../fixtures/html.js';

const hasCycle = (graph: FlowGraph): boolean => {
  const edges = new Map<number, number[]>();
  for (const link of graph.links) {
    edges.set(link.source, [...(edges.get(link.source) ?? []), link.target]);
  }

  const visiting = new Set<number>();
  const done = new Set<number>();
  const visit = (node: number): boolean => {
    if (visiting.has(node)) return true;
    if (done.has(node)) return false;
    visiting.add(node);
    const cyclic = (edges.get(node) ?? []).some(visit);
    visiting.delete(node);
    done.add(node);
    return cyclic;
  };

  return graph.nodes.some((_, index) => visit(index));
};

describe('buildFlowGraph', () => {
  it('splits a counterparty on both sides into two nodes', () => {
    const graph = buildFlowGraph({
      entity: 'X',
      inflows: totals({ A: 100, B: 50 }),
      outflows: totals({ B: 30, C: 20 }),
    });

    expect(graph.nodes.map((node) => node.name)).toEqual([
      'A',
      'B (Contributor)',
      'X',
      'B (Recipient)',
      'C',
    ]);
    expect(graph.links).toEqual([
      { source: 0, target: 2, value: 100 },
      { source: 1, target: 2, value: 50 },
      { source: 2, target: 3, value: 30 },
      { source: 2, target: 4, value: 20 },
    ]);
    expect(hasCycle(graph)).toBe(false);
  });

  it('drops counterparties named like the entity', () => {
    const graph = buildFlowGraph({
      entity: 'X',
      inflows: totals({ X: 10, A: 5 }),
      outflows: totals({ X: 3 }),
    });

    expect(graph.nodes.map((node) => node.name)).toEqual(['A', 'X']);
    expect(graph.links).toEqual([{ source: 0, target: 1, value: 5 }]);
  });

  it('keeps node names unique when a suffixed name already exists', () => {
    const graph = buildFlowGraph({
      entity: 'X',
      inflows: totals({ B: 10, 'B (Recipient)': 4 }),
      outflows: totals({ B: 2 }),
    });

    const names = graph.nodes.map((node) => node.name);

    expect(names).toEqual(['B (Contributor)', 'B (Recipient)', 'X', 'B (Recipient) (Recipient)']);
    expect(new Set(names).size).toBe(names.length);
    expect(hasCycle(graph)).toBe(false);
  });

  it('builds a graph with only the entity when there are no flows', () => {
    expect(buildFlowGraph({ entity: 'X', inflows: [], outflows: [] })).toEqual({
      nodes: [{ name: 'X' }],
      links: [],
    });
  });
});

describe('buildReportFlowGraph', () => {
  const report = extractFiling({
    kind: 'disclosure_report',
    html: loadHtmlFixture('disclosure-report'),
  })._unsafeUnwrap();
  if (report.kind !== 'disclosure_report') throw new Error('unexpected kind');

  it('keeps the largest counterparties on each side', () => {
    const graph = buildReportFlowGraph({ report, topN: 2 });

    expect(graph.nodes.map((node) => node.name)).toEqual([
      'Acme Widgets LLC',
      'Sam Example',
      'Friends of Test Valley',
      'Radio Placeholder',
      'Print Shop Co',
    ]);
    expect(graph.links).toEqual([
      { source: 0, target: 2, value: 1000 },
      { source: 1, target: 2, value: 650.5 },
      { source: 2, target: 3, value: 500 },
      { source: 2, target: 4, value: 300 },
    ]);
  });

  it('leaves out transactions with the organization itself', () => {
    const refund = report.expenditures[0];
    if (refund === undefined) throw new Error('missing expenditure');

    const graph = buildReportFlowGraph({
      report: {
        ...report,
        expenditures: [...report.expenditures, { ...refund, counterparty: 'Friends of Test Valley' }],
      },
      topN: 5,
    });

    expect(graph.nodes.map((node) => node.name)).toEqual([
      'Acme Widgets LLC',
      'Sam Example',
      'Jane Placeholder',
      'Friends of Test Valley',
      'Radio Placeholder',
      'Print Shop Co',
    ]);
    expect(graph.links).toHaveLength(5);
  });
});
