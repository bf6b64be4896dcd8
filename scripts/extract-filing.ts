#!/usr/bin/env tsx

/**
 * Extract Filing Script
 *
 * Extracts one filing page and prints the structured record as JSON.
 *
 * Usage:
 *   tsx scripts/extract-filing.ts <kind> <file-or-url> [--flow-graph]
 *
 * Kinds: disclosure_report, lobbyist_report, entity_registration,
 * lobbyist_registration. Arguments starting with http:// or https:// are
 * fetched with FILING_USER_AGENT; anything else is read from disk.
 * --flow-graph prints the Sankey data of a disclosure report instead, keeping
 * FLOW_GRAPH_TOP_N counterparties on each side.
 * Logs go to stderr.
 */

import { ok } from 'neverthrow';

import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { createLogger } from '../src/infra/logger/index.js';
import { buildReportFlowGraph } from '../src/modules/analytics/index.js';
import { FILING_KINDS, serializeFiling, type FilingKind } from '../src/modules/extraction/index.js';
import {
  importFiling,
  makeFileFilingSource,
  makeHttpFilingSource,
  type FilingSink,
} from '../src/modules/filing-import/index.js';

const FLOW_GRAPH_FLAG = '--flow-graph';
const USAGE = `Usage: tsx scripts/extract-filing.ts <${FILING_KINDS.join('|')}> <file-or-url> [${FLOW_GRAPH_FLAG}]`;

const isFilingKind = (value: string): value is FilingKind =>
  FILING_KINDS.some((kind) => kind === value);

const stdoutSink = (flowGraphTopN: number | null): FilingSink => ({
  save: async (filing) => {
    if (flowGraphTopN !== null && filing.kind === 'disclosure_report') {
      const graph = buildReportFlowGraph({ report: filing, topN: flowGraphTopN });
      process.stdout.write(`${JSON.stringify(graph, null, 2)}\n`);
    } else {
      process.stdout.write(serializeFiling(filing));
    }
    return ok(undefined);
  },
});

const main = async (): Promise<void> => {
  const args = process.argv.slice(2);
  const flowGraph = args.includes(FLOW_GRAPH_FLAG);
  const [kind, target] = args.filter((arg) => arg !== FLOW_GRAPH_FLAG);
  if (kind === undefined || target === undefined || !isFilingKind(kind)) {
    console.error(USAGE);
    process.exit(2);
  }
  if (flowGraph && kind !== 'disclosure_report') {
    console.error(`${FLOW_GRAPH_FLAG} needs a disclosure_report`);
    process.exit(2);
  }

  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({ ...config.logger, name: 'extract-filing' });

  const source = /^https?:\/\//.test(target)
    ? makeHttpFilingSource({ ...config.fetcher, logger })
    : makeFileFilingSource();

  const sink = stdoutSink(flowGraph ? config.flowGraph.topN : null);
  const result = await importFiling({ source, sink, logger }, { kind, url: target });

  if (result.isErr()) {
    logger.error({ error: result.error }, result.error.message);
    process.exit(1);
  }

  if (result.value.status === 'not_found') {
    logger.error({ target }, 'Filing not found');
    process.exit(1);
  }
};

await main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
