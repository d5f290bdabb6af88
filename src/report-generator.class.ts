/**
 * ReportGenerator
 *
 * Renders an investigation and its graph. Every format is a pure function of
 * its inputs: nodes ordered by (type, value), provenance by collector,
 * edges by (relation, target) and collector statuses by name.
 */

import jsonStableStringify from 'json-stable-stringify';
import { compareStrings } from './concerns/compare.js';
import { renderTable } from './concerns/table.js';
import { OsintError, UnsupportedFormatError } from './errors.js';
import type { Investigation } from './investigation.class.js';
import { REPORT_FORMATS, type GraphNode, type InvestigationGraph, type ReportFormat } from './types/investigation.types.js';

export const SCHEMA_VERSION = '1.0';

const FILE_EXTENSIONS: Record<ReportFormat, string> = {
  structured: 'json',
  tabular: 'txt',
  csv: 'csv'
};

const CSV_COLUMNS = ['type', 'value', 'confidence', 'sources', 'attributes'] as const;

export function isReportFormat(value: string): value is ReportFormat {
  return (REPORT_FORMATS as readonly string[]).includes(value);
}

export function assertReportFormat(value: string): ReportFormat {
  if (!isReportFormat(value)) {
    throw new UnsupportedFormatError(value, REPORT_FORMATS);
  }
  return value;
}

export function reportExtension(format: ReportFormat): string {
  return FILE_EXTENSIONS[format];
}

export function sortNodes(graph: InvestigationGraph): GraphNode[] {
  return [...graph.nodes.values()].sort((a, b) => compareStrings(a.type, b.type) || compareStrings(a.value, b.value));
}

function edgeCount(graph: InvestigationGraph): number {
  let count = 0;
  for (const node of graph.nodes.values()) count += node.edges.length;
  return count;
}

function formatAttributes(attributes: Readonly<Record<string, string>>): string {
  return Object.keys(attributes)
    .sort(compareStrings)
    .map(key => `${key}=${attributes[key] ?? ''}`)
    .join('; ');
}

function formatSources(node: GraphNode): string {
  return node.provenance.map(record => record.adapterName).join(';');
}

export function escapeCsv(field: string): string {
  return /[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field;
}

export class ReportGenerator {
  render(investigation: Investigation, graph: InvestigationGraph, format: string): Buffer {
    switch (assertReportFormat(format)) {
      case 'structured':
        return Buffer.from(this.renderStructured(investigation, graph), 'utf8');
      case 'tabular':
        return Buffer.from(this.renderTabular(investigation, graph), 'utf8');
      case 'csv':
        return Buffer.from(this.renderCsv(graph), 'utf8');
    }
  }

  renderStructured(investigation: Investigation, graph: InvestigationGraph): string {
    const { adapters, ...details } = investigation.toJSON();
    const document = {
      schemaVersion: SCHEMA_VERSION,
      investigation: details,
      summary: {
        ...investigation.summary(),
        nodes: graph.nodes.size,
        edges: edgeCount(graph)
      },
      adapters: adapters.map(result => ({
        name: result.adapterName,
        outcome: result.outcome,
        durationMs: result.durationMs,
        attempts: result.attempts,
        findings: result.findings.length,
        finishedAt: result.finishedAt,
        ...(result.errorDetail !== undefined ? { errorDetail: result.errorDetail } : {})
      })),
      nodes: sortNodes(graph).map(node => ({
        key: node.key,
        type: node.type,
        value: node.value,
        confidence: node.confidence,
        attributes: node.attributes,
        provenance: node.provenance,
        edges: node.edges
      }))
    };

    const json = jsonStableStringify(document, { space: 2 });
    if (json === undefined) {
      throw new OsintError('Structured report could not be serialized', { code: 'REPORT_SERIALIZATION' });
    }
    return `${json}\n`;
  }

  renderTabular(investigation: Investigation, graph: InvestigationGraph): string {
    const { target } = investigation;
    const summary = investigation.summary();
    const lines: string[] = [
      `Investigation ${investigation.id}`,
      `Target: ${target.normalizedValue} (${target.kind})`,
      `Status: ${investigation.status}`,
      `Collectors: ${summary.succeeded}/${summary.selected} succeeded`
    ];
    if (investigation.skipped.length > 0) {
      lines.push(`Skipped (disabled): ${investigation.skipped.join(', ')}`);
    }

    const collectors = investigation.adapterResults().map(result => [
      result.adapterName,
      result.outcome,
      `${result.durationMs}ms`,
      String(result.attempts),
      String(result.findings.length),
      result.errorDetail ?? ''
    ]);
    lines.push('', 'Collectors', renderTable(['Collector', 'Outcome', 'Duration', 'Attempts', 'Findings', 'Detail'], collectors));

    const nodes = sortNodes(graph);
    lines.push('', `Findings (${nodes.length})`);
    if (nodes.length === 0) {
      lines.push('No findings.');
    } else {
      const rows = nodes.map(node => [
        node.type,
        node.value,
        node.confidence.toFixed(2),
        formatSources(node),
        node.edges.map(edge => `${edge.relation} ${edge.target}`).join('\n'),
        formatAttributes(node.attributes)
      ]);
      lines.push(renderTable(['Type', 'Value', 'Confidence', 'Sources', 'Links', 'Attributes'], rows));
    }

    return `${lines.join('\n')}\n`;
  }

  renderCsv(graph: InvestigationGraph): string {
    const rows: string[] = [CSV_COLUMNS.join(',')];
    for (const node of sortNodes(graph)) {
      rows.push([
        node.type,
        node.value,
        String(node.confidence),
        formatSources(node),
        formatAttributes(node.attributes)
      ].map(escapeCsv).join(','));
    }
    return `${rows.join('\r\n')}\r\n`;
  }
}
