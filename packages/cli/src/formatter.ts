import type { BrokerRecord, ConfigValue, ResourceConfigEntry } from '@kafkarecon/core';
import type { CliError } from './errors.js';
import type { DisplayPolicy } from './types.js';

/** A list cell spans several lines; the other cells of its row continue with " ...". */
export type TableCell = string | number | boolean | readonly string[];

const TABLE_INDENT = '   ';
const COLUMN_GAP = '  ';
const CONTINUATION = ' ...';

function cellLines(cell: TableCell): string[] {
  if (Array.isArray(cell)) {
    return [...cell];
  }
  return [String(cell)];
}

function expandRow(row: readonly TableCell[]): string[][] {
  const columns = row.map(cellLines);
  const height = Math.max(0, ...columns.map((column) => column.length));
  const lines: string[][] = [];
  for (let index = 0; index < height; index += 1) {
    lines.push(columns.map((column) => column[index] ?? CONTINUATION));
  }
  return lines;
}

export function formatTable(headers: readonly string[], rows: ReadonlyArray<readonly TableCell[]>): string {
  const body = rows.flatMap(expandRow);
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...body.map((line) => (line[index] ?? '').length)),
  );

  const render = (cells: readonly string[]): string =>
    (TABLE_INDENT + widths.map((width, index) => (cells[index] ?? '').padEnd(width)).join(COLUMN_GAP)).trimEnd();

  const lines = [render(headers), render(headers.map((header) => '-'.repeat(header.length))), ...body.map(render)];
  return lines.join('\n');
}

function configCell(value: ConfigValue): TableCell {
  return Array.isArray(value) ? value : String(value);
}

export function formatConfig(entries: ReadonlyArray<readonly [string, ConfigValue]>): string {
  return formatTable(
    ['Key', 'Value'],
    entries.map(([key, value]) => [key, configCell(value)]),
  );
}

export function formatBrokers(brokers: readonly BrokerRecord[]): string {
  return formatTable(
    ['ID', 'Host', 'Port'],
    brokers.map((broker) => [broker.id, broker.host, broker.port]),
  );
}

export function formatConfigEntries(entries: readonly ResourceConfigEntry[], policy: DisplayPolicy): string {
  return formatTable(
    ['Name', 'Value', 'Source', 'Read Only', 'Sensitive'],
    entries.map((entry) => [
      entry.name.slice(0, policy.nameWidth),
      entry.value === undefined ? '-' : entry.value.slice(0, policy.valueWidth),
      entry.source,
      entry.readOnly ? 'Yes' : '',
      entry.sensitive ? 'Yes' : '',
    ]),
  );
}

export function formatPrompt(broker: string): string {
  return ` ┌──(${broker})\n └─$ `;
}

export function formatCliError(error: CliError): string {
  const lines = [`[${error.code}] ${error.message}`];
  if (error.suggestion) {
    lines.push(`suggestion: ${error.suggestion}`);
  }
  return lines.join('\n');
}
