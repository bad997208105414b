import chalk from 'chalk';
import type { OutputFormat } from './command-schemas.js';

export const Logger = {
  fail(message: string): void {
    console.error(chalk.red(`❌ ${message}`));
  },
  warn(message: string): void {
    console.warn(chalk.yellow(`⚠️  ${message}`));
  },
  info(message: string): void {
    console.log(chalk.blue(`ℹ️  ${message}`));
  },
  success(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  },
} as const;

type Row = Record<string, unknown>;

const MAX_COLUMN_WIDTH = 50;

export function cellToString(value: unknown): string {
  if (value == null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) return value.map((item) => cellToString(item)).join(', ');
  return JSON.stringify(value);
}

function truncate(value: string, width: number): string {
  return value.length > width ? value.substring(0, width - 3) + '...' : value.padEnd(width);
}

function yamlScalar(value: unknown): string {
  if (typeof value === 'string') {
    return /[:\-#\n"']/.test(value) || value === '' ? JSON.stringify(value) : value;
  }
  return String(value);
}

function toYaml(data: unknown, indent = 0): string {
  const spaces = '  '.repeat(indent);
  if (Array.isArray(data)) {
    if (data.length === 0) return `${spaces}[]`;
    return data
      .map((item) => {
        if (typeof item === 'object' && item !== null) {
          return `${spaces}- ${toYaml(item, indent + 1).trimStart()}`;
        }
        return `${spaces}- ${yamlScalar(item)}`;
      })
      .join('\n');
  }
  if (typeof data === 'object' && data !== null) {
    const entries = Object.entries(data);
    if (entries.length === 0) return `${spaces}{}`;
    return entries
      .map(([key, value]) => {
        if (Array.isArray(value) && value.length === 0) return `${spaces}${key}: []`;
        if (typeof value === 'object' && value !== null) {
          return `${spaces}${key}:\n${toYaml(value, indent + 1)}`;
        }
        return `${spaces}${key}: ${yamlScalar(value)}`;
      })
      .join('\n');
  }
  return `${spaces}${yamlScalar(data)}`;
}

export const OutputFormatter = {
  format(data: unknown, format: OutputFormat): string {
    switch (format) {
      case 'json':
        return JSON.stringify(data, null, 2);
      case 'yaml':
        return toYaml(data);
      case 'table':
      default:
        if (Array.isArray(data)) {
          return OutputFormatter.formatTable(
            data.filter((item): item is Row => typeof item === 'object' && item !== null)
          );
        }
        return cellToString(data);
    }
  },
  formatTable(rows: Row[]): string {
    const firstRow = rows[0];
    if (!firstRow) {
      return chalk.gray('No data to display');
    }
    const columns = Object.keys(firstRow);
    const headers = columns.map((key) => key.charAt(0).toUpperCase() + key.slice(1));
    const widths = columns.map((key, i) =>
      Math.min(
        Math.max(headers[i]?.length ?? 0, ...rows.map((row) => cellToString(row[key]).length)),
        MAX_COLUMN_WIDTH
      )
    );
    const header = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join(' | ');
    const separator = widths.map((width) => '-'.repeat(width)).join('-+-');
    const body = rows.map((row) =>
      columns.map((key, i) => truncate(cellToString(row[key]), widths[i] ?? 0)).join(' | ')
    );
    return [chalk.bold(header), chalk.gray(separator), ...body].join('\n');
  },
} as const;
