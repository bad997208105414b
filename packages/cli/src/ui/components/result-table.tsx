import type React from 'react';
import { Box, Text } from 'ink';
import { cellToString } from '../../utils/cli-helpers.js';

interface Column {
  key: string;
  header: string;
}

interface Props {
  rows: Record<string, unknown>[];
  columns: Column[];
  emptyMessage?: string;
}

const MAX_WIDTH = 60;

function fit(value: string, width: number): string {
  return value.length > width ? value.substring(0, width - 1) + '…' : value.padEnd(width);
}

export function ResultTable({ rows, columns, emptyMessage }: Props): React.ReactElement {
  if (rows.length === 0) {
    return <Text dimColor>{emptyMessage ?? 'Nothing to show'}</Text>;
  }

  const widths = columns.map((col) =>
    Math.min(
      Math.max(col.header.length, ...rows.map((row) => cellToString(row[col.key]).length)),
      MAX_WIDTH
    )
  );

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text bold>{columns.map((col, i) => fit(col.header, widths[i] ?? 0)).join(' │ ')}</Text>
      <Text dimColor>{widths.map((w) => '─'.repeat(w)).join('─┼─')}</Text>
      {rows.map((row, ri) => (
        <Text key={ri}>
          {columns.map((col, i) => fit(cellToString(row[col.key]), widths[i] ?? 0)).join(' │ ')}
        </Text>
      ))}
    </Box>
  );
}
