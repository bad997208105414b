import React, { useEffect, useState } from 'react';
import { Box, Text, useApp } from 'ink';
import { runGenerate } from '@archplant/core';
import type { GenerateOptions, GenerateResult } from '@archplant/core';
import { usePipeline } from '../ui/hooks/use-pipeline.js';
import { PipelineView } from '../ui/components/pipeline-view.js';
import { ResultTable } from '../ui/components/result-table.js';
import { ErrorDisplay } from '../ui/components/error-display.js';
import { renderApp, rethrow } from '../ui/app.js';

interface ResultRef {
  error?: unknown;
}

export function diagramRows(result: GenerateResult): Record<string, unknown>[] {
  if (result.files.length > 0) {
    return result.files.map((file) => ({ file }));
  }
  return [...result.diagrams].map(([key, text]) => ({
    diagram: key,
    lines: text.split('\n').length - 1,
  }));
}

function GenerateInkApp({
  options,
  resultRef,
}: {
  options: GenerateOptions;
  resultRef: ResultRef;
}): React.ReactElement {
  const { steps, reporter } = usePipeline();
  const [result, setResult] = useState<GenerateResult | null>(null);
  const [error, setError] = useState<unknown>(null);
  const { exit } = useApp();

  useEffect(() => {
    void (async () => {
      try {
        setResult(await runGenerate(options, reporter));
      } catch (e: unknown) {
        resultRef.error = e;
        setError(e);
      }
    })();
    // eslint-disable-next-line react-hooks/exhaustive-deps -- run pipeline once on mount
  }, []);

  useEffect(() => {
    if (result || error) exit();
  }, [result, error, exit]);

  const rows = result ? diagramRows(result) : [];
  const columns =
    result && result.files.length > 0
      ? [{ key: 'file', header: 'Written file' }]
      : [
          { key: 'diagram', header: 'Diagram' },
          { key: 'lines', header: 'Lines' },
        ];

  return (
    <Box flexDirection="column">
      <PipelineView steps={steps} />
      {result && <ResultTable rows={rows} columns={columns} emptyMessage="No diagrams created" />}
      {result && result.dependencyCount > 0 && (
        <Text dimColor>{`${String(result.dependencyCount)} service call(s) included`}</Text>
      )}
      {error ? <ErrorDisplay error={error} /> : null}
    </Box>
  );
}

export async function runGenerateApp(options: GenerateOptions): Promise<void> {
  const resultRef: ResultRef = {};
  await renderApp(<GenerateInkApp options={options} resultRef={resultRef} />);
  if (resultRef.error) rethrow(resultRef.error);
}
