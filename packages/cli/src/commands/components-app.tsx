import React, { useEffect, useState } from 'react';
import { Box, useApp } from 'ink';
import { runComponents } from '@archplant/core';
import type { ComponentsOptions, ComponentSummary } from '@archplant/core';
import { usePipeline } from '../ui/hooks/use-pipeline.js';
import { PipelineView } from '../ui/components/pipeline-view.js';
import { ResultTable } from '../ui/components/result-table.js';
import { ErrorDisplay } from '../ui/components/error-display.js';
import { renderApp, rethrow } from '../ui/app.js';

interface ResultRef {
  error?: unknown;
}

const COLUMNS = [
  { key: 'packageName', header: 'Component' },
  { key: 'service', header: 'Service' },
  { key: 'module', header: 'Module' },
  { key: 'uses', header: 'Uses' },
  { key: 'calls', header: 'Calls' },
];

function ComponentsInkApp({
  options,
  resultRef,
}: {
  options: ComponentsOptions;
  resultRef: ResultRef;
}): React.ReactElement {
  const { steps, reporter } = usePipeline();
  const [components, setComponents] = useState<ComponentSummary[] | null>(null);
  const [error, setError] = useState<unknown>(null);
  const { exit } = useApp();

  useEffect(() => {
    void (async () => {
      try {
        setComponents(await runComponents(options, reporter));
      } catch (e: unknown) {
        resultRef.error = e;
        setError(e);
      }
    })();
    // eslint-disable-next-line react-hooks/exhaustive-deps -- run pipeline once on mount
  }, []);

  useEffect(() => {
    if (components || error) exit();
  }, [components, error, exit]);

  return (
    <Box flexDirection="column">
      <PipelineView steps={steps} />
      {components && components.length > 0 && (
        <ResultTable rows={components.map((c) => ({ ...c }))} columns={COLUMNS} />
      )}
      {error ? <ErrorDisplay error={error} /> : null}
    </Box>
  );
}

export async function runComponentsApp(options: ComponentsOptions): Promise<void> {
  const resultRef: ResultRef = {};
  await renderApp(<ComponentsInkApp options={options} resultRef={resultRef} />);
  if (resultRef.error) rethrow(resultRef.error);
}
