import React from 'react';
import { Box, Static, Text } from 'ink';
import Spinner from 'ink-spinner';
import type { PipelineStep, StepStatus } from '../hooks/use-pipeline.js';

type FinishedStatus = Exclude<StepStatus, 'running' | 'section'>;

const STYLE: Record<FinishedStatus, { icon: string; color: string }> = {
  success: { icon: '✓', color: 'green' },
  fail: { icon: '✗', color: 'red' },
  warn: { icon: '⚠', color: 'yellow' },
  info: { icon: 'ℹ', color: 'blue' },
};

function StepLine({ step }: { step: PipelineStep }): React.ReactElement {
  const status = step.status;
  switch (status) {
    case 'section':
      return <Text bold color="cyan">{`\n── ${step.message} ──`}</Text>;
    case 'running':
      return (
        <Box>
          <Text color="cyan">
            <Spinner type="dots" />
          </Text>
          <Text color="cyan"> {step.message}</Text>
        </Box>
      );
    default: {
      const { icon, color } = STYLE[status];
      return (
        <Text color={color}>
          {icon} {step.message}
        </Text>
      );
    }
  }
}

/** Finished steps go to Ink's <Static> output; the running step stays live with a spinner. */
export function PipelineView({ steps }: { steps: PipelineStep[] }): React.ReactElement {
  const finished = steps.filter((s) => s.status !== 'running');
  const running = steps.find((s) => s.status === 'running');

  return (
    <Box flexDirection="column">
      <Static items={finished}>{(step) => <StepLine key={step.id} step={step} />}</Static>
      {running ? <StepLine step={running} /> : null}
    </Box>
  );
}
