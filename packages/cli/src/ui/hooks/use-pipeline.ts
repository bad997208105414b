import { useMemo, useReducer } from 'react';
import type { ProgressReporter } from '@archplant/core';

export type StepStatus = 'running' | 'success' | 'fail' | 'warn' | 'info' | 'section';

export interface PipelineStep {
  id: number;
  message: string;
  status: StepStatus;
}

type StepAction =
  | { type: 'add'; message: string; status: StepStatus }
  | { type: 'finish'; message: string; status: StepStatus };

export function stepsReducer(steps: PipelineStep[], action: StepAction): PipelineStep[] {
  if (action.type === 'add') {
    return [...steps, { id: steps.length, message: action.message, status: action.status }];
  }
  const idx = steps.findLastIndex((s) => s.status === 'running');
  if (idx === -1) {
    return [...steps, { id: steps.length, message: action.message, status: action.status }];
  }
  return steps.map((s, i) => (i === idx ? { ...s, message: action.message, status: action.status } : s));
}

/**
 * Keeps the list of pipeline steps and exposes it as a ProgressReporter.
 * `succeed`/`fail` close the last running step; without one they append.
 */
export function usePipeline(): { steps: PipelineStep[]; reporter: ProgressReporter } {
  const [steps, dispatch] = useReducer(stepsReducer, []);

  const reporter: ProgressReporter = useMemo(
    () => ({
      section: (title) => dispatch({ type: 'add', message: title, status: 'section' }),
      start: (message) => dispatch({ type: 'add', message, status: 'running' }),
      succeed: (message) => dispatch({ type: 'finish', message, status: 'success' }),
      fail: (message) => dispatch({ type: 'finish', message, status: 'fail' }),
      warn: (message) => dispatch({ type: 'add', message, status: 'warn' }),
      info: (message) => dispatch({ type: 'add', message, status: 'info' }),
    }),
    []
  );

  return { steps, reporter };
}
