import type React from 'react';
import { render } from 'ink';

/**
 * Render an Ink element and resolve once it exits.
 * Components call `useApp().exit()` when their pipeline has finished.
 */
export async function renderApp(element: React.ReactElement): Promise<void> {
  const { waitUntilExit } = render(element);
  await waitUntilExit();
}

export function rethrow(error: unknown): never {
  if (error instanceof Error) throw error;
  throw new Error(String(error));
}
