import type { ProgressReporter } from './progress.js';
import { SilentProgress } from './progress.js';
import { collectMetadata } from '../metadata/metadata-reader.js';
import { connectServices } from '../connectors/service-connector.js';
import { resolveComponentCallEdges } from '../diagram/dependency-resolver.js';
import { serviceDisplayName } from '../diagram/naming.js';
import { CONFIG } from '../utils/config.js';

export interface ComponentsOptions {
  sourceFolders: string[];
}

export interface ComponentSummary {
  packageName: string;
  service: string;
  module: string;
  uses: string[];
  calls: string[];
}

export async function runComponents(
  options: ComponentsOptions,
  progress?: ProgressReporter
): Promise<ComponentSummary[]> {
  const p = progress ?? new SilentProgress();

  p.section('Reading Collected Metadata');
  p.start('Searching metadata files');
  const { projects, apis } = await collectMetadata(options.sourceFolders, CONFIG.metadata);
  p.succeed(`Found ${String(projects.length)} project record(s)`);

  const dependencies =
    apis.length > 0
      ? connectServices(apis, { defaultExternalService: CONFIG.diagram.defaultExternalService })
      : [];

  const callsByComponent = new Map<string, string[]>();
  for (const edge of resolveComponentCallEdges(projects, dependencies)) {
    const calls = callsByComponent.get(edge.caller) ?? [];
    calls.push(edge.callee);
    callsByComponent.set(edge.caller, calls);
  }

  const summaries: ComponentSummary[] = projects.flatMap((project) =>
    project.components.flatMap((module) =>
      module.components.map((component) => ({
        packageName: component.packageName,
        service: serviceDisplayName(project),
        module: module.moduleName,
        uses: [...component.dependsOn],
        calls: callsByComponent.get(component.packageName) ?? [],
      }))
    )
  );

  if (summaries.length === 0) {
    p.warn('No components found in the collected metadata');
  } else {
    p.info(`Found ${String(summaries.length)} component(s)`);
  }

  return summaries;
}
