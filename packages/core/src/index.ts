// Metadata
export type {
  ProjectMetadata,
  ModuleInfo,
  ModuleComponents,
  ComponentInfo,
  ApiMetadata,
  ProvidedApi,
  ConsumedApi,
  CallDependency,
  DiagramMap,
} from './metadata/metadata-types.js';
export {
  collectMetadata,
  findMetadataFiles,
  readMetadataFiles,
} from './metadata/metadata-reader.js';
export type { CollectedMetadata, CollectMetadataOptions } from './metadata/metadata-reader.js';

// Schemas
export { ProjectMetadataSchema, ApiMetadataSchema } from './schemas/metadata.schema.js';

// Diagram builders (pure)
export {
  EXTERN_COMPONENT,
  listKnownComponents,
  resolveOwningComponent,
  resolveComponentCallEdges,
} from './diagram/dependency-resolver.js';
export type { ComponentCallEdge } from './diagram/dependency-resolver.js';
export { createModuleDiagram } from './diagram/module-diagram.js';
export { createComponentDiagram } from './diagram/component-diagram.js';
export { createSystemDiagram } from './diagram/system-diagram.js';
export { createServiceDiagram } from './diagram/service-diagram.js';
export type { ServiceDiagramOptions } from './diagram/service-diagram.js';
export { generateDiagrams } from './diagram/diagram-generator.js';
export type { GenerateDiagramsOptions } from './diagram/diagram-generator.js';
export {
  DIAGRAM_PREAMBLE,
  DIAGRAM_TERMINATOR,
  wrapDiagram,
  unwrapDiagram,
} from './diagram/plantuml.js';
export {
  diagramKey,
  splitDiagramKey,
  ALL_MODULES_KEY,
  ALL_COMPONENTS_KEY,
  SYSTEMS_KEY,
  SERVICES_KEY,
  EXTERNAL_SERVICE,
  DEFAULT_EXTERNAL_SERVICE,
} from './diagram/naming.js';

// Service connector
export { connectServices } from './connectors/service-connector.js';

// Output
export { writeDiagramFile, writeDiagramMap } from './output/diagram-writer.js';
export { renderSvg, renderDiagramsToSvg, writeSvgFiles } from './output/plantuml-renderer.js';

// Pipelines
export { runGenerate } from './pipelines/generate.js';
export type { GenerateOptions, GenerateResult } from './pipelines/generate.js';
export { runComponents } from './pipelines/components.js';
export type { ComponentsOptions, ComponentSummary } from './pipelines/components.js';
export type { ProgressReporter } from './pipelines/progress.js';
export { SilentProgress } from './pipelines/progress.js';

// Config
export { CONFIG } from './utils/config.js';

// Errors
export { ArchplantError, ConfigurationError, RenderError, ErrorCode } from './errors.js';

// Validation
export { validate, validateSourceFolder } from './utils/validation.js';
