export interface ModuleInfo {
  tag: string;
  moduleName: string;
}

export interface ComponentInfo {
  packageName: string;
  dependsOn: string[];
}

export interface ModuleComponents {
  moduleName: string;
  components: ComponentInfo[];
}

/**
 * One collected build unit. `moduleDependencies` is `undefined` or `null` when
 * the collector had no module data, which is different from an empty mapping.
 */
export interface ProjectMetadata {
  tag: string;
  projectName?: string;
  system: string;
  subsystem: string;
  moduleDependencies?: Record<string, string[]> | null;
  modules: ModuleInfo[];
  components: ModuleComponents[];
}

export interface ProvidedApi {
  packageName: string;
  method: string;
  path: string;
}

export interface ConsumedApi {
  packageName: string;
  /** Name of the providing service, or the default external-service marker. */
  service?: string;
  method: string;
  path: string;
}

export interface ApiMetadata {
  tag: string;
  serviceName: string;
  providedApis: ProvidedApi[];
  consumedApis: ConsumedApi[];
}

export interface CallDependency {
  servicePackage: string;
  /** Absent when the callee lies outside the collected services. */
  dependsOnPackage?: string;
  service: string;
  dependsOn: string;
  method: string;
  path: string;
}

/** Ordered mapping from output key (e.g. `systems.txt`) to diagram text. */
export type DiagramMap = Map<string, string>;
