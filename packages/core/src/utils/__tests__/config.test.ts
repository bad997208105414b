import { describe, it, expect } from 'vitest';
import { createConfig, loadConfigFromEnv } from '../config.js';
import { ConfigurationError, ErrorCode } from '../../errors.js';

describe('loadConfigFromEnv', () => {
  it('maps environment variables onto nested config paths', () => {
    const raw = loadConfigFromEnv({
      MAVEN_METADATA_SUFFIX: 'units.json',
      PLANTUML_TIMEOUT: '5000',
      METADATA_EXCLUDE_PATHS: 'build/**, ,target/**',
    });

    expect(raw).toEqual({
      metadata: { mavenSuffix: 'units.json', excludePaths: ['build/**', 'target/**'] },
      diagram: {},
      plantuml: { timeout: 5000 },
    });
  });

  it('skips empty values', () => {
    expect(loadConfigFromEnv({ PLANTUML_JAR: '', PLANTUML_PATH: '' })).toEqual({
      metadata: {},
      diagram: {},
      plantuml: {},
    });
  });
});

describe('createConfig', () => {
  it('fills defaults for an empty environment', () => {
    const config = createConfig({});

    expect(config.metadata).toEqual({
      mavenSuffix: 'maven-collected.json',
      apiSuffix: 'api-collected.json',
      excludePaths: ['**/node_modules/**'],
    });
    expect(config.diagram.defaultExternalService).toBe('DEFAULT_SERVICE');
    expect(config.plantuml).toEqual({ executable: 'plantuml', timeout: 60000 });
  });

  it('reads the PlantUML location', () => {
    const config = createConfig({ PLANTUML_PATH: '/opt/plantuml/bin/plantuml', PLANTUML_JAR: 'plantuml.jar' });
    expect(config.plantuml.executable).toBe('/opt/plantuml/bin/plantuml');
    expect(config.plantuml.jarPath).toBe('plantuml.jar');
  });

  it('reads the default external service marker', () => {
    expect(createConfig({ DEFAULT_EXTERNAL_SERVICE: 'UNKNOWN' }).diagram.defaultExternalService).toBe(
      'UNKNOWN'
    );
  });

  it('rejects an out-of-range timeout', () => {
    expect(() => createConfig({ PLANTUML_TIMEOUT: '10' })).toThrow(ConfigurationError);
  });

  it('rejects a non-numeric timeout with a config error', () => {
    try {
      createConfig({ PLANTUML_TIMEOUT: 'soon' });
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.code).toBe(ErrorCode.CONFIG_INVALID);
        expect(error.message).toMatch(/^Config validation failed: 1\. plantuml\.timeout: /);
      }
    }
  });
});
