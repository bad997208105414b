import { describe, it, expect } from 'vitest';
import {
  DIAGRAM_PREAMBLE,
  DIAGRAM_TERMINATOR,
  componentRef,
  emptyPackage,
  unwrapDiagram,
  wrapDiagram,
} from '../plantuml.js';
import {
  ALL_COMPONENTS_KEY,
  buildServiceLabels,
  diagramKey,
  serviceLabel,
  splitDiagramKey,
} from '../naming.js';
import { ArchplantError, ErrorCode } from '../../errors.js';
import { billingProject, createProject, ordersProject } from './fixtures/metadata.js';

describe('wrapDiagram', () => {
  it('starts with the preamble and ends with the terminator', () => {
    const diagram = wrapDiagram('package "a" {}\n');
    expect(diagram).toBe('@startuml\n skinparam componentStyle uml2\n\npackage "a" {}\n@enduml\n');
    expect(diagram.startsWith(DIAGRAM_PREAMBLE)).toBe(true);
    expect(diagram.endsWith(DIAGRAM_TERMINATOR)).toBe(true);
  });

  it('is undone by unwrapDiagram', () => {
    const body = '["x"] ..> ["y"] : use \n';
    expect(unwrapDiagram(wrapDiagram(body))).toBe(body);
    expect(unwrapDiagram(wrapDiagram(''))).toBe('');
  });

  it('leaves text without wrappers untouched', () => {
    expect(unwrapDiagram('package "a" {}\n')).toBe('package "a" {}\n');
  });
});

describe('plantuml fragments', () => {
  it('formats empty packages and component references', () => {
    expect(emptyPackage('Sales')).toBe('package "Sales" {}\n');
    expect(componentRef('com.shop.orders')).toBe('["com.shop.orders"]');
  });
});

describe('diagram keys', () => {
  it('builds per-unit keys with the text extension', () => {
    expect(diagramKey('orders', 'modules')).toBe('orders_plantUML_modules.txt');
    expect(diagramKey('orders', 'components')).toBe('orders_plantUML_components.txt');
  });

  it('splits a key on its last dot', () => {
    expect(splitDiagramKey('orders_plantUML_modules.txt')).toEqual({
      name: 'orders_plantUML_modules',
      extension: 'txt',
    });
    expect(splitDiagramKey(ALL_COMPONENTS_KEY)).toEqual({ name: 'all_components', extension: 'txt' });
    expect(splitDiagramKey('shop.orders_plantUML_modules.txt')).toEqual({
      name: 'shop.orders_plantUML_modules',
      extension: 'txt',
    });
  });

  it.each(['noextension', '.txt', 'name.'])('rejects malformed key %s', (key) => {
    expect(() => splitDiagramKey(key)).toThrow(ArchplantError);
    try {
      splitDiagramKey(key);
    } catch (error) {
      expect(error).toBeInstanceOf(ArchplantError);
      if (error instanceof ArchplantError) {
        expect(error.code).toBe(ErrorCode.INPUT_INVALID);
      }
    }
  });
});

describe('service labels', () => {
  it('labels by project name, falling back to the tag', () => {
    const unnamed = createProject({ tag: 'legacy', projectName: '' });
    const labels = buildServiceLabels([ordersProject, billingProject, unnamed]);

    expect(serviceLabel('orders', labels)).toBe('service: Order Service');
    expect(serviceLabel('billing', labels)).toBe('service: Billing Service');
    expect(serviceLabel('legacy', labels)).toBe('service: legacy');
    expect(serviceLabel('unknown', labels)).toBe('service: unknown');
  });
});
