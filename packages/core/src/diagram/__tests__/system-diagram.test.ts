import { describe, it, expect } from 'vitest';
import { createSystemDiagram, groupSubsystems } from '../system-diagram.js';
import { wrapDiagram } from '../plantuml.js';
import { billingProject, createProject, ordersProject } from './fixtures/metadata.js';

const opsProject = createProject({ tag: 'monitor', system: 'Ops', subsystem: 'Infra' });
const ordersCopy = createProject({ tag: 'orders-worker' });

describe('groupSubsystems', () => {
  it('groups distinct subsystems per system in first-seen order', () => {
    const systems = groupSubsystems([ordersProject, opsProject, billingProject, ordersCopy]);

    expect([...systems.keys()]).toEqual(['Shop', 'Ops']);
    expect([...(systems.get('Shop') ?? [])]).toEqual(['Sales', 'Finance']);
    expect([...(systems.get('Ops') ?? [])]).toEqual(['Infra']);
  });
});

describe('createSystemDiagram', () => {
  it('nests each subsystem once inside its system', () => {
    const diagrams = createSystemDiagram([ordersProject, billingProject, ordersCopy, opsProject]);

    expect([...diagrams.keys()]).toEqual(['systems.txt']);
    expect(diagrams.get('systems.txt')).toBe(
      wrapDiagram(
        'package "Shop" {\n' +
          'package "Sales" {}\n' +
          'package "Finance" {}\n' +
          '}\n\n' +
          'package "Ops" {\n' +
          'package "Infra" {}\n' +
          '}\n\n'
      )
    );
  });

  it('produces an empty diagram without metadata', () => {
    expect(createSystemDiagram([]).get('systems.txt')).toBe(wrapDiagram(''));
  });
});
