import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { writeDiagramFile, writeDiagramMap } from '../diagram-writer.js';
import { wrapDiagram } from '../../diagram/plantuml.js';
import { createModuleDiagram } from '../../diagram/module-diagram.js';
import { createProject } from '../../diagram/__tests__/fixtures/metadata.js';
import { ErrorCode } from '../../errors.js';

describe('diagram-writer', () => {
  let target: string;

  beforeEach(async () => {
    target = await mkdtemp(join(tmpdir(), 'archplant-out-'));
  });

  afterEach(async () => {
    await rm(target, { recursive: true, force: true });
  });

  it('writes into a sub-folder named after the extension', async () => {
    const files = await writeDiagramFile('body', 'systems', 'txt', target);

    expect(files).toEqual([join(target, 'txt', 'systems.txt')]);
    expect(await readFile(join(target, 'txt', 'systems.txt'), 'utf-8')).toBe('body');
  });

  it('overwrites an existing file', async () => {
    await writeDiagramFile('old', 'services', 'txt', target);
    await writeDiagramFile('new', 'services', 'txt', target);
    expect(await readFile(join(target, 'txt', 'services.txt'), 'utf-8')).toBe('new');
  });

  it('writes every map entry in order', async () => {
    const diagrams = new Map([
      ['orders_plantUML_modules.txt', wrapDiagram('package "Orders API" {}\n')],
      ['systems.txt', wrapDiagram('')],
    ]);

    const files = await writeDiagramMap(diagrams, target);

    expect(files).toEqual([
      join(target, 'txt', 'orders_plantUML_modules.txt'),
      join(target, 'txt', 'systems.txt'),
    ]);
    expect(await readFile(files[0] ?? '', 'utf-8')).toBe(
      diagrams.get('orders_plantUML_modules.txt')
    );
  });

  it('keeps units with dotted tags apart', async () => {
    const diagrams = createModuleDiagram([
      createProject({ tag: 'shop.orders', moduleDependencies: {} }),
      createProject({ tag: 'shop.billing', moduleDependencies: {} }),
    ]);

    const files = await writeDiagramMap(diagrams, target);

    expect(files).toEqual([
      join(target, 'txt', 'shop.orders_plantUML_modules.txt'),
      join(target, 'txt', 'shop.billing_plantUML_modules.txt'),
      join(target, 'txt', 'all_modules.txt'),
    ]);
  });

  it('rejects keys without an extension', async () => {
    await expect(writeDiagramMap(new Map([['systems', '']]), target)).rejects.toMatchObject({
      code: ErrorCode.INPUT_INVALID,
    });
  });

  it('fails with IO_WRITE_FAILED when the target is a file', async () => {
    const blocker = join(target, 'blocker');
    await writeFile(blocker, '');

    await expect(writeDiagramFile('body', 'systems', 'txt', blocker)).rejects.toMatchObject({
      code: ErrorCode.IO_WRITE_FAILED,
    });
  });
});
