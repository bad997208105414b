import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { runGenerate } from '../generate.js';
import { SilentProgress } from '../progress.js';
import { ErrorCode } from '../../errors.js';

vi.mock('../../output/plantuml-renderer.js', () => ({
  renderDiagramsToSvg: vi.fn(),
  writeSvgFiles: vi.fn(),
}));

const ordersProject = {
  tag: 'orders',
  projectName: 'Order Service',
  system: 'Shop',
  subsystem: 'Sales',
  moduleDependencies: { 'orders-api': [] },
  modules: [{ tag: 'orders-api', moduleName: 'Orders API' }],
  components: [
    { moduleName: 'Orders API', components: [{ packageName: 'com.shop.orders', dependsOn: [] }] },
  ],
};

const ordersApi = {
  tag: 'orders',
  serviceName: 'Order Service',
  consumedApis: [
    {
      packageName: 'com.shop.orders.BillingClient',
      service: 'Billing Service',
      method: 'POST',
      path: '/invoices',
    },
  ],
};

const billingProject = {
  tag: 'billing',
  projectName: 'Billing Service',
  system: 'Shop',
  subsystem: 'Finance',
  components: [
    { moduleName: 'Billing App', components: [{ packageName: 'com.shop.billing', dependsOn: [] }] },
  ],
};

const billingApi = {
  tag: 'billing',
  serviceName: 'Billing Service',
  providedApis: [
    { packageName: 'com.shop.billing.InvoiceController', method: 'POST', path: '/invoices' },
  ],
};

describe('runGenerate', () => {
  let root: string;
  let source: string;

  async function put(relativePath: string, content: unknown): Promise<void> {
    const filePath = join(source, relativePath);
    await mkdir(join(filePath, '..'), { recursive: true });
    await writeFile(filePath, JSON.stringify(content));
  }

  beforeEach(async () => {
    vi.clearAllMocks();
    root = await mkdtemp(join(tmpdir(), 'archplant-generate-'));
    source = join(root, 'collected');
    await mkdir(source);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function putShop(): Promise<void> {
    await put('orders/orders-maven-collected.json', ordersProject);
    await put('orders/orders-api-collected.json', ordersApi);
    await put('billing/billing-maven-collected.json', billingProject);
    await put('billing/billing-api-collected.json', billingApi);
  }

  it('requires at least one source folder', async () => {
    await expect(runGenerate({ sourceFolders: [] })).rejects.toMatchObject({
      code: ErrorCode.INPUT_INVALID,
    });
  });

  it('returns every diagram in memory without a target folder', async () => {
    await putShop();

    const result = await runGenerate({ sourceFolders: [source] });

    expect(result.files).toEqual([]);
    expect(result.dependencyCount).toBe(1);
    expect([...result.diagrams.keys()]).toEqual([
      'orders_plantUML_modules.txt',
      'all_modules.txt',
      'orders_plantUML_components.txt',
      'all_components.txt',
      'systems.txt',
      'services.txt',
    ]);
    expect(result.diagrams.get('services.txt')).toContain(
      '"Order Service"-->"Billing Service" : "POST : /invoices"\n'
    );
    expect(result.diagrams.get('all_components.txt')).toContain(
      '["com.shop.orders"] ..> ["com.shop.billing"] : call \n'
    );
  });

  it('writes diagram text below the target folder', async () => {
    await putShop();
    const target = join(root, 'out');

    const result = await runGenerate({ sourceFolders: [source], targetFolder: target });

    expect(result.files).toHaveLength(result.diagrams.size);
    expect(result.files).toContain(join(target, 'txt', 'systems.txt'));
    expect(await readFile(join(target, 'txt', 'systems.txt'), 'utf-8')).toBe(
      result.diagrams.get('systems.txt')
    );
  });

  it('warns when no project metadata is found', async () => {
    const reporter = new SilentProgress();
    const warn = vi.spyOn(reporter, 'warn');

    const result = await runGenerate({ sourceFolders: [source] }, reporter);

    expect(warn).toHaveBeenCalledWith('No files ending in maven-collected.json found');
    expect(result.dependencyCount).toBe(0);
    expect(result.diagrams.has('systems.txt')).toBe(true);
  });

  it('adds rendered SVG to the in-memory result when visualizing', async () => {
    const { renderDiagramsToSvg } = await import('../../output/plantuml-renderer.js');
    vi.mocked(renderDiagramsToSvg).mockResolvedValue(new Map([['systems.svg', '<svg/>']]));
    await putShop();

    const result = await runGenerate({ sourceFolders: [source], visualize: true });

    expect(renderDiagramsToSvg).toHaveBeenCalledTimes(1);
    expect(result.diagrams.get('systems.svg')).toBe('<svg/>');
  });

  it('writes SVG files next to the text when visualizing into a target', async () => {
    const { writeSvgFiles } = await import('../../output/plantuml-renderer.js');
    const target = join(root, 'out');
    vi.mocked(writeSvgFiles).mockResolvedValue([join(target, 'svg', 'systems.svg')]);
    await putShop();

    const result = await runGenerate({ sourceFolders: [source], targetFolder: target, visualize: true });

    expect(writeSvgFiles).toHaveBeenCalledWith(result.diagrams, target);
    expect(result.files.at(-1)).toBe(join(target, 'svg', 'systems.svg'));
  });
});
