import { Test, TestingModule } from '@nestjs/testing';
import { Logger } from '@nestjs/common';
import { mkdtemp, readFile, rm, stat, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { FetchError } from '@supplier-watch/extractor';
import type { AuthStatus, LoginConfig, ProductRule, SupplierConfig } from '@supplier-watch/shared';
import { RunService } from './run.service';
import { SupplierSessionService } from './supplier-session.service';
import { SnapshotState, StateStoreService } from './state-store.service';
import { NotifierService } from './notifier.service';
import { WorkerConfigService } from '../config/config.service';
import { SUPPLIER_CONFIG } from '../config/supplier-config';
import { sleep } from '../utils/sleep';

jest.mock('../utils/sleep');

const GARRAFA = 'https://shop.test/p/garrafa';
const CANECA = 'https://shop.test/p/caneca';
const PRATO = 'https://shop.test/p/prato';

function product(url: string, name: string): ProductRule {
  return {
    url,
    name,
    price: { selector: '.price' },
    stock: { selector: '.stock' },
  };
}

function page(price: string, stock = 'Em stock'): string {
  return `<html><body><h1>Produto</h1><span class="price">${price}</span><p class="stock">${stock}</p></body></html>`;
}

const baseLogin: LoginConfig = {
  loginPage: 'https://shop.test/conta/login',
  postUrl: 'https://shop.test/conta/login',
  userField: 'email',
  passField: 'password',
  successMarkers: ['minha conta'],
  failureMarkers: [],
  onUnconfirmed: 'continue',
};

describe('RunService', () => {
  let dir: string;
  let pages: Record<string, string>;
  let session: {
    ensureAuthenticated: jest.Mock<Promise<AuthStatus>, []>;
    fetchDocument: jest.Mock<Promise<string>, [string]>;
  };
  let notifier: { send: jest.Mock<Promise<void>, [string]> };
  let stateStore: StateStoreService;

  async function createService(products: ProductRule[], login: Partial<LoginConfig> = {}): Promise<RunService> {
    const supplier: SupplierConfig = {
      label: 'Loja',
      login: { ...baseLogin, ...login },
      products,
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RunService,
        StateStoreService,
        {
          provide: WorkerConfigService,
          useValue: { requestDelayMs: 250, statePath: join(dir, 'state.json') },
        },
        { provide: SUPPLIER_CONFIG, useValue: supplier },
        { provide: SupplierSessionService, useValue: session },
        { provide: NotifierService, useValue: notifier },
      ],
    }).compile();

    stateStore = module.get<StateStoreService>(StateStoreService);
    return module.get<RunService>(RunService);
  }

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'run-service-'));
    pages = {};
    session = {
      ensureAuthenticated: jest.fn<Promise<AuthStatus>, []>().mockResolvedValue('confirmed'),
      fetchDocument: jest.fn<Promise<string>, [string]>().mockImplementation(async (url) => {
        const html = pages[url];
        if (html === undefined) {
          throw new FetchError('HTTP 404', 'FETCH_HTTP_4XX', url, 404);
        }
        return html;
      }),
    };
    notifier = { send: jest.fn<Promise<void>, [string]>().mockResolvedValue(undefined) };
  });

  afterEach(async () => {
    jest.clearAllMocks();
    jest.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe('first and second run', () => {
    it('should report a new record, then a price change', async () => {
      const service = await createService([product(GARRAFA, 'Garrafa')]);

      pages[GARRAFA] = page('49,90 €');
      const first = await service.run();

      expect(first.outcomes).toEqual([
        {
          status: 'changed',
          product: product(GARRAFA, 'Garrafa'),
          snapshot: { url: GARRAFA, name: 'Garrafa', price: 49.9, rawPrice: '49,90 €', stock: 'Em stock' },
          events: [{ kind: 'new_record' }],
        },
      ]);
      expect(notifier.send).toHaveBeenLastCalledWith(
        `:bell: **Changes detected (Loja)**\n\n**[Garrafa]**\n${GARRAFA}\nChanges: new record`,
      );

      pages[GARRAFA] = page('54,90 €');
      const second = await service.run();

      expect(second.outcomes[0]).toMatchObject({
        status: 'changed',
        events: [{ kind: 'price_changed', previous: 49.9, current: 54.9 }],
      });
      expect(second.message).toBe(
        `:bell: **Changes detected (Loja)**\n\n**[Garrafa]**\n${GARRAFA}\nChanges: price: 49.90 → 54.90`,
      );

      const state = await stateStore.load();
      expect(state.get(GARRAFA)?.price).toBe(54.9);
      expect(state.get(GARRAFA)?.rawPrice).toBe('54,90 €');
    });

    it('should store a product without stock rule with a null stock', async () => {
      const rule: ProductRule = { url: GARRAFA, name: 'Garrafa', price: { selector: '.price' }, stock: {} };
      const service = await createService([rule]);
      pages[GARRAFA] = page('49,90 €');

      const report = await service.run();

      expect(report.outcomes[0]).toMatchObject({ status: 'changed', events: [{ kind: 'new_record' }] });
      expect(report.message).toContain('**[Garrafa]**');
      expect(report.message).toContain('Changes: new record');

      const state = await stateStore.load();
      expect(state.size).toBe(1);
      expect(state.get(GARRAFA)).toEqual({
        url: GARRAFA,
        name: 'Garrafa',
        price: 49.9,
        rawPrice: '49,90 €',
        stock: null,
      });
    });

    it('should report no changes when nothing moved', async () => {
      const service = await createService([product(GARRAFA, 'Garrafa')]);
      pages[GARRAFA] = page('49,90 €');

      await service.run();
      const second = await service.run();

      expect(second.outcomes).toEqual([
        {
          status: 'unchanged',
          product: product(GARRAFA, 'Garrafa'),
          snapshot: { url: GARRAFA, name: 'Garrafa', price: 49.9, rawPrice: '49,90 €', stock: 'Em stock' },
        },
      ]);
      expect(notifier.send).toHaveBeenLastCalledWith(':white_check_mark: No price/stock changes (Loja).');
    });
  });

  describe('product failures', () => {
    it('should report a failing product and continue with the next one', async () => {
      const service = await createService([product(GARRAFA, 'Garrafa'), product(CANECA, 'Caneca')]);
      pages[CANECA] = page('7,50 €');

      const report = await service.run();

      expect(report.outcomes.map((outcome) => outcome.status)).toEqual(['failed', 'changed']);
      expect(report.outcomes[0]).toEqual({
        status: 'failed',
        product: product(GARRAFA, 'Garrafa'),
        error: 'HTTP 404',
        errorCode: 'FETCH_HTTP_4XX',
      });
      expect(report.message).toBe(
        ':bell: **Changes detected (Loja)**\n\n' +
          ':x: Failed to read Garrafa: Client Error (HTTP 404)\n\n' +
          `**[Caneca]**\n${CANECA}\nChanges: new record`,
      );

      const state = await stateStore.load();
      expect(state.get(GARRAFA)).toBeUndefined();
      expect(state.get(CANECA)?.price).toBe(7.5);
    });

    it('should report errors that carry no code with their message only', async () => {
      const service = await createService([product(GARRAFA, 'Garrafa')]);
      session.fetchDocument.mockRejectedValueOnce(new Error('socket hang up'));

      const report = await service.run();

      expect(report.outcomes[0]).toMatchObject({ status: 'failed', error: 'socket hang up', errorCode: null });
      expect(report.message).toBe(
        ':bell: **Changes detected (Loja)**\n\n:x: Failed to read Garrafa: socket hang up',
      );
    });

    it('should keep the previous snapshot of a product that failed', async () => {
      const service = await createService([product(GARRAFA, 'Garrafa')]);
      pages[GARRAFA] = page('49,90 €');
      await service.run();

      delete pages[GARRAFA];
      await service.run();

      const state = await stateStore.load();
      expect(state.get(GARRAFA)?.price).toBe(49.9);
    });
  });

  describe('state', () => {
    it('should overwrite the stored snapshot even when fields disappear', async () => {
      const service = await createService([product(GARRAFA, 'Garrafa')]);
      pages[GARRAFA] = page('49,90 €');
      await service.run();

      pages[GARRAFA] = '<html><body><h1>Produto</h1></body></html>';
      const report = await service.run();

      expect(report.message).toBe(
        `:bell: **Changes detected (Loja)**\n\n**[Garrafa]**\n${GARRAFA}\nChanges: price: 49.90 → n/a; stock: Em stock → n/a`,
      );

      const state = await stateStore.load();
      expect(state.get(GARRAFA)).toEqual({ url: GARRAFA, name: 'Garrafa', price: null, rawPrice: null, stock: null });
    });

    it('should keep entries of products no longer configured', async () => {
      const service = await createService([product(GARRAFA, 'Garrafa')]);
      await stateStore.save(
        new SnapshotState([
          [PRATO, { url: PRATO, name: 'Prato', price: 3, rawPrice: '3,00 €', stock: 'Esgotado' }],
        ]),
      );
      pages[GARRAFA] = page('49,90 €');

      await service.run();

      const state = await stateStore.load();
      expect(state.size).toBe(2);
      expect(state.get(PRATO)?.stock).toBe('Esgotado');
    });

    it('should save an empty state when no product is configured', async () => {
      const service = await createService([]);

      const report = await service.run();

      expect(report.outcomes).toEqual([]);
      expect(report.message).toBe(':white_check_mark: No price/stock changes (Loja).');
      expect((await stat(join(dir, 'state.json'))).isFile()).toBe(true);
    });
  });

  describe('state file problems', () => {
    it('should run with an entry that only has a url', async () => {
      const service = await createService([product(GARRAFA, 'Garrafa')]);
      await writeFile(join(dir, 'state.json'), JSON.stringify({ [PRATO]: { url: PRATO } }));
      pages[GARRAFA] = page('49,90 €');

      const report = await service.run();

      expect(report.outcomes.map((outcome) => outcome.status)).toEqual(['changed']);
      expect(notifier.send).toHaveBeenCalledTimes(1);
      expect((await stateStore.load()).get(PRATO)?.name).toBe(PRATO);
    });

    it('should notify and stop when the state file cannot be read', async () => {
      const service = await createService([product(GARRAFA, 'Garrafa')]);
      await writeFile(join(dir, 'state.json'), 'not json');

      const report = await service.run();

      expect(report.outcomes).toEqual([]);
      expect(session.fetchDocument).not.toHaveBeenCalled();
      expect(notifier.send).toHaveBeenCalledTimes(1);
      expect(report.message).toMatch(/^:x: Could not load the state file \(Loja\): State file .*state\.json is not valid JSON/);
      expect(await readFile(join(dir, 'state.json'), 'utf-8')).toBe('not json');
    });

    it('should still notify when the state file cannot be saved', async () => {
      const service = await createService([product(GARRAFA, 'Garrafa')]);
      jest.spyOn(stateStore, 'save').mockRejectedValueOnce(new Error('EACCES: permission denied'));
      pages[GARRAFA] = page('49,90 €');

      const report = await service.run();

      expect(report.message).toBe(
        `:bell: **Changes detected (Loja)**\n\n**[Garrafa]**\n${GARRAFA}\nChanges: new record\n\n` +
          ':x: Could not save the state file (Loja): EACCES: permission denied',
      );
      expect(notifier.send).toHaveBeenCalledWith(report.message);
    });
  });

  describe('pacing', () => {
    it('should wait between fetches but not before the first one', async () => {
      const service = await createService([
        product(GARRAFA, 'Garrafa'),
        product(CANECA, 'Caneca'),
        product(PRATO, 'Prato'),
      ]);

      await service.run();

      expect(session.fetchDocument.mock.calls.map(([url]) => url)).toEqual([GARRAFA, CANECA, PRATO]);
      expect(jest.mocked(sleep)).toHaveBeenCalledTimes(2);
      expect(jest.mocked(sleep)).toHaveBeenCalledWith(250);
    });
  });

  describe('login', () => {
    it('should stop and notify when login fails', async () => {
      const service = await createService([product(GARRAFA, 'Garrafa')]);
      session.ensureAuthenticated.mockResolvedValue('failed');

      const report = await service.run();

      expect(report).toEqual({
        auth: 'failed',
        outcomes: [],
        message: ':warning: Login to supplier (Loja) failed. Check credentials.',
      });
      expect(session.fetchDocument).not.toHaveBeenCalled();
      expect(notifier.send).toHaveBeenCalledWith(':warning: Login to supplier (Loja) failed. Check credentials.');
      await expect(stat(join(dir, 'state.json'))).rejects.toThrow(/ENOENT/);
    });

    it('should continue when login is unconfirmed by default', async () => {
      const service = await createService([product(GARRAFA, 'Garrafa')]);
      session.ensureAuthenticated.mockResolvedValue('unconfirmed');
      pages[GARRAFA] = page('49,90 €');

      const report = await service.run();

      expect(report.auth).toBe('unconfirmed');
      expect(report.outcomes).toHaveLength(1);
      expect(session.fetchDocument).toHaveBeenCalledWith(GARRAFA);
    });

    it('should abort on an unconfirmed login when configured to', async () => {
      const service = await createService([product(GARRAFA, 'Garrafa')], { onUnconfirmed: 'abort' });
      session.ensureAuthenticated.mockResolvedValue('unconfirmed');

      const report = await service.run();

      expect(report.outcomes).toEqual([]);
      expect(session.fetchDocument).not.toHaveBeenCalled();
      expect(notifier.send).toHaveBeenCalledWith(':warning: Login to supplier (Loja) failed. Check credentials.');
    });
  });

  it('should send exactly one notification per run', async () => {
    const service = await createService([product(GARRAFA, 'Garrafa'), product(CANECA, 'Caneca')]);
    pages[GARRAFA] = page('49,90 €');
    pages[CANECA] = page('7,50 €', 'Esgotado');

    await service.run();

    expect(notifier.send).toHaveBeenCalledTimes(1);
  });
});
