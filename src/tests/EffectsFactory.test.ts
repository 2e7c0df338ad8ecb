/**
 * TESTS FOR PRODUCTION EFFECTS
 *
 * The HTTP clients run against an axios adapter that answers in process.
 */

import axios, {AxiosAdapter, InternalAxiosRequestConfig} from 'axios';
import {
  AxiosPricingService,
  AxiosProductCatalog,
  ConsoleReceiptPresenter,
  loadConfigFromEnv,
  makeCheckoutEffects,
} from '../effects/EffectsFactory';
import {formatReceipt} from '../pure/businessLogic';
import {Receipt} from '../domain';
import {coffee, greenTea, storeRuleDefinitions} from './fixtures';

function respondWith(data: unknown, seen: InternalAxiosRequestConfig[] = []): AxiosAdapter {
  return async (config) => {
    seen.push(config);
    return {data, status: 200, statusText: 'OK', headers: {}, config};
  };
}

const failing: AxiosAdapter = async () => {
  throw new Error('connect ECONNREFUSED');
};

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('loadConfigFromEnv', () => {
  it('falls back to local defaults', () => {
    expect(loadConfigFromEnv({})).toEqual({
      catalog: {baseUrl: 'http://localhost:8080', timeoutMs: 5000},
      pricing: {baseUrl: 'http://localhost:8081', timeoutMs: 5000},
      receipts: {currency: '£'},
    });
  });

  it('reads service locations from the environment', () => {
    const config = loadConfigFromEnv({
      CATALOG_API_URL: 'http://catalog.test',
      PRICING_API_URL: 'http://pricing.test',
      HTTP_TIMEOUT_MS: '250',
      RECEIPT_CURRENCY: '€',
    });

    expect(config.catalog).toEqual({baseUrl: 'http://catalog.test', timeoutMs: 250});
    expect(config.pricing).toEqual({baseUrl: 'http://pricing.test', timeoutMs: 250});
    expect(config.receipts.currency).toBe('€');
  });
});

describe('AxiosProductCatalog', () => {
  it('requests the codes and keys products by code', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const catalog = new AxiosProductCatalog(axios.create({adapter: respondWith([greenTea, coffee], seen)}));

    const products = await catalog.getByCodes(['GR1', 'CF1']);

    expect(products).toEqual(new Map([['GR1', greenTea], ['CF1', coffee]]));
    expect(seen).toHaveLength(1);
    expect(seen[0].url).toBe('/api/products');
    expect(seen[0].params).toEqual({codes: 'GR1,CF1'});
  });

  it('skips the request for no codes', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const catalog = new AxiosProductCatalog(axios.create({adapter: respondWith([], seen)}));

    expect(await catalog.getByCodes([])).toEqual(new Map());
    expect(seen).toHaveLength(0);
  });

  it('rejects products whose price is not an integer amount', async () => {
    const catalog = new AxiosProductCatalog(axios.create({
      adapter: respondWith([{code: 'GR1', name: 'Green tea', price: '311'}]),
    }));

    await expect(catalog.getByCodes(['GR1'])).rejects.toThrow('Catalog service returned invalid products');
    expect(console.error).toHaveBeenCalled();
  });

  it('reports the catalog as unavailable on failure', async () => {
    const catalog = new AxiosProductCatalog(axios.create({adapter: failing}));

    await expect(catalog.getByCodes(['GR1'])).rejects.toThrow('Catalog service unavailable');
    expect(console.error).toHaveBeenCalled();
  });
});

describe('AxiosPricingService', () => {
  it('returns the raw rule definitions', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const pricing = new AxiosPricingService(axios.create({adapter: respondWith(storeRuleDefinitions, seen)}));

    expect(await pricing.getRuleDefinitions()).toEqual(storeRuleDefinitions);
    expect(seen[0].url).toBe('/api/rules');
  });

  it('reports pricing as unavailable on failure', async () => {
    const pricing = new AxiosPricingService(axios.create({adapter: failing}));

    await expect(pricing.getRuleDefinitions()).rejects.toThrow('Pricing service unavailable');
  });
});

describe('ConsoleReceiptPresenter', () => {
  it('prints the formatted receipt', async () => {
    const receipt: Receipt = {
      lines: [{name: 'Coffee', amount: 1123}],
      subtotal: 1123,
      discount: 0,
      total: 1123,
    };

    await new ConsoleReceiptPresenter({currency: '€'}).present(receipt);

    expect(console.log).toHaveBeenCalledWith(formatReceipt(receipt, '€'));
  });
});

describe('makeCheckoutEffects', () => {
  it('builds every effect from the configuration', () => {
    const effects = makeCheckoutEffects(loadConfigFromEnv({}));

    expect(effects.catalog).toBeInstanceOf(AxiosProductCatalog);
    expect(effects.pricing).toBeInstanceOf(AxiosPricingService);
    expect(effects.receipts).toBeInstanceOf(ConsoleReceiptPresenter);
    expect(effects.catalog).toBe(effects.catalog);
  });
});
