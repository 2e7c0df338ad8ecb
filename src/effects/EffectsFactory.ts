/**
 * PRODUCTION EFFECTS IMPLEMENTATION
 *
 * The real implementations behind the checkout's effect interfaces:
 * - a product catalog HTTP API for price lookup
 * - a pricing HTTP API serving the current rule definitions
 * - the console, for printing receipts
 */
import {Product, ProductCode, Receipt} from '../domain';
import {CheckoutEffects, PricingService, ProductCatalog, ReceiptPresenter} from '../pure/effects';
import {decodeProducts, formatReceipt} from '../pure/businessLogic';
import {HttpServiceConfig, ProductionConfig, ReceiptConfig} from './types';
import axios, {AxiosInstance} from 'axios';

// Load configuration from environment variables
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ProductionConfig {
  const timeoutMs = parseInt(env.HTTP_TIMEOUT_MS || '5000', 10);
  return {
    catalog: {
      baseUrl: env.CATALOG_API_URL || 'http://localhost:8080',
      timeoutMs,
    },
    pricing: {
      baseUrl: env.PRICING_API_URL || 'http://localhost:8081',
      timeoutMs,
    },
    receipts: {
      currency: env.RECEIPT_CURRENCY || '£',
    },
  };
}

function createHttpClient(config: HttpServiceConfig): AxiosInstance {
  return axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
  });
}

// ============================================================================
// Axios Product Catalog
// ============================================================================

export class AxiosProductCatalog implements ProductCatalog {
  constructor(private client: AxiosInstance) {}

  async getByCodes(codes: ProductCode[]): Promise<Map<ProductCode, Product>> {
    if (codes.length === 0) {
      return new Map();
    }

    const payload = await this.fetchProducts(codes);
    return decodeProducts(payload).caseOf({
      Left: (error) => {
        console.error('Catalog returned invalid products:', error);
        throw new Error(`Catalog service returned invalid products: ${error}`);
      },
      Right: (products) => new Map(products.map((product): [ProductCode, Product] => [product.code, product])),
    });
  }

  private async fetchProducts(codes: ProductCode[]): Promise<unknown> {
    try {
      const response = await this.client.get<unknown>('/api/products', {
        params: {codes: codes.join(',')},
      });
      return response.data;
    } catch (error) {
      console.error('Failed to fetch products:', error);
      throw new Error('Catalog service unavailable');
    }
  }
}

// ============================================================================
// Axios Pricing Service
// ============================================================================

export class AxiosPricingService implements PricingService {
  constructor(private client: AxiosInstance) {}

  async getRuleDefinitions(): Promise<unknown> {
    try {
      const response = await this.client.get<unknown>('/api/rules');
      return response.data;
    } catch (error) {
      console.error('Failed to fetch rule definitions:', error);
      throw new Error('Pricing service unavailable');
    }
  }
}

// ============================================================================
// Console Receipt Presenter
// ============================================================================

export class ConsoleReceiptPresenter implements ReceiptPresenter {
  constructor(private config: ReceiptConfig) {}

  async present(receipt: Receipt): Promise<void> {
    console.log(formatReceipt(receipt, this.config.currency));
  }
}

// ============================================================================
// Production EffectsFactory
// ============================================================================

class EffectsFactory implements CheckoutEffects {
  private _catalog?: ProductCatalog;
  private _pricing?: PricingService;
  private _receipts?: ReceiptPresenter;

  constructor(private config: ProductionConfig) {}

  get catalog(): ProductCatalog {
    if (!this._catalog) {
      this._catalog = new AxiosProductCatalog(createHttpClient(this.config.catalog));
    }
    return this._catalog;
  }

  get pricing(): PricingService {
    if (!this._pricing) {
      this._pricing = new AxiosPricingService(createHttpClient(this.config.pricing));
    }
    return this._pricing;
  }

  get receipts(): ReceiptPresenter {
    if (!this._receipts) {
      this._receipts = new ConsoleReceiptPresenter(this.config.receipts);
    }
    return this._receipts;
  }

  static make(config?: ProductionConfig): CheckoutEffects {
    const cfg = config || loadConfigFromEnv();
    console.log(`✅ Checkout effects configured (catalog: ${cfg.catalog.baseUrl}, pricing: ${cfg.pricing.baseUrl})`);
    return new EffectsFactory(cfg);
  }
}

// Export a factory function
export function makeCheckoutEffects(config?: ProductionConfig): CheckoutEffects {
  return EffectsFactory.make(config);
}
