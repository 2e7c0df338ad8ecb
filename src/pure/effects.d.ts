/**
 * EFFECTS LAYER
 *
 * The narrow interfaces the checkout needs from the outside world. Each
 * one sits at the level the checkout thinks in ("products by code", "the
 * current rules"), so a test double is a one-liner.
 */

import {Product, ProductCode, Receipt} from '../domain';

// ============================================================================
// Effect Interfaces
// ============================================================================

export interface ProductCatalog {
    /** Products keyed by code; unknown codes are simply absent. */
    getByCodes(codes: ProductCode[]): Promise<Map<ProductCode, Product>>;
}

export interface PricingService {
    /** Raw rule definitions, decoded by the caller. */
    getRuleDefinitions(): Promise<unknown>;
}

export interface ReceiptPresenter {
    present(receipt: Receipt): Promise<void>;
}

// ============================================================================
// Combined Dependencies
// ============================================================================

export type CheckoutEffects = {
    readonly catalog: ProductCatalog;
    readonly pricing: PricingService;
    readonly receipts: ReceiptPresenter;
}
