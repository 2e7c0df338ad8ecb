export * as Conditions from './pure/condition';
export * as Discounts from './pure/discount';
export * as Rules from './pure/rule';
export * as Carts from './pure/cart';
export {toRules, toRule, toCondition, toDiscount, RuleDefinition, ConditionConfig, DiscountConfig} from './pure/ruleConfig';
export {decodeProducts, ProductPayload, resolveProducts, toReceipt, formatAmount, formatReceipt} from './pure/businessLogic';
export {checkout} from './pure/checkoutProcessing';
export {InvalidArgumentError} from './pure/InvalidArgumentError';
export {EffectsError} from './effects/EffectsError';
export {
    AxiosPricingService,
    AxiosProductCatalog,
    ConsoleReceiptPresenter,
    loadConfigFromEnv,
    makeCheckoutEffects,
} from './effects/EffectsFactory';
export type {Amount, CartItem, DiscountItem, Product, ProductCode, Receipt, ReceiptLine} from './domain';
export type {BulkDiscount, Cart, Condition, Discount, DiscountAmount, DiscountSpec, Ratio, Rule} from './pure/types';
export type {RuleOptions} from './pure/rule';
export type {CheckoutEffects, PricingService, ProductCatalog, ReceiptPresenter} from './pure/effects';
export type {HttpServiceConfig, ProductionConfig, ReceiptConfig} from './effects/types';
