// Module product types

import {Amount, DiscountItem, Product, ProductCode} from "../domain";

/** Exact fraction. The denominator is always positive. */
export type Ratio = {
    readonly numerator: number;
    readonly denominator: number;
};

export type DiscountAmount = Amount | Ratio;

export type Discount = {
    readonly amount: DiscountAmount;
};

export type BulkDiscount = {
    readonly kind: 'bulk';
    readonly runningTotal: Amount;
    readonly discount: Discount;
};

export type DiscountSpec = Discount | BulkDiscount;

export type Condition =
    | { readonly kind: 'any' }
    | { readonly kind: 'productEquals'; readonly code: ProductCode; readonly inner: Condition }
    | { readonly kind: 'everyNth'; readonly n: number; readonly counter: number; readonly inner: Condition }
    | { readonly kind: 'afterCount'; readonly threshold: number; readonly counter: number; readonly inner: Condition };

export type Rule = {
    readonly name: string;
    readonly precondition: Condition;
    readonly definition: DiscountSpec;
    readonly postcondition: Condition;
    readonly active: boolean;
    readonly producedItems: readonly DiscountItem[];
};

export type Cart = {
    /** Newest first. */
    readonly items: readonly Product[];
    readonly rules: readonly Rule[];
    readonly price: Amount;
};
