/**
 * DISCOUNTS
 *
 * A discount is either an absolute amount, which ignores the price it is
 * applied to, or an exact share of that price. Shares are kept as integer
 * fractions and only truncated once, toward zero, when computed.
 */

import {Amount} from '../domain';
import {BulkDiscount, Discount, DiscountSpec, Ratio} from './types';
import {InvalidArgumentError} from './InvalidArgumentError';

/** Express discount in absolute currency units. */
export function absolute(amount: Amount): Discount {
    if (!Number.isInteger(amount)) {
        throw new InvalidArgumentError(`absolute expects an integer amount, got ${amount}`);
    }
    return {amount};
}

/** Express discount as `parts` of `of` of a product or total price. */
export function share(parts: number, of: number): Discount {
    if (!Number.isInteger(parts)) {
        throw new InvalidArgumentError(`share expects integer parts, got ${parts}`);
    }
    if (!Number.isInteger(of) || of <= 0) {
        throw new InvalidArgumentError(`share expects a positive integer denominator, got ${of}`);
    }
    return {amount: {numerator: parts, denominator: of}};
}

export function percents(percents: number): Discount {
    return share(percents, 100);
}

/**
 * Mark a discount as bulk: it produces a single item, recomputed from the
 * running total of every price it has been applied to.
 */
export function bulk(discount: Discount): BulkDiscount {
    return {kind: 'bulk', runningTotal: 0, discount};
}

export function isBulk(spec: DiscountSpec): spec is BulkDiscount {
    return 'kind' in spec && spec.kind === 'bulk';
}

export function isRatio(amount: Discount['amount']): amount is Ratio {
    return typeof amount !== 'number';
}

/** Compute discounted amount in absolute currency units. */
export function compute(discount: Discount, price: Amount): Amount {
    const amount = discount.amount;
    if (!isRatio(amount)) {
        return amount;
    }
    // BigInt division truncates toward zero
    return Number(BigInt(price) * BigInt(amount.numerator) / BigInt(amount.denominator));
}
