/**
 * CONDITIONS
 *
 * A small stateful predicate language. Conditions compose by wrapping an
 * inner condition, and checking one never mutates it: `check` hands back
 * the next state, and the caller threads it forward to the next product.
 */

import {Product, ProductCode} from '../domain';
import {Condition} from './types';
import {InvalidArgumentError} from './InvalidArgumentError';

// ============================================================================
// Constructors
// ============================================================================

/** Condition which always evaluates to true. */
export function any(): Condition {
    return {kind: 'any'};
}

/** Checks `inner` only when the product with the given code is added. */
export function productEquals(code: ProductCode, inner: Condition = any()): Condition {
    return {kind: 'productEquals', code, inner};
}

/** Checks `inner` on every `n`-th product that reaches this condition. */
export function everyNth(n: number, inner: Condition = any()): Condition {
    requirePositiveInteger('everyNth', n);
    return {kind: 'everyNth', n, counter: 0, inner};
}

/** Checks `inner` once `threshold` products have already reached this condition. */
export function afterCount(threshold: number, inner: Condition = any()): Condition {
    requirePositiveInteger('afterCount', threshold);
    return {kind: 'afterCount', threshold, counter: 0, inner};
}

function requirePositiveInteger(constructor: string, value: number): void {
    if (!Number.isInteger(value) || value <= 0) {
        throw new InvalidArgumentError(`${constructor} expects a positive integer, got ${value}`);
    }
}

// ============================================================================
// Evaluation
// ============================================================================

/**
 * Evaluate a condition on the next product.
 * @return whether the condition holds, and the condition's next state
 */
export function check(condition: Condition, product: Product): [boolean, Condition] {
    switch (condition.kind) {
        case 'any':
            return [true, condition];

        case 'productEquals': {
            if (product.code !== condition.code) {
                return [false, condition];
            }
            const [applies, inner] = check(condition.inner, product);
            return [applies, {...condition, inner}];
        }

        case 'everyNth': {
            if (condition.counter + 1 !== condition.n) {
                return [false, {...condition, counter: condition.counter + 1}];
            }
            const [applies, inner] = check(condition.inner, product);
            return [applies, {...condition, counter: 0, inner}];
        }

        case 'afterCount': {
            if (condition.counter < condition.threshold) {
                return [false, {...condition, counter: condition.counter + 1}];
            }
            const [applies, inner] = check(condition.inner, product);
            return [applies, {...condition, counter: condition.counter + 1, inner}];
        }
    }
}
