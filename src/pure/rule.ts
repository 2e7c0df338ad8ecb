/**
 * RULES
 *
 * A rule is evaluated on every product added to a cart:
 * 1. its precondition decides whether the product is processed at all
 * 2. processed products produce discount items
 * 3. its postcondition decides whether those items currently count
 *
 * Rules are values. `apply` returns the next version of a rule and leaves
 * the one it was given untouched.
 */

import {Amount, DiscountItem, Product} from '../domain';
import {Condition, Discount, DiscountSpec, Rule} from './types';
import * as Conditions from './condition';
import {compute, isBulk} from './discount';

export type RuleOptions = {
    /** Narrows down when the rule is evaluated. Defaults to `any()`. */
    readonly precondition?: Condition;
    /** Restricts when produced items become active. Defaults to `any()`. */
    readonly postcondition?: Condition;
};

export function createRule(name: string, definition: DiscountSpec, options: RuleOptions = {}): Rule {
    return {
        name,
        definition,
        precondition: options.precondition ?? Conditions.any(),
        postcondition: options.postcondition ?? Conditions.any(),
        active: false,
        producedItems: [],
    };
}

/** Evaluate rule given next product added to a cart. */
export function apply(rule: Rule, product: Product): Rule {
    const [applies, precondition] = Conditions.check(rule.precondition, product);
    if (!applies) {
        return {...rule, precondition};
    }
    return checkPostcondition(update({...rule, precondition}, product), product);
}

function checkPostcondition(rule: Rule, product: Product): Rule {
    const [active, postcondition] = Conditions.check(rule.postcondition, product);
    return {...rule, active, postcondition};
}

function update(rule: Rule, product: Product): Rule {
    const definition = rule.definition;
    if (isBulk(definition)) {
        const runningTotal = definition.runningTotal + product.price;
        return {
            ...rule,
            definition: {...definition, runningTotal},
            producedItems: [produceItem(rule.name, definition.discount, runningTotal)],
        };
    }
    return {
        ...rule,
        producedItems: [...rule.producedItems, produceItem(rule.name, definition, product.price)],
    };
}

function produceItem(name: string, discount: Discount, price: Amount): DiscountItem {
    return {name, amount: compute(discount, price)};
}

/** Items to show among other cart items; empty while the rule is inactive. */
export function items(rule: Rule): readonly DiscountItem[] {
    return rule.active ? [...rule.producedItems] : [];
}

/** Effective price offset introduced by this rule so far. */
export function total(rule: Rule): Amount {
    return items(rule).reduce((sum, item) => sum + item.amount, 0);
}
