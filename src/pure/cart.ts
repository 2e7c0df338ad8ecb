/**
 * CART
 *
 * An ongoing purchase. Products can be added (not removed); each added
 * product is folded through every rule attached to the cart.
 */

import {Amount, CartItem, Product} from '../domain';
import {Cart, Rule} from './types';
import * as Rules from './rule';

export function empty(rules: readonly Rule[] = []): Cart {
    return {items: [], rules: [...rules], price: 0};
}

/** Add a product, or several in order, evaluating rules in the process. */
export function add(cart: Cart, products: Product | Product[]): Cart {
    if (Array.isArray(products)) {
        return products.reduce(addOne, cart);
    }
    return addOne(cart, products);
}

function addOne(cart: Cart, product: Product): Cart {
    return {
        items: [product, ...cart.items],
        rules: cart.rules.map(rule => Rules.apply(rule, product)),
        price: cart.price + product.price,
    };
}

/** Cart total amount, taking into account any active discounts. */
export function total(cart: Cart): Amount {
    return cart.price + cart.rules.reduce((sum, rule) => sum + Rules.total(rule), 0);
}

/**
 * Everything a receipt shows: products in the order they were added,
 * then the active discount items of each rule.
 */
export function visibleItems(cart: Cart): CartItem[] {
    return [...[...cart.items].reverse(), ...cart.rules.flatMap(Rules.items)];
}
