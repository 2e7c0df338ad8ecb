/**
 * CHECKOUT PROCESSOR - The Coordinator
 *
 * The thin effectful shell around the rules engine:
 * 1. Calls effects to get products and rule definitions (inputs)
 * 2. Folds the products through a cart (pure)
 * 3. Hands the receipt to the presenter (outputs)
 */

import {Product, ProductCode, Receipt} from '../domain';
import {CheckoutEffects} from './effects';
import {resolveProducts, toReceipt} from './businessLogic';
import {toRules} from './ruleConfig';
import * as Carts from './cart';
import {Rule} from './types';
import {EffectsError} from "../effects/EffectsError";
import {Either, EitherAsync, Left, NonEmptyList, Right} from 'purify-ts';

type CheckoutDetails = {
    readonly products: Product[];
    readonly rules: Rule[];
};

/**
 * Check out the products with the given codes, in scan order.
 *
 * @return a function running the checkout with the given effects, returning
 * either the business failures or the presented receipt
 * @throws EffectsError when presenting the receipt fails
 */
export function checkout(
    codes: ProductCode[]
): (effects: CheckoutEffects) => Promise<Either<NonEmptyList<string>, Receipt>> {
    return async (effects: CheckoutEffects) => {
        const details = await fetchCheckoutDetails(codes)(effects);
        return details.caseOf<Promise<Either<NonEmptyList<string>, Receipt>>>({
            Left: (errors) => Promise.resolve(Left(errors)),
            Right: async (result) => {
                const receipt = await finaliseCheckout(doCheckout(result))(effects);
                return Right(receipt);
            }
        });
    };
}

/**
 * Fetch the products and the current rules.
 * @return either the failures or the gathered input data
 */
function fetchCheckoutDetails(
    codes: ProductCode[]
): (effects: CheckoutEffects) => Promise<Either<NonEmptyList<string>, CheckoutDetails>> {
    return async (effects: CheckoutEffects) => {
        const [catalog, ruleDefinitions] = await Promise.all([
            effects.catalog.getByCodes([...new Set(codes)]),
            effects.pricing.getRuleDefinitions(),
        ]);

        const {products, missingCodes} = resolveProducts(codes, catalog);
        return missingCodes
            .chain(missing => NonEmptyList.fromArray(missing.map(code => `Product ${code} not found`)))
            .caseOf<Either<NonEmptyList<string>, CheckoutDetails>>({
                Just: (errors) => Left(errors),
                Nothing: () => toRules(ruleDefinitions)
                    .mapLeft(error => NonEmptyList([error]))
                    .map(rules => ({products, rules})),
            });
    };
}

function doCheckout(details: CheckoutDetails): Receipt {
    return toReceipt(Carts.add(Carts.empty(details.rules), details.products));
}

/**
 * Perform all output effects for a receipt.
 * @return the receipt
 */
function finaliseCheckout(
    receipt: Receipt
): (effects: CheckoutEffects) => Promise<Receipt> {
    return async (effects: CheckoutEffects) => {
        const outputs = [
            () => effects.receipts.present(receipt),
        ];

        const results = await Promise.all(outputs.map(e => EitherAsync(e).run()));
        const errors = Either.lefts(results)
            .map(err => (err instanceof Error) ? err : new Error(String(err)));
        if (errors.length) throw new EffectsError(errors);
        return receipt;
    };
}
