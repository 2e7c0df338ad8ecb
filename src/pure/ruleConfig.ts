/**
 * RULE CONFIGURATION
 *
 * Rules supplied as data (e.g. by the pricing service) are decoded here.
 * Structural problems come back as the codec's message; contract violations
 * from the constructors (a zero `n`, a fractional amount) are caught and
 * reported against the offending rule's name.
 */

import {array, boolean, Codec, Either, exactly, GetType, lazy, number, oneOf, optional, string} from 'purify-ts';
import {Condition, Discount, DiscountSpec, Rule} from './types';
import * as Conditions from './condition';
import * as Discounts from './discount';
import {createRule} from './rule';

// `optional` codecs decode to a present key that may hold undefined
export type ConditionConfig =
    | { kind: 'any' }
    | { kind: 'productEquals'; code: string; inner: ConditionConfig | undefined }
    | { kind: 'everyNth'; n: number; inner: ConditionConfig | undefined }
    | { kind: 'afterCount'; threshold: number; inner: ConditionConfig | undefined };

export const ConditionConfig: Codec<ConditionConfig> = lazy(() => oneOf([
    Codec.interface({kind: exactly('any')}),
    Codec.interface({kind: exactly('productEquals'), code: string, inner: optional(ConditionConfig)}),
    Codec.interface({kind: exactly('everyNth'), n: number, inner: optional(ConditionConfig)}),
    Codec.interface({kind: exactly('afterCount'), threshold: number, inner: optional(ConditionConfig)}),
]));

export const DiscountConfig = oneOf([
    Codec.interface({kind: exactly('absolute'), amount: number}),
    Codec.interface({kind: exactly('share'), parts: number, of: number}),
    Codec.interface({kind: exactly('percents'), percents: number}),
]);

export type DiscountConfig = GetType<typeof DiscountConfig>;

export const RuleDefinition = Codec.interface({
    name: string,
    discount: DiscountConfig,
    bulk: optional(boolean),
    precondition: optional(ConditionConfig),
    postcondition: optional(ConditionConfig),
});

export type RuleDefinition = GetType<typeof RuleDefinition>;

// ============================================================================
// Conversion
// ============================================================================

export function toCondition(config: ConditionConfig): Condition {
    switch (config.kind) {
        case 'any':
            return Conditions.any();
        case 'productEquals':
            return Conditions.productEquals(config.code, toInner(config.inner));
        case 'everyNth':
            return Conditions.everyNth(config.n, toInner(config.inner));
        case 'afterCount':
            return Conditions.afterCount(config.threshold, toInner(config.inner));
    }
}

function toInner(inner: ConditionConfig | undefined): Condition {
    return inner ? toCondition(inner) : Conditions.any();
}

export function toDiscount(config: DiscountConfig): Discount {
    switch (config.kind) {
        case 'absolute':
            return Discounts.absolute(config.amount);
        case 'share':
            return Discounts.share(config.parts, config.of);
        case 'percents':
            return Discounts.percents(config.percents);
    }
}

/** Build a rule from its definition; throws when a constructor rejects an argument. */
export function toRule(definition: RuleDefinition): Rule {
    const discount = toDiscount(definition.discount);
    const spec: DiscountSpec = definition.bulk ? Discounts.bulk(discount) : discount;
    return createRule(definition.name, spec, {
        precondition: definition.precondition && toCondition(definition.precondition),
        postcondition: definition.postcondition && toCondition(definition.postcondition),
    });
}

/**
 * Decode and build a list of rules.
 * @return either the first problem found or the rules, in the order given
 */
export function toRules(input: unknown): Either<string, Rule[]> {
    return array(RuleDefinition).decode(input).chain(definitions =>
        Either.sequence(definitions.map(definition =>
            Either.encase(() => toRule(definition))
                .mapLeft(error => `Invalid rule "${definition.name}": ${error.message}`)
        ))
    );
}
