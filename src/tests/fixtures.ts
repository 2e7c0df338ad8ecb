import {Product, ProductCode} from '../domain';
import {createRule} from '../pure/rule';
import {afterCount, everyNth, productEquals} from '../pure/condition';
import {absolute, bulk, percents, share} from '../pure/discount';
import {Rule} from '../pure/types';

export const greenTea: Product = {code: 'GR1', name: 'Green tea', price: 311};
export const strawberries: Product = {code: 'SR1', name: 'Strawberries', price: 500};
export const coffee: Product = {code: 'CF1', name: 'Coffee', price: 1123};

export const priceSheet: ReadonlyMap<ProductCode, Product> = new Map([
  ['GR1', greenTea],
  ['SR1', strawberries],
  ['CF1', coffee],
]);

export function lookup(codes: ProductCode[]): Product[] {
  return codes.map(code => {
    const product = priceSheet.get(code);
    if (!product) {
      throw new Error(`No product ${code} in the price sheet`);
    }
    return product;
  });
}

export const teaRule: Rule = createRule(
  'Buy a Green tea get one FREE!',
  percents(-100),
  {precondition: productEquals('GR1', everyNth(2))}
);

export const strawberryRule: Rule = createRule(
  '3+ Strawberries 4.50 EACH!',
  absolute(-50),
  {precondition: productEquals('SR1'), postcondition: afterCount(2)}
);

export const coffeeRule: Rule = createRule(
  '3+ Coffees 1/3 OFF ALL!',
  bulk(share(-1, 3)),
  {precondition: productEquals('CF1'), postcondition: afterCount(2)}
);

export const storeRules: Rule[] = [teaRule, strawberryRule, coffeeRule];

/** The same rules as `storeRules`, the way the pricing service serves them. */
export const storeRuleDefinitions = [
  {
    name: 'Buy a Green tea get one FREE!',
    discount: {kind: 'percents', percents: -100},
    precondition: {kind: 'productEquals', code: 'GR1', inner: {kind: 'everyNth', n: 2}},
  },
  {
    name: '3+ Strawberries 4.50 EACH!',
    discount: {kind: 'absolute', amount: -50},
    precondition: {kind: 'productEquals', code: 'SR1'},
    postcondition: {kind: 'afterCount', threshold: 2},
  },
  {
    name: '3+ Coffees 1/3 OFF ALL!',
    discount: {kind: 'share', parts: -1, of: 3},
    bulk: true,
    precondition: {kind: 'productEquals', code: 'CF1'},
    postcondition: {kind: 'afterCount', threshold: 2},
  },
];
