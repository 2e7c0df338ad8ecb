/**
 * PURE BUSINESS LOGIC
 *
 * Everything around the rules engine that turns looked-up products into a
 * finished receipt. These functions take values and return values; test them
 * by calling them.
 *
 * Amounts stay in integer minor units all the way to formatting.
 */

import {Amount, CartItem, Product, ProductCode, Receipt} from '../domain';
import {Cart} from './types';
import * as Carts from './cart';
import {array, Codec, Either, Left, Maybe, Right, string} from "purify-ts";

// ============================================================================
// Product Resolution
// ============================================================================

export function resolveProducts(
  codes: ProductCode[],
  catalog: ReadonlyMap<ProductCode, Product>
): { products: Product[]; missingCodes: Maybe<ProductCode[]> } {
  const result = codes.reduce(
    (acc, code) => {
      const product = catalog.get(code);

      if (!product) {
        return {...acc, missingCodes: [...acc.missingCodes, code]};
      }

      return {...acc, products: [...acc.products, product]};
    },
    { products: [] as Product[], missingCodes: [] as ProductCode[] }
  );

  return {
    products: result.products,
    missingCodes: Maybe.fromPredicate(a => a.length > 0, result.missingCodes)
  };
}

const amount = Codec.custom<Amount>({
  decode: (input): Either<string, Amount> => typeof input === 'number' && Number.isInteger(input)
    ? Right(input)
    : Left(`Expected an integer amount, but received ${JSON.stringify(input)}`),
  encode: input => input,
});

export const ProductPayload = Codec.interface({
  code: string,
  name: string,
  price: amount,
});

/** Decode a catalog response into products, rejecting anything that is not one. */
export function decodeProducts(input: unknown): Either<string, Product[]> {
  return array(ProductPayload).decode(input);
}

// ============================================================================
// Receipts
// ============================================================================

export function toReceipt(cart: Cart): Receipt {
  const total = Carts.total(cart);

  return {
    lines: Carts.visibleItems(cart).map(item => ({name: item.name, amount: itemAmount(item)})),
    subtotal: cart.price,
    discount: total - cart.price,
    total,
  };
}

function itemAmount(item: CartItem): Amount {
  return 'price' in item ? item.price : item.amount;
}

/** Render minor units as e.g. `£3.11` or `-£0.50`. */
export function formatAmount(amount: Amount, symbol: string): string {
  const sign = amount < 0 ? '-' : '';
  const minor = Math.abs(amount);
  const pence = String(minor % 100).padStart(2, '0');
  return `${sign}${symbol}${Math.floor(minor / 100)}.${pence}`;
}

export function formatReceipt(receipt: Receipt, symbol: string): string {
  const row = (label: string, amount: Amount) => `${label.padEnd(32)}${formatAmount(amount, symbol).padStart(10)}`;

  return [
    ...receipt.lines.map(line => row(line.name, line.amount)),
    '-'.repeat(42),
    row('Subtotal', receipt.subtotal),
    row('Discount', receipt.discount),
    row('Total', receipt.total),
  ].join('\n');
}
