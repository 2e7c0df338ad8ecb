// Domain types shared across the application

/** Amount of money in minor currency units (e.g. pence). Discounts are negative. */
export type Amount = number;

export type ProductCode = string;

export type Product = {
  readonly code: ProductCode;
  readonly name: string;
  readonly price: Amount;
};

/** A synthetic, negative-priced cart entry produced by a rule. */
export type DiscountItem = {
  readonly name: string;
  readonly amount: Amount;
};

export type CartItem = Product | DiscountItem;

export type ReceiptLine = {
  readonly name: string;
  readonly amount: Amount;
};

export type Receipt = {
  readonly lines: ReceiptLine[];
  readonly subtotal: Amount;
  readonly discount: Amount;
  readonly total: Amount;
};
