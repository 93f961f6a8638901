export * from './costing-model-mismatch.exception';
export * from './insufficient-stock.exception';
export * from './invalid-adjustment.exception';
export * from './invalid-quantity.exception';
export * from './item-not-found.exception';
export * from './lot-not-found.exception';
export * from './no-pricing-history.exception';
export * from './transaction-failed.exception';
export * from './unit-conversion.exception';
