export interface DatabaseConfig {
  url?: string;
  poolSize: number;
}

export interface CostingConfig {
  /** Lots at or below this remaining quantity are treated as empty. */
  epsilon: string;
  priceAlertWarningPercent: number;
  priceAlertCriticalPercent: number;
  averagePriceWindowDays: number;
  expiringSoonDays: number;
  defaultActor: string;
}

export default () => ({
  port: parseInt(process.env.PORT || '3000', 10),
  database: {
    url: process.env.DATABASE_URL,
    poolSize: parseInt(process.env.DATABASE_POOL_SIZE || '10', 10),
  } satisfies DatabaseConfig,
  costing: {
    epsilon: process.env.COSTING_EPSILON || '0.0005',
    priceAlertWarningPercent: parseFloat(process.env.PRICE_ALERT_WARNING_PERCENT || '20'),
    priceAlertCriticalPercent: parseFloat(process.env.PRICE_ALERT_CRITICAL_PERCENT || '40'),
    averagePriceWindowDays: parseInt(process.env.AVERAGE_PRICE_WINDOW_DAYS || '60', 10),
    expiringSoonDays: parseInt(process.env.EXPIRING_SOON_DAYS || '14', 10),
    defaultActor: process.env.COSTING_DEFAULT_ACTOR || 'desktop-user',
  } satisfies CostingConfig,
});
