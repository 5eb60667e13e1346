export interface BillingLineItem {
  service: string;
  cost: number;
  usage: string;
}

// Demo breakdown; totals are not reconciled with the subscription's monthly cost.
export const BILLING_BREAKDOWN: BillingLineItem[] = [
  { service: 'Base Subscription', cost: 1200, usage: '100%' },
  { service: 'Processing Credits', cost: 850, usage: '85%' },
  { service: 'Premium Support', cost: 300, usage: '100%' },
  { service: 'API Calls', cost: 75, usage: '45%' },
  { service: 'Storage', cost: 25, usage: '12%' },
  { service: 'Additional Users', cost: 150, usage: '60%' },
];

export const PAYMENT_METHOD_MASK = '•••• 4567';

export const USAGE_TREND_START = '2024-07-01';

export const USAGE_TREND_END = '2024-09-22';
