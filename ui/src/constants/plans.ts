/**
 * Subscription plan catalog shown on the configuration page.
 */

export const PLAN_NAMES = ['Starter', 'Professional', 'Enterprise', 'Enterprise Plus'] as const;

export type PlanName = typeof PLAN_NAMES[number];

export interface PlanDetails {
  /** Monthly price in USD */
  price: number;
  credits: number;
  /** Seat limit; `'Unlimited'` for the top tier */
  users: number | 'Unlimited';
  features: string;
}

export const PLAN_CATALOG: Record<PlanName, PlanDetails> = {
  Starter: {
    price: 500,
    credits: 2500,
    users: 5,
    features: 'Basic migration tools, email support',
  },
  Professional: {
    price: 1200,
    credits: 6000,
    users: 15,
    features: 'Advanced analytics, priority support, API access',
  },
  Enterprise: {
    price: 2450,
    credits: 10000,
    users: 25,
    features: 'All features, 24/7 support, custom integrations',
  },
  'Enterprise Plus': {
    price: 4500,
    credits: 25000,
    users: 'Unlimited',
    features: 'White label, on-premise, dedicated support',
  },
};
