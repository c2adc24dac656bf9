/**
 * Pricing plans. Static, served from memory.
 */

import type { Plan } from '../types/index.js';

const PLANS: readonly Plan[] = [
  {
    id: 'free',
    name: 'Starter',
    price: '$0',
    features: ['Up to 3 projects', 'Basic analytics', 'Community support'],
    highlighted: false,
  },
  {
    id: 'pro',
    name: 'Pro',
    price: '$19',
    features: ['Unlimited projects', 'Advanced analytics', 'Priority support'],
    highlighted: true,
  },
  {
    id: 'team',
    name: 'Team',
    price: '$49',
    features: ['Team workspaces', 'SSO (SAML)', 'Admin controls'],
    highlighted: false,
  },
];

/**
 * Copies, so callers cannot mutate the table
 */
export function listPlans(): Plan[] {
  return PLANS.map(plan => ({ ...plan, features: [...plan.features] }));
}
