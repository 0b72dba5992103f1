export { reconcileHoldings, type ReconcileSummary } from './holdings.js';
export { reconcileDeals, selectBuyDeals } from './deals.js';
export { IdentityResolver } from './identity.js';
