export { monthlyBilling, yearlyBilling } from './billing.js';
export { timeRecordedPerTeam } from './time.js';
export { dealProfitability, percentOf } from './profitability.js';
export { teamScorecard } from './scorecard.js';
export { summarize, listTeams, previewRows, DEFAULT_PREVIEW_LIMIT } from './summary.js';
export type {
    MonthlyBillingRow,
    YearlyBillingRow,
    TeamTimeRow,
    DealProfitRow,
    ScorecardRow,
    Summary,
} from './types.js';
