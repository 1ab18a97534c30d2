export { formatReconciliationReport } from './report-formatter.js';
export { toTabular, TABULAR_COLLECTIONS } from './tabular.js';
export type { TabularReport, TabularRow, TabularCell, TabularCollection } from './tabular.js';
export { formatMoney, formatPercent, formatTable } from './utils.js';
