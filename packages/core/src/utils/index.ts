export { extractFieldNames, normalizeHeader, getField } from './records.js';
export { roundMoney, parseAmount } from './amounts.js';
export {
  parseDateValue,
  parsePeriod,
  toPeriod,
  periodBounds,
  daysBetween,
  daysOutsidePeriod,
} from './dates.js';
