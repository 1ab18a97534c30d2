export {
  requiredTextSchema,
  amountSchema,
  dateSchema,
  periodSchema,
  currencySchema,
} from './fields.js';
export { formatZodIssues } from './format.js';
