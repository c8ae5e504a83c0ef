export { parseMutationsFromString, readMutationsFromFile } from './csv/mutation-reader.js';
export { MutationRowSchema, toMutation, type MutationRow, type MutationRowResult } from './csv/mutation-row.js';
export {
  ACCOUNT_CSV_HEADERS,
  formatAccountRowsAsCSV,
  toAccountRow,
  toAccountRows,
  type AccountRow,
} from './presenters/account-presenter.js';
