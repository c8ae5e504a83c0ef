export { Account } from './account/account.js';
export { AccountRegistry } from './account/account-registry.js';
export { TransactionLedger } from './ledger/transaction-ledger.js';
export {
  TransactionEngine,
  type EngineOptions,
  type EngineSummary,
  type MutationRecord,
  type MutationSource,
  type SkippedRecord,
} from './engine/transaction-engine.js';
