/**
 * What the engine does with a record that fails validation or mutation.
 * `abort` stops the run at the first failure; `skip` logs the record and continues,
 * which changes the final account states.
 */
export const ERROR_POLICIES = ['abort', 'skip'] as const;
export type ErrorPolicy = (typeof ERROR_POLICIES)[number];
