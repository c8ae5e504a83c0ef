import { formatAmount, InvariantViolationError, type AccountSnapshot, type ClientId } from '@ledgerflow/core';
import { err, ok, type Result } from 'neverthrow';

/**
 * Final state of one account as rendered for output.
 */
export interface AccountRow {
  client: ClientId;
  available: string;
  held: string;
  total: string;
  locked: boolean;
}

export const ACCOUNT_CSV_HEADERS = ['client', 'available', 'held', 'total', 'locked'] as const;

/**
 * Render one snapshot, re-checking `total == available + held` first.
 */
export function toAccountRow(snapshot: AccountSnapshot): Result<AccountRow, InvariantViolationError> {
  if (snapshot.total !== snapshot.available + snapshot.held) {
    return err(
      new InvariantViolationError(
        `Account ${snapshot.clientId} is inconsistent: total ${formatAmount(snapshot.total)} != available ${formatAmount(snapshot.available)} + held ${formatAmount(snapshot.held)}`,
        { clientId: snapshot.clientId }
      )
    );
  }

  return ok({
    client: snapshot.clientId,
    available: formatAmount(snapshot.available),
    held: formatAmount(snapshot.held),
    total: formatAmount(snapshot.total),
    locked: snapshot.locked,
  });
}

/**
 * Rows for every account, ordered by client id.
 */
export function toAccountRows(snapshots: AccountSnapshot[]): Result<AccountRow[], InvariantViolationError> {
  const rows: AccountRow[] = [];
  for (const snapshot of [...snapshots].sort((a, b) => a.clientId - b.clientId)) {
    const row = toAccountRow(snapshot);
    if (row.isErr()) return err(row.error);
    rows.push(row.value);
  }
  return ok(rows);
}

function escapeCsvValue(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Render rows as CSV with a header line and a trailing newline.
 */
export function formatAccountRowsAsCSV(rows: AccountRow[]): string {
  const csvLines = [ACCOUNT_CSV_HEADERS.join(',')];
  for (const row of rows) {
    const values = [String(row.client), row.available, row.held, row.total, String(row.locked)];
    csvLines.push(values.map(escapeCsvValue).join(','));
  }
  return `${csvLines.join('\n')}\n`;
}

