/** Client identifier (u16 range) */
export type ClientId = number;

/** Transaction identifier (u32 range), unique among deposits and withdrawals */
export type TransactionId = number;

export const MAX_CLIENT_ID: ClientId = 0xffff;
export const MAX_TRANSACTION_ID: TransactionId = 0xffff_ffff;
