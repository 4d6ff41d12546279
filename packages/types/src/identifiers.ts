/**
 * Identifier Types
 *
 * Opaque numeric keys for clients and transactions.
 *
 * Rules:
 * - Client IDs are unsigned 16-bit integers
 * - Transaction IDs are unsigned 32-bit integers, unique across the whole stream
 * - Identifiers are compared by value, never by reference
 */

/**
 * Client identifier (0..65535). Stable for the lifetime of a run.
 */
export type ClientId = number;

/**
 * Transaction identifier (0..4294967295).
 * Correlates a deposit or withdrawal with later dispute activity.
 */
export type TransactionId = number;

/** Largest representable client ID. */
export const MAX_CLIENT_ID = 0xffff;

/** Largest representable transaction ID. */
export const MAX_TRANSACTION_ID = 0xffffffff;
