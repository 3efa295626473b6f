import { normalizeTransaction } from "../src/application/transaction-normalizer.js";
import type { NormalizedTransaction } from "../src/domain/types.js";

export function transaction(fields: Record<string, unknown> = {}): NormalizedTransaction {
  return normalizeTransaction({ transaction_id: 1, ...fields });
}
