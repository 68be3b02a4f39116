/**
 * Derived build parameters
 *
 * Hash-table sizing, minimizer-index sizing and the database reduction
 * decision. All arithmetic is exact: sizes are `bigint` and the GiB budget
 * is a rational, so a table sitting exactly on the budget boundary is
 * judged the same way every time.
 */

import { type } from "arktype";
import { Either } from "effect";
import { BudgetError, ConfigurationError } from "../errors";
import type { SizeBudget } from "../types";
import { SizeBudgetSchema } from "../types";

/** Bytes per GiB */
export const GIB = 2n ** 30n;

/**
 * Slack applied to the library's character count when sizing the
 * counting hash table (1.15, empirical)
 */
export const HASH_SIZE_FACTOR = { numerator: 115n, denominator: 100n } as const;

function ceilDiv(dividend: bigint, divisor: bigint): bigint {
  return (dividend + divisor - 1n) / divisor;
}

/**
 * Estimate the counting hash-table size from the library's total size
 *
 * @returns ceil(1.15 * totalLibraryBytes)
 */
export function estimateHashSize(totalLibraryBytes: bigint): bigint {
  return ceilDiv(totalLibraryBytes * HASH_SIZE_FACTOR.numerator, HASH_SIZE_FACTOR.denominator);
}

/**
 * Size of the minimizer index: an open-addressed table of 8-byte offsets
 * over every minimizer of the 4-letter alphabet, plus two sentinel slots
 *
 * @returns 8 * (4^minimizerLen + 2)
 */
export function indexSizeBytes(minimizerLen: number): bigint {
  return 8n * (4n ** BigInt(minimizerLen) + 2n);
}

/**
 * Parse a decimal GiB budget into an exact rational
 *
 * @example
 * ```typescript
 * parseGiB("4");    // Right({ numerator: 4n, denominator: 1n })
 * parseGiB("0.25"); // Right({ numerator: 25n, denominator: 100n })
 * ```
 */
export function parseGiB(text: string): Either.Either<SizeBudget, ConfigurationError> {
  const trimmed = text.trim();
  const validated = SizeBudgetSchema(trimmed);
  if (validated instanceof type.errors) {
    return Either.left(
      new ConfigurationError(
        `expected a non-negative decimal number of GiB, got "${text}"`,
        "KRAKEN_MAX_DB_SIZE"
      )
    );
  }

  const [whole = "0", fraction = ""] = trimmed.split(".");
  return Either.right({
    text: trimmed,
    numerator: BigInt(whole + fraction),
    denominator: 10n ** BigInt(fraction.length),
  });
}

/**
 * Budget in whole bytes, rounded down
 */
export function budgetBytes(budget: SizeBudget): bigint {
  return (budget.numerator * GIB) / budget.denominator;
}

/**
 * Whether the sorted database would exceed the size budget
 *
 * @returns true iff (kdbSize + idxSize) / 2^30 > budget
 */
export function reductionNeeded(kdbSize: bigint, idxSize: bigint, budget: SizeBudget): boolean {
  return (kdbSize + idxSize) * budget.denominator > budget.numerator * GIB;
}

/**
 * Number of k-mer records that fit in the budget once the index is paid for
 *
 * @returns floor((budget * 2^30 - idxSize) / recordLen), or a BudgetError
 * when the index alone exceeds the budget
 */
export function targetRecordCount(
  budget: SizeBudget,
  idxSize: bigint,
  recordLen: bigint
): Either.Either<bigint, BudgetError> {
  // remaining = (numerator * 2^30 - idxSize * denominator) / denominator
  const remaining = budget.numerator * GIB - idxSize * budget.denominator;
  if (remaining < 0n) {
    return Either.left(BudgetError.indexTooLarge(idxSize, budgetBytes(budget)));
  }
  return Either.right(remaining / (budget.denominator * recordLen));
}
