import type { Transaction, TransactionField } from './ledger-types.js';
import { InvalidFieldError, MissingFieldError } from './ledger-types.js';

const REQUIRED_FIELDS: readonly TransactionField[] = ['owner', 'stamp', 'year', 'value'];

export type TransactionInput = { [K in TransactionField]?: unknown };

/**
 * Build an immutable transaction from loosely-typed input (a request body,
 * a peer payload). Every absent field is reported at once.
 */
export function newTransaction(input: TransactionInput): Transaction {
  const missing = REQUIRED_FIELDS.filter(field => input[field] === undefined || input[field] === null);
  if (missing.length > 0) {
    throw new MissingFieldError(missing);
  }

  const { owner, stamp, year, value } = input;

  if (typeof owner !== 'string') {
    throw new InvalidFieldError('owner', 'expected a string');
  }
  if (typeof stamp !== 'string') {
    throw new InvalidFieldError('stamp', 'expected a string');
  }
  if (typeof year !== 'number' || !Number.isInteger(year)) {
    throw new InvalidFieldError('year', 'expected an integer');
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidFieldError('value', 'expected a finite number');
  }

  return Object.freeze({ owner, stamp, year, value });
}

/** Pick the transaction fields out of an untyped request body. */
export function transactionInputFrom(body: unknown): TransactionInput {
  if (typeof body !== 'object' || body === null) {
    return {};
  }

  return {
    owner: 'owner' in body ? body.owner : undefined,
    stamp: 'stamp' in body ? body.stamp : undefined,
    year: 'year' in body ? body.year : undefined,
    value: 'value' in body ? body.value : undefined,
  };
}
