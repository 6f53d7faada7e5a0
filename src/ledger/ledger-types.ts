export interface Transaction {
  readonly owner: string;
  readonly stamp: string;
  readonly year: number;
  readonly value: number;
}

export interface Block {
  readonly index: number;
  readonly timestamp: number;
  readonly transactions: readonly Transaction[];
  readonly proof: number;
  readonly previousHash: string;
}

export type Chain = readonly Block[];

export const GENESIS_PROOF = 100;
export const GENESIS_PREVIOUS_HASH = '1';

export interface ChainVerificationResult {
  valid: boolean;
  length: number;
  brokenAtIndex?: number;
  reason?: string;
}

export type TransactionField = keyof Transaction;

export class MissingFieldError extends Error {
  constructor(public readonly fields: TransactionField[]) {
    super(`Missing required field(s): ${fields.join(', ')}`);
    this.name = 'MissingFieldError';
  }
}

export class InvalidFieldError extends Error {
  constructor(
    public readonly field: TransactionField,
    public readonly reason: string
  ) {
    super(`Invalid field ${field}: ${reason}`);
    this.name = 'InvalidFieldError';
  }
}

export class InvalidChainError extends Error {
  constructor(
    public readonly reason: string,
    public readonly brokenAtIndex?: number
  ) {
    super(`Invalid chain: ${reason}`);
    this.name = 'InvalidChainError';
  }
}

export class EmptyChainError extends Error {
  constructor(public readonly source: string) {
    super(`Received an empty chain from ${source}`);
    this.name = 'EmptyChainError';
  }
}
