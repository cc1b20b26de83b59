import { TransactionField } from './types';

export class TransactionValidationError extends Error {
  readonly field: TransactionField;

  constructor(field: TransactionField, message: string) {
    super(message);
    this.name = 'TransactionValidationError';
    this.field = field;
  }
}

export class ConfigError extends Error {
  readonly keys: string[];

  constructor(keys: string[], message: string) {
    super(message);
    this.name = 'ConfigError';
    this.keys = keys;
  }
}
