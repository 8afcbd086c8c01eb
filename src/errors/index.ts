/**
 * Wallet Error Classes
 *
 * Every failure raised by the engine descends from WalletError and falls in
 * one of five families: ParseError, ValidationError, InsufficientFundsError,
 * NetworkError and SignatureError.
 */

export type WalletErrorCode =
  | 'PARSE_ERROR'
  | 'MALFORMED_DESCRIPTOR'
  | 'INVALID_CHECKSUM'
  | 'MALFORMED_PSBT'
  | 'VALIDATION_ERROR'
  | 'INCONSISTENT_PSBT'
  | 'INVALID_DESTINATION'
  | 'NETWORK_MISMATCH'
  | 'NO_RECIPIENTS'
  | 'NOT_A_RANGE_DESCRIPTOR'
  | 'DESCRIPTOR_MISMATCH'
  | 'NOT_FINALIZED'
  | 'CONFIGURATION_ERROR'
  | 'INSUFFICIENT_FUNDS'
  | 'NETWORK_ERROR'
  | 'BROADCAST_ERROR'
  | 'SIGNATURE_ERROR'
  | 'INCOMPLETE_SIGNATURES'
  | 'INVALID_SIGNATURE';

export class WalletError extends Error {
  public readonly code: WalletErrorCode;
  public readonly retryable: boolean;

  constructor(message: string, code: WalletErrorCode, retryable = false) {
    super(message);
    this.name = 'WalletError';
    this.code = code;
    this.retryable = retryable;
  }
}

// Parse errors: the input text or bytes could not be read at all

export class ParseError extends WalletError {
  constructor(message: string, code: WalletErrorCode = 'PARSE_ERROR') {
    super(message, code);
    this.name = 'ParseError';
  }
}

export class MalformedDescriptorError extends ParseError {
  public descriptor?: string;

  constructor(message: string, descriptor?: string) {
    super(`Malformed descriptor: ${message}`, 'MALFORMED_DESCRIPTOR');
    this.name = 'MalformedDescriptorError';
    this.descriptor = descriptor;
  }
}

export class InvalidChecksumError extends ParseError {
  public expected?: string;
  public actual?: string;

  constructor(message: string, expected?: string, actual?: string) {
    super(`Invalid descriptor checksum: ${message}`, 'INVALID_CHECKSUM');
    this.name = 'InvalidChecksumError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class MalformedPSBTError extends ParseError {
  public offset?: number;

  constructor(message: string, offset?: number) {
    super(
      offset === undefined ? `Malformed PSBT: ${message}` : `Malformed PSBT at byte ${offset}: ${message}`,
      'MALFORMED_PSBT',
    );
    this.name = 'MalformedPSBTError';
    this.offset = offset;
  }
}

// Validation errors: well-formed input that violates a rule

export class ValidationError extends WalletError {
  constructor(message: string, code: WalletErrorCode = 'VALIDATION_ERROR') {
    super(message, code);
    this.name = 'ValidationError';
  }
}

export class InconsistentPSBTError extends ValidationError {
  public inputIndex?: number;

  constructor(message: string, inputIndex?: number) {
    super(`Inconsistent PSBT: ${message}`, 'INCONSISTENT_PSBT');
    this.name = 'InconsistentPSBTError';
    this.inputIndex = inputIndex;
  }
}

export class InvalidDestinationError extends ValidationError {
  public destination: string;

  constructor(destination: string, reason: string) {
    super(`Invalid destination ${destination}: ${reason}`, 'INVALID_DESTINATION');
    this.name = 'InvalidDestinationError';
    this.destination = destination;
  }
}

export class NetworkMismatchError extends ValidationError {
  public expected: string;
  public actual: string;

  constructor(expected: string, actual: string) {
    super(`Network mismatch: expected ${expected}, got ${actual}`, 'NETWORK_MISMATCH');
    this.name = 'NetworkMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class NoRecipientsError extends ValidationError {
  constructor() {
    super('Transaction needs at least one recipient', 'NO_RECIPIENTS');
    this.name = 'NoRecipientsError';
  }
}

export class NotARangeDescriptorError extends ValidationError {
  constructor(descriptor: string) {
    super(`Descriptor has no wildcard and cannot be derived at an index: ${descriptor}`, 'NOT_A_RANGE_DESCRIPTOR');
    this.name = 'NotARangeDescriptorError';
  }
}

export class DescriptorMismatchError extends ValidationError {
  constructor(message: string) {
    super(`Descriptor pair mismatch: ${message}`, 'DESCRIPTOR_MISMATCH');
    this.name = 'DescriptorMismatchError';
  }
}

export class NotFinalizedError extends ValidationError {
  public pendingInputs: number[];

  constructor(pendingInputs: number[]) {
    super(`PSBT is not finalized: inputs ${pendingInputs.join(', ')} pending`, 'NOT_FINALIZED');
    this.name = 'NotFinalizedError';
    this.pendingInputs = pendingInputs;
  }
}

export class ConfigurationError extends ValidationError {
  public problems: string[];

  constructor(problems: string[]) {
    super(`Configuration validation failed: ${problems.join(', ')}`, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

export class InsufficientFundsError extends WalletError {
  public required: number;
  public available: number;

  constructor(required: number, available: number) {
    super(`Insufficient funds: required ${required}, available ${available}`, 'INSUFFICIENT_FUNDS');
    this.name = 'InsufficientFundsError';
    this.required = required;
    this.available = available;
  }
}

// Network errors: the chain source could not be reached or refused the request

export class NetworkError extends WalletError {
  public override cause?: unknown;
  public attempts: number;

  constructor(
    message: string,
    options: { cause?: unknown; attempts?: number; retryable?: boolean; code?: WalletErrorCode } = {},
  ) {
    super(message, options.code ?? 'NETWORK_ERROR', options.retryable ?? true);
    this.name = 'NetworkError';
    this.cause = options.cause;
    this.attempts = options.attempts ?? 1;
  }
}

export class BroadcastError extends NetworkError {
  constructor(message: string, options: { cause?: unknown; attempts?: number; retryable?: boolean } = {}) {
    super(`Broadcast failed: ${message}`, {
      ...options,
      retryable: options.retryable ?? false,
      code: 'BROADCAST_ERROR',
    });
    this.name = 'BroadcastError';
  }
}

// Signature errors: the PSBT cannot be finalized with the signatures it carries

export class SignatureError extends WalletError {
  public inputIndex: number;

  constructor(message: string, inputIndex: number, code: WalletErrorCode = 'SIGNATURE_ERROR') {
    super(message, code);
    this.name = 'SignatureError';
    this.inputIndex = inputIndex;
  }
}

export class IncompleteSignaturesError extends SignatureError {
  public have: number;
  public need: number;

  constructor(inputIndex: number, have: number, need: number) {
    super(`Input ${inputIndex} has ${have} of ${need} required signatures`, inputIndex, 'INCOMPLETE_SIGNATURES');
    this.name = 'IncompleteSignaturesError';
    this.have = have;
    this.need = need;
  }
}

export class InvalidSignatureError extends SignatureError {
  public pubkey: string;

  constructor(inputIndex: number, pubkey: string, reason = 'signature does not verify') {
    super(`Input ${inputIndex} signature for ${pubkey}: ${reason}`, inputIndex, 'INVALID_SIGNATURE');
    this.name = 'InvalidSignatureError';
    this.pubkey = pubkey;
  }
}

/**
 * Render any thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
