/**
 * Wallet error hierarchy tests
 */

import { describe, expect, it } from 'vitest';

import {
  BroadcastError,
  ConfigurationError,
  IncompleteSignaturesError,
  InsufficientFundsError,
  InvalidChecksumError,
  InvalidSignatureError,
  MalformedDescriptorError,
  MalformedPSBTError,
  NetworkError,
  NetworkMismatchError,
  NoRecipientsError,
  NotFinalizedError,
  ParseError,
  SignatureError,
  ValidationError,
  WalletError,
  errorMessage,
} from '../../../src/errors/index.ts';

describe('Wallet errors', () => {
  describe('families', () => {
    it('should place descriptor and PSBT read failures under ParseError', () => {
      const errors = [
        new MalformedDescriptorError('unknown function foo'),
        new InvalidChecksumError('mismatch', 'abcdefgh', 'hgfedcba'),
        new MalformedPSBTError('bad magic', 0),
      ];

      for (const error of errors) {
        expect(error).toBeInstanceOf(ParseError);
        expect(error).toBeInstanceOf(WalletError);
        expect(error).toBeInstanceOf(Error);
        expect(error.retryable).toBe(false);
      }
    });

    it('should place rule violations under ValidationError', () => {
      expect(new NetworkMismatchError('testnet', 'bitcoin')).toBeInstanceOf(ValidationError);
      expect(new NoRecipientsError()).toBeInstanceOf(ValidationError);
      expect(new NotFinalizedError([1])).toBeInstanceOf(ValidationError);
      expect(new ConfigurationError(['gapLimit must be a positive integer'])).toBeInstanceOf(ValidationError);
    });

    it('should place signature problems under SignatureError', () => {
      const incomplete = new IncompleteSignaturesError(0, 1, 2);
      const invalid = new InvalidSignatureError(1, '02ab', 'key is not part of the spending script');

      expect(incomplete).toBeInstanceOf(SignatureError);
      expect(invalid).toBeInstanceOf(SignatureError);
      expect(incomplete.inputIndex).toBe(0);
      expect(invalid.inputIndex).toBe(1);
    });

    it('should keep InsufficientFundsError out of the validation family', () => {
      const error = new InsufficientFundsError(10_000, 4_000);

      expect(error).toBeInstanceOf(WalletError);
      expect(error).not.toBeInstanceOf(ValidationError);
    });
  });

  describe('messages and codes', () => {
    it('should describe insufficient funds with both amounts', () => {
      const error = new InsufficientFundsError(10_000, 4_000);

      expect(error.message).toBe('Insufficient funds: required 10000, available 4000');
      expect(error.code).toBe('INSUFFICIENT_FUNDS');
      expect(error.required).toBe(10_000);
      expect(error.available).toBe(4_000);
      expect(error.name).toBe('InsufficientFundsError');
    });

    it('should name both networks in a mismatch', () => {
      const error = new NetworkMismatchError('testnet', 'bitcoin');

      expect(error.message).toBe('Network mismatch: expected testnet, got bitcoin');
      expect(error.code).toBe('NETWORK_MISMATCH');
    });

    it('should include the byte offset of a malformed PSBT when known', () => {
      expect(new MalformedPSBTError('bad magic', 0).message).toBe('Malformed PSBT at byte 0: bad magic');
      expect(new MalformedPSBTError('not valid base64').message).toBe('Malformed PSBT: not valid base64');
    });

    it('should list pending inputs of an unfinalized PSBT', () => {
      const error = new NotFinalizedError([0, 2]);

      expect(error.message).toBe('PSBT is not finalized: inputs 0, 2 pending');
      expect(error.pendingInputs).toEqual([0, 2]);
    });

    it('should count signatures in an incomplete input', () => {
      const error = new IncompleteSignaturesError(3, 1, 2);

      expect(error.message).toBe('Input 3 has 1 of 2 required signatures');
      expect(error.code).toBe('INCOMPLETE_SIGNATURES');
      expect(error.have).toBe(1);
      expect(error.need).toBe(2);
    });

    it('should join configuration problems', () => {
      const error = new ConfigurationError(['a', 'b']);

      expect(error.message).toBe('Configuration validation failed: a, b');
      expect(error.problems).toEqual(['a', 'b']);
    });
  });

  describe('network errors', () => {
    it('should be retryable unless told otherwise', () => {
      expect(new NetworkError('socket closed').retryable).toBe(true);
      expect(new NetworkError('bad response', { retryable: false }).retryable).toBe(false);
    });

    it('should carry cause and attempts', () => {
      const cause = new Error('ECONNRESET');
      const error = new NetworkError('fetch failed', { cause, attempts: 4 });

      expect(error.cause).toBe(cause);
      expect(error.attempts).toBe(4);
    });

    it('should not retry broadcasts by default', () => {
      const error = new BroadcastError('txn-mempool-conflict');

      expect(error).toBeInstanceOf(NetworkError);
      expect(error.message).toBe('Broadcast failed: txn-mempool-conflict');
      expect(error.code).toBe('BROADCAST_ERROR');
      expect(error.retryable).toBe(false);
    });
  });

  describe('errorMessage', () => {
    it('should read the message of an Error', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
    });

    it('should stringify anything else', () => {
      expect(errorMessage('plain')).toBe('plain');
      expect(errorMessage(42)).toBe('42');
    });
  });
});
