/**
 * Dust Calculator Tests
 *
 * Thresholds follow Bitcoin Core's GetDustThreshold at the 3 sat/vB dust
 * relay fee.
 */

import { Buffer } from 'node:buffer';

import { beforeEach, describe, expect, it } from 'vitest';

import {
  classifyOutputScript,
  DustCalculator,
  isWitnessProgram,
} from '../../../src/utils/dust-calculator.ts';

const P2PKH = Buffer.concat([Buffer.from('76a914', 'hex'), Buffer.alloc(20, 1), Buffer.from('88ac', 'hex')]);
const P2SH = Buffer.concat([Buffer.from('a914', 'hex'), Buffer.alloc(20, 2), Buffer.from('87', 'hex')]);
const P2WPKH = Buffer.concat([Buffer.from('0014', 'hex'), Buffer.alloc(20, 3)]);
const P2WSH = Buffer.concat([Buffer.from('0020', 'hex'), Buffer.alloc(32, 4)]);
const P2TR = Buffer.concat([Buffer.from('5120', 'hex'), Buffer.alloc(32, 5)]);

describe('DustCalculator', () => {
  let calculator: DustCalculator;

  beforeEach(() => {
    calculator = new DustCalculator();
  });

  describe('thresholds by output type', () => {
    it('should match the standard relay thresholds', () => {
      expect(calculator.calculateDustThreshold('P2PKH')).toBe(546);
      expect(calculator.calculateDustThreshold('P2WPKH')).toBe(294);
      expect(calculator.calculateDustThreshold('P2SH')).toBe(540);
      expect(calculator.calculateDustThreshold('P2WSH')).toBe(330);
      expect(calculator.calculateDustThreshold('P2TR')).toBe(330);
    });

    it('should scale with an explicit fee rate', () => {
      expect(calculator.calculateDustThreshold('P2WPKH', 1)).toBe(98);
      expect(calculator.calculateDustThreshold('P2PKH', 1)).toBe(182);
    });

    it('should take the relay rate from the constructor', () => {
      expect(new DustCalculator({ dustRelayFeeRate: 1 }).calculateDustThreshold('P2WSH')).toBe(110);
    });
  });

  describe('thresholdForScript', () => {
    it('should price witness programs at the discounted spend size', () => {
      expect(calculator.thresholdForScript(P2WPKH)).toBe(294);
      expect(calculator.thresholdForScript(P2TR)).toBe(330);
    });

    it('should price legacy scripts at the full spend size', () => {
      expect(calculator.thresholdForScript(P2PKH)).toBe(546);
      expect(calculator.thresholdForScript(P2SH)).toBe(540);
    });
  });

});

describe('script classification', () => {
  it('should recognise witness programs of any version', () => {
    expect(isWitnessProgram(P2WPKH)).toBe(true);
    expect(isWitnessProgram(P2WSH)).toBe(true);
    expect(isWitnessProgram(P2TR)).toBe(true);
    expect(isWitnessProgram(P2PKH)).toBe(false);
    expect(isWitnessProgram(Buffer.from('0014', 'hex'))).toBe(false);
  });

  it('should name the standard output types', () => {
    expect(classifyOutputScript(P2PKH)).toBe('P2PKH');
    expect(classifyOutputScript(P2SH)).toBe('P2SH');
    expect(classifyOutputScript(P2WPKH)).toBe('P2WPKH');
    expect(classifyOutputScript(P2WSH)).toBe('P2WSH');
    expect(classifyOutputScript(P2TR)).toBe('P2TR');
    expect(classifyOutputScript(Buffer.from('6a0401020304', 'hex'))).toBeUndefined();
  });
});
