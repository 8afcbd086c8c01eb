/**
 * Global test setup
 * Registers the secp256k1 backend with bitcoinjs-lib before any suite runs
 */

import * as bitcoin from 'bitcoinjs-lib';
import * as ecc from 'tiny-secp256k1';

bitcoin.initEccLib(ecc);
