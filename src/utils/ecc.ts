/**
 * secp256k1 wiring shared by every module that touches keys
 */

import * as bitcoin from 'bitcoinjs-lib';
import { BIP32Factory } from 'bip32';
import * as ecc from 'tiny-secp256k1';

// Taproot destinations are validated through the ECC backend
bitcoin.initEccLib(ecc);

export const bip32 = BIP32Factory(ecc);

export { ecc };
