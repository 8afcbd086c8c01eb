/**
 * Descriptor engine
 */

export { addChecksum, descriptorChecksum, verifyChecksum } from './checksum.ts';
export { formatPath, parseDescriptor } from './descriptor-parser.ts';
export {
  assertDescriptorPair,
  deriveFixed,
  deriveScript,
  keyFingerprint,
  MAX_CHILD_INDEX,
  specialiseDescriptor,
} from './descriptor-deriver.ts';
