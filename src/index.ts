export { BODY_LENGTH, canonicalKey, decode, encode, keyBody, readExtendedKey, writeExtendedKey } from './codec';
export type { RawKey } from './codec';
export { descriptorToKeys, descriptorToWallet, keyToDescriptors, walletToDescriptors } from './convert';
export { buildDescriptors, isMultisig } from './descriptor';
export { attempt, ConversionError } from './errors';
export type { ErrorKind, Failure, Result } from './errors';
export { parseDescriptor } from './parser';
export * from './types';
export { canonicalize, lookup, mismatch, reverseLookup, VERSIONS } from './versions';
export { buildWallet, parseWallet } from './wallet';
