import * as ecc from '@bitcoin-js/tiny-secp256k1-asmjs';
import bs58 from 'bs58';
import * as bitcoin from 'bitcoinjs-lib';
import { ConversionError, message } from './errors';
import { ExtendedKey, KeyKind } from './types';
import { canonicalize, lookup } from './versions';

export const BODY_LENGTH = 74;
const VERSION_LENGTH = 4;
const CHECKSUM_LENGTH = 4;
const ENCODED_LENGTH = VERSION_LENGTH + BODY_LENGTH + CHECKSUM_LENGTH;

export interface RawKey {
  version: number;
  body: Buffer;
}

const checksum = (payload: Buffer): Buffer => bitcoin.crypto.hash256(payload).subarray(0, CHECKSUM_LENGTH);

export const decode = (s: string): RawKey => {
  let data: Buffer;
  try {
    data = Buffer.from(bs58.decode(s));
  } catch (err) {
    throw new ConversionError('InvalidBase58', message(err));
  }
  if (data.length !== ENCODED_LENGTH) {
    throw new ConversionError('InvalidLength', `Expected ${ENCODED_LENGTH} bytes, decoded ${data.length}`);
  }
  const payload = data.subarray(0, ENCODED_LENGTH - CHECKSUM_LENGTH);
  if (!checksum(payload).equals(data.subarray(ENCODED_LENGTH - CHECKSUM_LENGTH))) {
    throw new ConversionError('InvalidChecksum', 'Checksum does not match key data');
  }
  return { version: payload.readUInt32BE(0), body: Buffer.from(payload.subarray(VERSION_LENGTH)) };
};

export const encode = (version: number, body: Buffer): string => {
  if (body.length !== BODY_LENGTH) {
    throw new RangeError(`Extended key body must be ${BODY_LENGTH} bytes, got ${body.length}`);
  }
  const payload = Buffer.alloc(VERSION_LENGTH + BODY_LENGTH);
  payload.writeUInt32BE(version, 0);
  body.copy(payload, VERSION_LENGTH);
  return bs58.encode(Buffer.concat([payload, checksum(payload)]));
};

// private key material is 0x00 followed by the scalar
const validKeyMaterial = (keyKind: KeyKind, material: Buffer): boolean =>
  keyKind === 'private' ? material[0] === 0x00 && ecc.isPrivate(material.subarray(1)) : ecc.isPoint(material);

export const readExtendedKey = (s: string): ExtendedKey => {
  const { version, body } = decode(s);
  const info = lookup(version);
  const keyMaterial = body.subarray(41, BODY_LENGTH);
  if (!validKeyMaterial(info.keyKind, keyMaterial)) {
    throw new ConversionError('InvalidBase58', `${info.prefix} key data is not a valid ${info.keyKind} key`);
  }
  return {
    ...info,
    version,
    depth: body.readUInt8(0),
    parentFingerprint: body.subarray(1, 5),
    childNumber: body.readUInt32BE(5),
    chainCode: body.subarray(9, 41),
    keyMaterial,
  };
};

export const keyBody = (key: ExtendedKey): Buffer => {
  const body = Buffer.alloc(BODY_LENGTH);
  body.writeUInt8(key.depth, 0);
  key.parentFingerprint.copy(body, 1);
  body.writeUInt32BE(key.childNumber, 5);
  key.chainCode.copy(body, 9);
  key.keyMaterial.copy(body, 41);
  return body;
};

export const writeExtendedKey = (key: ExtendedKey, version: number = key.version): string => encode(version, keyBody(key));

/** The key re-encoded with the plain xpub/xprv/tpub/tprv prefix that descriptors expect. */
export const canonicalKey = (key: ExtendedKey): string => writeExtendedKey(key, canonicalize(key.version));
