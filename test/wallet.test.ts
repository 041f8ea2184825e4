import { describe, expect, it } from 'vitest';
import { canonicalKey, readExtendedKey } from '../src/codec';
import { attempt } from '../src/errors';
import { buildWallet, parseWallet } from '../src/wallet';
import {
  HW_TPUBS,
  HW_VPUBS,
  HW_ZPUB,
  LEGACY_TPUB,
  MULTI_TPRV,
  MULTI_TPUB,
  SEGWIT_TPRV,
  SEGWIT_VPRV,
  SEGWIT_VPUB,
  WRAPPED_TPUBS,
  WRAPPED_UPUBS,
} from './keys';
import { loadWallet } from './wallets';

const failure = (fn: () => unknown) => {
  const result = attempt(fn);
  return result.ok ? undefined : result.error;
};

const keystore = (xpub: string) => ({ type: 'bip32', xpub });

describe('parseWallet', () => {
  it('should prefer the private key of a segwit wallet', () => {
    const { key, kind, cosigners } = parseWallet(loadWallet('standard_segwit'));

    expect(kind).toEqual({ type: 'p2wpkh' });
    expect(key.keyKind).toBe('private');
    expect(canonicalKey(key)).toBe(SEGWIT_TPRV);
    expect(cosigners).toEqual([]);
  });

  it('should read a watch-only legacy wallet as p2pkh', () => {
    const { key, kind } = parseWallet(loadWallet('standard_legacy_watch'));

    expect(kind).toEqual({ type: 'p2pkh' });
    expect(canonicalKey(key)).toBe(LEGACY_TPUB);
  });

  it('should read hardware multisig keystores in slot order', () => {
    const { key, kind, cosigners } = parseWallet(loadWallet('multisig_segwit_hw'));

    expect(kind).toEqual({ type: 'p2wsh', threshold: 2, total: 2, sorted: true });
    expect([key, ...cosigners].map(canonicalKey)).toEqual(HW_TPUBS);
  });

  it('should order x1/ x2/ x3/ numerically whatever the field order', () => {
    const { key, kind, cosigners } = parseWallet(loadWallet('multisig_wrapped_watch'));

    expect(kind).toEqual({ type: 'p2sh-p2wsh', threshold: 2, total: 3, sorted: true });
    expect([key, ...cosigners].map(canonicalKey)).toEqual(WRAPPED_TPUBS);
  });

  it('should read plain-prefixed multisig keystores as p2sh', () => {
    const { key, kind, cosigners } = parseWallet(loadWallet('multisig_legacy'));

    expect(kind).toEqual({ type: 'p2sh', threshold: 2, total: 2, sorted: true });
    expect(canonicalKey(key)).toBe(MULTI_TPRV);
    expect(cosigners.map(canonicalKey)).toEqual([LEGACY_TPUB]);
  });

  it('should pass a short multisig wallet through for the builder to reject', () => {
    const { kind, cosigners } = parseWallet(loadWallet('multisig_missing_cosigner'));

    expect(kind).toEqual({ type: 'p2sh-p2wsh', threshold: 2, total: 3, sorted: true });
    expect(cosigners).toHaveLength(1);
  });

  it('should only read x1/ and up as multisig slots', () => {
    const fields = {
      wallet_type: '2of2',
      'x0/': keystore(HW_VPUBS[1]),
      'x1/': keystore(HW_VPUBS[0]),
      'x01/': keystore(HW_VPUBS[1]),
      'x2/': keystore(HW_VPUBS[1]),
    };
    const { key, cosigners } = parseWallet(fields);

    expect([key, ...cosigners].map(canonicalKey)).toEqual(HW_TPUBS);
  });

  it('should default a missing wallet_type to standard', () => {
    expect(parseWallet({ keystore: keystore(SEGWIT_VPUB) }).kind).toEqual({ type: 'p2wpkh' });
  });

  describe('errors', () => {
    it('should not support imported-address wallets', () => {
      expect(failure(() => parseWallet(loadWallet('imported_addresses')))).toEqual({
        kind: 'UnsupportedWalletType',
        detail: 'Unsupported wallet type: imported',
      });
    });

    it('should require a keystore', () => {
      expect(failure(() => parseWallet({ wallet_type: 'standard' }))).toEqual({
        kind: 'InvalidWalletFile',
        detail: 'No keystore found',
      });
      expect(failure(() => parseWallet({ wallet_type: '2of2' }))).toEqual({
        kind: 'InvalidWalletFile',
        detail: 'No x1/ keystore found',
      });
    });

    it('should require an xpub in the keystore', () => {
      expect(failure(() => parseWallet({ wallet_type: 'standard', keystore: { type: 'bip32' } }))).toEqual({
        kind: 'InvalidWalletFile',
        detail: 'keystore: xpub: Required',
      });
    });

    it('should reject something that is not a field mapping', () => {
      expect(failure(() => parseWallet('wallet'))?.kind).toBe('InvalidWalletFile');
    });

    it('should reject a threshold above the signer count', () => {
      expect(failure(() => parseWallet({ wallet_type: '3of2', 'x1/': keystore(HW_VPUBS[0]) }))).toEqual({
        kind: 'InvalidWalletFile',
        detail: 'Threshold 3 must be between 1 and 2',
      });
    });

    it('should reject more keystores than signers', () => {
      const fields = {
        wallet_type: '2of2',
        'x1/': keystore(WRAPPED_UPUBS[0]),
        'x2/': keystore(WRAPPED_UPUBS[1]),
        'x3/': keystore(WRAPPED_UPUBS[2]),
      };

      expect(failure(() => parseWallet(fields))).toEqual({ kind: 'InvalidWalletFile', detail: '2of2 wallet has 3 keystores' });
    });

    it('should reject multisig keys in a standard wallet', () => {
      expect(failure(() => parseWallet({ wallet_type: 'standard', keystore: keystore(HW_VPUBS[0]) }))).toEqual({
        kind: 'InvalidWalletFile',
        detail: 'Vpub keys belong to multisig wallets, not standard ones',
      });
    });

    it('should reject single-signature keys in a multisig wallet', () => {
      const fields = { wallet_type: '1of2', 'x1/': keystore(SEGWIT_VPUB), 'x2/': keystore(SEGWIT_VPUB) };

      expect(failure(() => parseWallet(fields))).toEqual({
        kind: 'InvalidWalletFile',
        detail: 'vpub keys belong to single-signature wallets, not multisig ones',
      });
    });

    it('should reject keystores from different networks', () => {
      const fields = { wallet_type: '2of2', 'x1/': keystore(HW_VPUBS[0]), 'x2/': keystore(HW_ZPUB) };

      expect(failure(() => parseWallet(fields))).toEqual({
        kind: 'InvalidWalletFile',
        detail: 'Keystores mix testnet and bitcoin keys',
      });
    });

    it('should reject keystores with different script prefixes', () => {
      const fields = { wallet_type: '2of2', 'x1/': keystore(HW_VPUBS[0]), 'x2/': keystore(WRAPPED_UPUBS[0]) };

      expect(failure(() => parseWallet(fields))).toEqual({
        kind: 'InvalidWalletFile',
        detail: 'Keystores mix Vpub and Upub keys',
      });
    });

    it('should surface checksum errors in keystore keys', () => {
      const broken = `${SEGWIT_VPUB.slice(0, 60)}2${SEGWIT_VPUB.slice(61)}`;

      expect(failure(() => parseWallet({ keystore: keystore(broken) }))?.kind).toBe('InvalidChecksum');
    });
  });
});

describe('buildWallet', () => {
  it('should store a private segwit key with its SLIP-132 xpub and xprv', () => {
    expect(buildWallet(readExtendedKey(SEGWIT_TPRV), { type: 'p2wpkh' })).toEqual({
      addresses: { receiving: [], change: [] },
      wallet_type: 'standard',
      keystore: { type: 'bip32', xpub: SEGWIT_VPUB, xprv: SEGWIT_VPRV },
    });
  });

  it('should keep plain prefixes for legacy multisig', () => {
    const kind = { type: 'p2sh', threshold: 2, total: 2, sorted: true } as const;

    expect(buildWallet(readExtendedKey(MULTI_TPRV), kind, [readExtendedKey(LEGACY_TPUB)])).toEqual({
      addresses: { receiving: [], change: [] },
      wallet_type: '2of2',
      'x1/': { type: 'bip32', xpub: MULTI_TPUB, xprv: MULTI_TPRV },
      'x2/': { type: 'bip32', xpub: LEGACY_TPUB },
    });
  });

  it('should refuse unsorted multisig', () => {
    const kind = { type: 'p2wsh', threshold: 1, total: 2, sorted: false } as const;

    expect(failure(() => buildWallet(readExtendedKey(HW_TPUBS[0]), kind, [readExtendedKey(HW_TPUBS[1])]))?.kind).toBe(
      'UnsupportedDescriptorGrammar',
    );
  });

  it('should refuse a standard wallet with cosigners', () => {
    expect(failure(() => buildWallet(readExtendedKey(LEGACY_TPUB), { type: 'p2pkh' }, [readExtendedKey(MULTI_TPUB)]))).toEqual({
      kind: 'InvalidWalletFile',
      detail: 'Standard wallets hold one keystore, got 2',
    });
  });
});
