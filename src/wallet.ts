import * as ecc from '@bitcoin-js/tiny-secp256k1-asmjs';
import BIP32Factory from 'bip32';
import { z } from 'zod';
import { canonicalKey, readExtendedKey, writeExtendedKey } from './codec';
import { checkMultisig, isMultisig } from './descriptor';
import { ConversionError, message } from './errors';
import { ExtendedKey, KeyKind, Keystore, ScriptKind, WalletContents, WalletFields } from './types';
import { mismatch, NETWORKS, reverseLookup } from './versions';

const bip32 = BIP32Factory(ecc);

const KeystoreSchema = z.object({
  type: z.string().default('bip32'),
  xpub: z.string(),
  xprv: z.string().nullish(),
});

const WalletSchema = z
  .object({
    wallet_type: z.string().default('standard'),
  })
  .passthrough();

const WALLET_TYPE = /^(\d+)of(\d+)$/;
const MULTISIG_SLOT = /^x([1-9]\d*)\/$/;

const invalid = (detail: string) => new ConversionError('InvalidWalletFile', detail);

const issues = (error: z.ZodError) => error.issues.map(issue => `${issue.path.join('.') || 'wallet'}: ${issue.message}`).join('; ');

interface WalletType {
  threshold: number;
  total: number;
}

const parseWalletType = (walletType: string): WalletType | undefined => {
  if (walletType === 'standard') return undefined;
  const match = WALLET_TYPE.exec(walletType);
  if (!match) throw new ConversionError('UnsupportedWalletType', `Unsupported wallet type: ${walletType}`);
  const threshold = Number(match[1]);
  const total = Number(match[2]);
  if (total < 2) throw invalid(`Multisig with ${total} signer is not a multisig wallet`);
  if (threshold < 1 || threshold > total) throw invalid(`Threshold ${threshold} must be between 1 and ${total}`);
  return { threshold, total };
};

const readKeystore = (slot: string, value: unknown): ExtendedKey => {
  const parsed = KeystoreSchema.safeParse(value);
  if (!parsed.success) throw invalid(`${slot}: ${issues(parsed.error)}`);
  return readExtendedKey(parsed.data.xprv ?? parsed.data.xpub);
};

const multisigSlots = (fields: Record<string, unknown>): string[] =>
  Object.keys(fields)
    .map(slot => ({ slot, match: MULTISIG_SLOT.exec(slot) }))
    .flatMap(({ slot, match }) => (match ? [{ slot, index: Number(match[1]) }] : []))
    .sort((a, b) => a.index - b.index)
    .map(({ slot }) => slot);

const scriptKindOf = (key: ExtendedKey, multisig: WalletType | undefined): ScriptKind => {
  const { scriptType } = key;
  if (!multisig) {
    if (scriptType === undefined) return { type: 'p2pkh' };
    if (scriptType === 'p2sh-p2wpkh' || scriptType === 'p2wpkh') return { type: scriptType };
    throw invalid(`${key.prefix} keys belong to multisig wallets, not standard ones`);
  }
  const { threshold, total } = multisig;
  if (scriptType === undefined) return { type: 'p2sh', threshold, total, sorted: true };
  if (scriptType === 'p2sh-p2wsh' || scriptType === 'p2wsh') return { type: scriptType, threshold, total, sorted: true };
  throw invalid(`${key.prefix} keys belong to single-signature wallets, not multisig ones`);
};

/**
 * Reads an Electrum wallet: `wallet_type` is `standard` or `<m>of<n>`, the keys sit under
 * `keystore` or `x1/`..`xn/`, and the SLIP-132 prefix of the first key names the script type.
 * Electrum sorts multisig keys, so multisig kinds come back with `sorted` set.
 */
export const parseWallet = (fields: unknown): WalletContents => {
  const parsed = WalletSchema.safeParse(fields);
  if (!parsed.success) throw invalid(issues(parsed.error));
  const wallet = parsed.data;
  const multisig = parseWalletType(wallet.wallet_type);

  const slots = multisig ? multisigSlots(wallet) : ['keystore'].filter(slot => slot in wallet);
  if (slots.length === 0) throw invalid(multisig ? 'No x1/ keystore found' : 'No keystore found');
  if (multisig && slots.length > multisig.total) {
    throw invalid(`${wallet.wallet_type} wallet has ${slots.length} keystores`);
  }

  const [key, ...cosigners] = slots.map(slot => readKeystore(slot, wallet[slot]));
  for (const cosigner of cosigners) {
    const detail = mismatch(key, cosigner);
    if (detail) throw invalid(`Keystores mix ${detail}`);
  }
  return { key, kind: scriptKindOf(key, multisig), cosigners };
};

const electrumVersion = (key: ExtendedKey, kind: ScriptKind, keyKind: KeyKind): number => {
  if (kind.type === 'p2pkh' || kind.type === 'p2sh') {
    const generic = NETWORKS[key.network].bip32;
    return keyKind === 'public' ? generic.public : generic.private;
  }
  return reverseLookup(key.network, kind.type, keyKind);
};

const neuter = (key: ExtendedKey): ExtendedKey => {
  try {
    return readExtendedKey(bip32.fromBase58(canonicalKey(key), NETWORKS[key.network]).neutered().toBase58());
  } catch (err) {
    if (err instanceof ConversionError) throw err;
    throw invalid(`Cannot derive public key: ${message(err)}`);
  }
};

const keystore = (key: ExtendedKey, kind: ScriptKind): Keystore => {
  if (key.keyKind === 'public') {
    return { type: 'bip32', xpub: writeExtendedKey(key, electrumVersion(key, kind, 'public')) };
  }
  return {
    type: 'bip32',
    xpub: writeExtendedKey(neuter(key), electrumVersion(key, kind, 'public')),
    xprv: writeExtendedKey(key, electrumVersion(key, kind, 'private')),
  };
};

export const buildWallet = (key: ExtendedKey, kind: ScriptKind, cosigners: readonly ExtendedKey[] = []): WalletFields => {
  const fields: WalletFields = {
    addresses: { receiving: [], change: [] },
    wallet_type: 'standard',
  };
  if (!isMultisig(kind)) {
    if (cosigners.length > 0) throw invalid(`Standard wallets hold one keystore, got ${cosigners.length + 1}`);
    fields.keystore = keystore(key, kind);
    return fields;
  }
  if (!kind.sorted) {
    throw new ConversionError('UnsupportedDescriptorGrammar', 'Electrum sorts multisig keys; use sortedmulti(...) instead of multi(...)');
  }
  checkMultisig(kind, cosigners.length);
  fields.wallet_type = `${kind.threshold}of${kind.total}`;
  [key, ...cosigners].forEach((k, i) => {
    const slot: `x${number}/` = `x${i + 1}/`;
    fields[slot] = keystore(k, kind);
  });
  return fields;
};
