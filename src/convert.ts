import { canonicalKey, readExtendedKey, writeExtendedKey } from './codec';
import { buildDescriptors } from './descriptor';
import { attempt, ConversionError, Result } from './errors';
import { branchOf, parseDescriptor } from './parser';
import { DescriptorPair, ExtendedKey, MultisigOptions, ParsedDescriptor, ScriptKind, WalletFields } from './types';
import { mismatch, reverseLookup } from './versions';
import { buildWallet, parseWallet } from './wallet';

const keyScriptKind = (key: ExtendedKey, multisig?: MultisigOptions): ScriptKind => {
  const { scriptType } = key;
  if (scriptType === 'p2sh-p2wpkh' || scriptType === 'p2wpkh') {
    if (multisig) throw new ConversionError('MalformedDescriptor', `${key.prefix} keys are single-signature, cosigners are not allowed`);
    return { type: scriptType };
  }
  if (!multisig) {
    if (scriptType === undefined) return { type: 'p2pkh' };
    throw new ConversionError('MissingCosignerKey', `${key.prefix} keys are multisig keys and need cosigner keys`);
  }
  return {
    type: scriptType ?? 'p2sh',
    threshold: multisig.threshold,
    total: multisig.cosigners.length + 1,
    sorted: multisig.sorted ?? false,
  };
};

// every key of one script must share the subject key's network and prefix
const checkKeys = ([key, ...others]: readonly ExtendedKey[]) => {
  for (const other of others) {
    const detail = mismatch(key, other);
    if (detail) throw new ConversionError('MalformedDescriptor', `Keys mix ${detail}`);
  }
};

/** Bare-key conversion: a SLIP-132 or generic extended key string to its receive/change descriptors. */
export const keyToDescriptors = (input: string, multisig?: MultisigOptions): Result<DescriptorPair> =>
  attempt(() => {
    const key = readExtendedKey(input);
    const kind = keyScriptKind(key, multisig);
    const cosigners = (multisig?.cosigners ?? []).map(readExtendedKey);
    checkKeys([key, ...cosigners]);
    return buildDescriptors(canonicalKey(key), kind, cosigners.map(canonicalKey));
  });

export const walletToDescriptors = (fields: unknown): Result<DescriptorPair> =>
  attempt(() => {
    const { key, kind, cosigners } = parseWallet(fields);
    return buildDescriptors(canonicalKey(key), kind, cosigners.map(canonicalKey));
  });

const embeddedKeys = (descriptor: ParsedDescriptor): ExtendedKey[] => {
  const keys = descriptor.keys.map(expr => {
    const key = readExtendedKey(expr);
    if (key.scriptType !== undefined) {
      throw new ConversionError('MalformedDescriptor', `Descriptor keys must be plain extended keys, found ${key.prefix}`);
    }
    return key;
  });
  checkKeys(keys);
  return keys;
};

/** Reverse conversion: one descriptor of either branch to the Electrum wallet fields that produce it. */
export const descriptorToWallet = (text: string): Result<WalletFields> =>
  attempt(() => {
    const descriptor = parseDescriptor(text);
    branchOf(descriptor);
    const [key, ...cosigners] = embeddedKeys(descriptor);
    return buildWallet(key, descriptor.kind, cosigners);
  });

/** Re-applies the SLIP-132 prefix the descriptor's script implies to every key it embeds. */
export const descriptorToKeys = (text: string): Result<string[]> =>
  attempt(() => {
    const descriptor = parseDescriptor(text);
    return embeddedKeys(descriptor).map(key =>
      writeExtendedKey(key, reverseLookup(key.network, descriptor.kind.type, key.keyKind)),
    );
  });
