import { ConversionError } from './errors';
import { Branch, DescriptorPair, MultisigKind, ScriptKind, SingleSigKind } from './types';

const SINGLE_SIG: Record<SingleSigKind['type'], (key: string) => string> = {
  p2pkh: key => `pkh(${key})`,
  'p2sh-p2wpkh': key => `sh(wpkh(${key}))`,
  p2wpkh: key => `wpkh(${key})`,
};

const MULTISIG: Record<MultisigKind['type'], (script: string) => string> = {
  p2sh: script => `sh(${script})`,
  'p2sh-p2wsh': script => `sh(wsh(${script}))`,
  p2wsh: script => `wsh(${script})`,
};

export const isMultisig = (kind: ScriptKind): kind is MultisigKind =>
  kind.type === 'p2sh' || kind.type === 'p2sh-p2wsh' || kind.type === 'p2wsh';

const expression = (key: string, branch: Branch) => `${key}/${branch}/*`;

export const checkMultisig = (kind: MultisigKind, cosigners: number) => {
  if (cosigners < kind.total - 1) {
    throw new ConversionError('MissingCosignerKey', `${kind.threshold}-of-${kind.total} needs ${kind.total - 1} cosigner keys, got ${cosigners}`);
  }
  if (cosigners > kind.total - 1) {
    throw new ConversionError('MissingCosignerKey', `${kind.threshold}-of-${kind.total} takes ${kind.total - 1} cosigner keys, got ${cosigners}`);
  }
  if (!Number.isInteger(kind.threshold) || kind.threshold < 1 || kind.threshold > kind.total) {
    throw new ConversionError('MalformedDescriptor', `Threshold ${kind.threshold} is outside 1..${kind.total}`);
  }
};

/**
 * Receive (`/0/*`) and change (`/1/*`) descriptors for `key`, which must already carry a
 * generic xpub/xprv/tpub/tprv prefix. Multisig keys keep the order given: subject key first.
 */
export const buildDescriptors = (key: string, kind: ScriptKind, cosigners: readonly string[] = []): DescriptorPair => {
  let render: (branch: Branch) => string;
  if (isMultisig(kind)) {
    checkMultisig(kind, cosigners.length);
    const wrap = MULTISIG[kind.type];
    const keys = [key, ...cosigners];
    const multi = `${kind.sorted ? 'sortedmulti' : 'multi'}(${kind.threshold}`;
    render = branch => wrap(`${multi},${keys.map(k => expression(k, branch)).join(',')})`);
  } else {
    if (cosigners.length > 0) {
      throw new ConversionError('MalformedDescriptor', `${kind.type} takes a single key, got ${cosigners.length} cosigners`);
    }
    const template = SINGLE_SIG[kind.type];
    render = branch => template(expression(key, branch));
  }
  return [render(0), render(1)];
};
