import * as bitcoin from 'bitcoinjs-lib';
import { ConversionError } from './errors';
import { KeyKind, Network, PrefixScriptType, ScriptType, VersionInfo } from './types';

const hex = (version: number) => `0x${version.toString(16).padStart(8, '0')}`;

// SLIP-0132 headers, as Electrum registers them per network
const ENTRIES: ReadonlyArray<readonly [number, VersionInfo]> = [
  [bitcoin.networks.bitcoin.bip32.public, { prefix: 'xpub', network: 'bitcoin', keyKind: 'public' }],
  [bitcoin.networks.bitcoin.bip32.private, { prefix: 'xprv', network: 'bitcoin', keyKind: 'private' }],
  [0x049d7cb2, { prefix: 'ypub', network: 'bitcoin', keyKind: 'public', scriptType: 'p2sh-p2wpkh' }],
  [0x049d7878, { prefix: 'yprv', network: 'bitcoin', keyKind: 'private', scriptType: 'p2sh-p2wpkh' }],
  [0x0295b43f, { prefix: 'Ypub', network: 'bitcoin', keyKind: 'public', scriptType: 'p2sh-p2wsh' }],
  [0x0295b005, { prefix: 'Yprv', network: 'bitcoin', keyKind: 'private', scriptType: 'p2sh-p2wsh' }],
  [0x04b24746, { prefix: 'zpub', network: 'bitcoin', keyKind: 'public', scriptType: 'p2wpkh' }],
  [0x04b2430c, { prefix: 'zprv', network: 'bitcoin', keyKind: 'private', scriptType: 'p2wpkh' }],
  [0x02aa7ed3, { prefix: 'Zpub', network: 'bitcoin', keyKind: 'public', scriptType: 'p2wsh' }],
  [0x02aa7a99, { prefix: 'Zprv', network: 'bitcoin', keyKind: 'private', scriptType: 'p2wsh' }],
  [bitcoin.networks.testnet.bip32.public, { prefix: 'tpub', network: 'testnet', keyKind: 'public' }],
  [bitcoin.networks.testnet.bip32.private, { prefix: 'tprv', network: 'testnet', keyKind: 'private' }],
  [0x044a5262, { prefix: 'upub', network: 'testnet', keyKind: 'public', scriptType: 'p2sh-p2wpkh' }],
  [0x044a4e28, { prefix: 'uprv', network: 'testnet', keyKind: 'private', scriptType: 'p2sh-p2wpkh' }],
  [0x024289ef, { prefix: 'Upub', network: 'testnet', keyKind: 'public', scriptType: 'p2sh-p2wsh' }],
  [0x024285b5, { prefix: 'Uprv', network: 'testnet', keyKind: 'private', scriptType: 'p2sh-p2wsh' }],
  [0x045f1cf6, { prefix: 'vpub', network: 'testnet', keyKind: 'public', scriptType: 'p2wpkh' }],
  [0x045f18bc, { prefix: 'vprv', network: 'testnet', keyKind: 'private', scriptType: 'p2wpkh' }],
  [0x02575483, { prefix: 'Vpub', network: 'testnet', keyKind: 'public', scriptType: 'p2wsh' }],
  [0x02575048, { prefix: 'Vprv', network: 'testnet', keyKind: 'private', scriptType: 'p2wsh' }],
];

export const VERSIONS: ReadonlyMap<number, Readonly<VersionInfo>> = new Map(ENTRIES);

export const NETWORKS: Readonly<Record<Network, bitcoin.Network>> = {
  bitcoin: bitcoin.networks.bitcoin,
  testnet: bitcoin.networks.testnet,
};

export const lookup = (version: number): Readonly<VersionInfo> => {
  const info = VERSIONS.get(version);
  if (!info) throw new ConversionError('UnknownVersionByte', `Unknown extended key version ${hex(version)}`);
  return info;
};

const find = (network: Network, keyKind: KeyKind, scriptType?: PrefixScriptType): number | undefined => {
  for (const [version, info] of VERSIONS) {
    if (info.network === network && info.keyKind === keyKind && info.scriptType === scriptType) return version;
  }
  return undefined;
};

export const reverseLookup = (network: Network, scriptType: ScriptType, keyKind: KeyKind): number => {
  const version = scriptType === 'p2pkh' || scriptType === 'p2sh' ? undefined : find(network, keyKind, scriptType);
  if (version === undefined) {
    throw new ConversionError('NoCanonicalVersion', `No SLIP-132 prefix for ${scriptType} ${keyKind} keys on ${network}`);
  }
  return version;
};

/** How `other` differs from `info` in network or SLIP-132 script type, or undefined when it does not. */
export const mismatch = (info: VersionInfo, other: VersionInfo): string | undefined => {
  if (other.network !== info.network) return `${info.network} and ${other.network} keys`;
  if (other.scriptType !== info.scriptType) return `${info.prefix} and ${other.prefix} keys`;
  return undefined;
};

/** Generic xpub/xprv/tpub/tprv version for the network and key kind of `version`. */
export const canonicalize = (version: number): number => {
  const { network, keyKind } = lookup(version);
  const bip32 = NETWORKS[network].bip32;
  return keyKind === 'public' ? bip32.public : bip32.private;
};
