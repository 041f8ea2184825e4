export type Network = 'bitcoin' | 'testnet';

export type KeyKind = 'public' | 'private';

export interface SingleSigKind {
  type: 'p2pkh' | 'p2sh-p2wpkh' | 'p2wpkh';
}

export interface MultisigKind {
  type: 'p2sh' | 'p2sh-p2wsh' | 'p2wsh';
  threshold: number;
  total: number;
  sorted: boolean; // sortedmulti instead of multi
}

export type ScriptKind = SingleSigKind | MultisigKind;

export type ScriptType = ScriptKind['type'];

// script types that have their own SLIP-132 prefix
export type PrefixScriptType = Exclude<ScriptType, 'p2pkh' | 'p2sh'>;

export interface VersionInfo {
  prefix: string;
  network: Network;
  keyKind: KeyKind;
  scriptType?: PrefixScriptType;
}

export interface ExtendedKey extends Readonly<VersionInfo> {
  readonly version: number;
  readonly depth: number;
  readonly parentFingerprint: Buffer;
  readonly childNumber: number;
  readonly chainCode: Buffer;
  readonly keyMaterial: Buffer; // compressed pubkey, or 0x00 + private scalar
}

export type Branch = 0 | 1;

export type DescriptorPair = [receive: string, change: string];

export interface ParsedDescriptor {
  kind: ScriptKind;
  keys: string[];
  branch?: Branch;
}

export interface MultisigOptions {
  threshold: number;
  cosigners: string[];
  sorted?: boolean;
}

export interface Addresses {
  receiving: string[];
  change: string[];
}

export interface Keystore {
  type: string;
  xpub: string;
  xprv?: string;
}

export type KeystoreSlot = 'keystore' | `x${number}/`;

export type WalletFields = {
  addresses: Addresses;
  wallet_type: string;
} & { [slot in KeystoreSlot]?: Keystore };

export interface WalletContents {
  key: ExtendedKey;
  kind: ScriptKind;
  cosigners: ExtendedKey[];
}

export interface Options {
  reverse?: boolean;
  output?: string;
  cosigner?: string[];
  threshold?: string;
  sorted?: boolean;
}
