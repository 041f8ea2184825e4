import { Command } from 'commander';
import * as fs from 'fs';
import { description, name, version } from '../package.json';
import { descriptorToWallet, keyToDescriptors, walletToDescriptors } from './convert';
import { Failure, message, Result } from './errors';
import { DescriptorPair, MultisigOptions, Options } from './types';

const THRESHOLD = /^\d+$/;

const CODEC_FAILURES = new Set(['InvalidBase58', 'InvalidLength', 'InvalidChecksum']);

const report = (failure: Failure) => {
  console.error(`${failure.kind}: ${failure.detail}`);
  process.exitCode = 1;
};

const readWalletFile = (file: string): Result<DescriptorPair> => {
  let fields: unknown;
  try {
    fields = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (err) {
    return { ok: false, error: { kind: 'InvalidWalletFile', detail: `${file}: ${message(err)}` } };
  }
  return walletToDescriptors(fields);
};

// a key string is tried first; an input that does not decode as one is read as a wallet file path
const convert = (input: string, multisig?: MultisigOptions): Result<DescriptorPair> => {
  const fromKey = keyToDescriptors(input, multisig);
  if (fromKey.ok || !CODEC_FAILURES.has(fromKey.error.kind) || !fs.existsSync(input)) return fromKey;
  return readWalletFile(input);
};

const multisigOptions = (opts: Options): MultisigOptions | undefined => {
  if (opts.threshold === undefined && !opts.cosigner) return undefined;
  if (opts.threshold === undefined) throw new Error('--threshold is required with --cosigner');
  if (!THRESHOLD.test(opts.threshold)) throw new Error(`Threshold must be a number, got ${opts.threshold}`);
  return { threshold: Number(opts.threshold), cosigners: opts.cosigner ?? [], sorted: !!opts.sorted };
};

const toWallet = (descriptor: string, output?: string) => {
  const result = descriptorToWallet(descriptor);
  if (!result.ok) return report(result.error);
  const json = JSON.stringify(result.value, null, 2);
  if (!output) {
    console.log(json);
    return;
  }
  fs.writeFileSync(output, json, { mode: 0o600 });
  console.log(`Wallet written to ${output}`);
};

const toDescriptors = (input: string, opts: Options) => {
  let multisig: MultisigOptions | undefined;
  try {
    multisig = multisigOptions(opts);
  } catch (err) {
    console.error(message(err));
    process.exitCode = 1;
    return;
  }
  const result = convert(input, multisig);
  if (!result.ok) return report(result.error);
  console.log(JSON.stringify(result.value));
};

export const createProgram = (): Command =>
  new Command()
    .name(name)
    .description(description)
    .version(version)
    .argument('<input>', 'SLIP-132 extended key, Electrum wallet file, or descriptor with --reverse')
    .option('-r, --reverse', 'Convert a descriptor into an Electrum wallet file')
    .option('-o, --output <file>', 'Write the wallet file here instead of printing it (with --reverse)')
    .option('-c, --cosigner <keys...>', 'Cosigner extended keys, in descriptor order')
    .option('-t, --threshold <m>', 'Signatures required for a multisig descriptor')
    .option('--sorted', 'Use sortedmulti instead of multi for multisig descriptors')
    .action((input: string, opts: Options) => {
      if (opts.reverse) toWallet(input, opts.output);
      else toDescriptors(input, opts);
    });
