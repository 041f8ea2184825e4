import { ConversionError } from './errors';
import { Branch, MultisigKind, ParsedDescriptor, ScriptKind, SingleSigKind } from './types';

interface Call {
  name: string;
  args: Node[];
}

type Node = Call | string;

const KEY_EXPRESSION = /^([1-9A-HJ-NP-Za-km-z]+)(?:\/([01])\/\*)?$/;
const THRESHOLD = /^\d+$/;

const malformed = (detail: string) => new ConversionError('MalformedDescriptor', detail);
const unsupported = (detail: string) => new ConversionError('UnsupportedDescriptorGrammar', detail);

const show = (node: Node): string => (typeof node === 'string' ? node : `${node.name}(...)`);

class Reader {
  private pos = 0;

  constructor(private readonly text: string) {}

  read(): Node {
    const node = this.node();
    if (this.pos !== this.text.length) throw malformed(`Unexpected '${this.text[this.pos]}' at offset ${this.pos}`);
    return node;
  }

  private node(): Node {
    const start = this.pos;
    while (this.pos < this.text.length && !'(),'.includes(this.text[this.pos])) this.pos++;
    const token = this.text.slice(start, this.pos);
    if (this.text[this.pos] !== '(') {
      if (!token) throw malformed(`Expected an expression at offset ${start}`);
      return token;
    }
    this.pos++;
    const args = [this.node()];
    while (this.text[this.pos] === ',') {
      this.pos++;
      args.push(this.node());
    }
    if (this.text[this.pos] !== ')') throw malformed(`Unbalanced parentheses after ${token}(`);
    this.pos++;
    return { name: token, args };
  }
}

interface Shape {
  kind: ScriptKind;
  keys: string[];
}

const only = (call: Call): Node => {
  if (call.args.length !== 1) throw malformed(`${call.name}() takes one argument, got ${call.args.length}`);
  return call.args[0];
};

const single = (call: Call, type: SingleSigKind['type']): Shape => {
  const key = only(call);
  if (typeof key !== 'string') throw unsupported(`${call.name}(${show(key)}) is not supported`);
  return { kind: { type }, keys: [key] };
};

const multisig = (node: Node, type: MultisigKind['type']): Shape => {
  if (typeof node === 'string' || (node.name !== 'multi' && node.name !== 'sortedmulti')) {
    throw unsupported(`Expected multi(...) or sortedmulti(...), found ${show(node)}`);
  }
  const { name } = node;
  const [threshold, ...keys] = node.args;
  if (keys.length === 0) throw malformed(`${name}() needs a threshold and at least one key`);
  if (typeof threshold !== 'string' || !THRESHOLD.test(threshold)) throw malformed(`Threshold must be a number, got ${show(threshold)}`);
  const m = Number(threshold);
  if (m < 1 || m > keys.length) throw malformed(`Threshold ${m} is outside 1..${keys.length}`);
  return {
    kind: { type, threshold: m, total: keys.length, sorted: name === 'sortedmulti' },
    keys: keys.map(key => {
      if (typeof key !== 'string') throw unsupported(`${show(key)} inside ${name}() is not supported`);
      return key;
    }),
  };
};

const shape = (root: Node): Shape => {
  if (typeof root === 'string') throw unsupported(`${root} is not wrapped in a script function`);
  switch (root.name) {
    case 'pkh':
      return single(root, 'p2pkh');
    case 'wpkh':
      return single(root, 'p2wpkh');
    case 'wsh':
      return multisig(only(root), 'p2wsh');
    case 'sh': {
      const inner = only(root);
      if (typeof inner !== 'string') {
        if (inner.name === 'wpkh') return single(inner, 'p2sh-p2wpkh');
        if (inner.name === 'wsh') return multisig(only(inner), 'p2sh-p2wsh');
        if (inner.name === 'multi' || inner.name === 'sortedmulti') return multisig(inner, 'p2sh');
      }
      throw unsupported(`sh(${show(inner)}) is not supported`);
    }
    default:
      throw unsupported(`${root.name}() is not supported`);
  }
};

/**
 * Parses one of `pkh`, `wpkh`, `sh(wpkh)`, `sh(multi)`, `wsh(multi)` or `sh(wsh(multi))`
 * (`sortedmulti` accepted wherever `multi` is). `branch` is set when every key ends in the
 * same `/0/*` or `/1/*` suffix and left out when none do.
 */
export const parseDescriptor = (text: string): ParsedDescriptor => {
  const { kind, keys } = shape(new Reader(text).read());
  const branches = new Set<string | undefined>();
  const stripped = keys.map(expr => {
    const match = KEY_EXPRESSION.exec(expr);
    if (!match) throw malformed(`Malformed key expression ${expr}`);
    branches.add(match[2]);
    return match[1];
  });
  if (branches.size > 1) throw malformed('Keys use different derivation branches');
  const [suffix] = branches;
  return suffix === undefined ? { kind, keys: stripped } : { kind, keys: stripped, branch: suffix === '1' ? 1 : 0 };
};

export const branchOf = (descriptor: ParsedDescriptor): Branch => {
  if (descriptor.branch === undefined) throw malformed('Key expressions must end in /0/* or /1/*');
  return descriptor.branch;
};
