export type ErrorKind =
  | 'InvalidBase58'
  | 'InvalidChecksum'
  | 'InvalidLength'
  | 'UnknownVersionByte'
  | 'NoCanonicalVersion'
  | 'UnsupportedDescriptorGrammar'
  | 'MalformedDescriptor'
  | 'UnsupportedWalletType'
  | 'InvalidWalletFile'
  | 'MissingCosignerKey';

export interface Failure {
  kind: ErrorKind;
  detail: string;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: Failure };

export class ConversionError extends Error {
  constructor(readonly kind: ErrorKind, readonly detail: string) {
    super(`${kind}: ${detail}`);
    this.name = 'ConversionError';
  }
}

export const message = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * Runs a conversion step and turns a raised `ConversionError` into a failed `Result`.
 * Any other exception is a bug and is rethrown.
 */
export const attempt = <T>(fn: () => T): Result<T> => {
  try {
    return { ok: true, value: fn() };
  } catch (err) {
    if (err instanceof ConversionError) {
      return { ok: false, error: { kind: err.kind, detail: err.detail } };
    }
    throw err;
  }
};
