import type { ResultAsync } from 'neverthrow';
import type { EngineError } from '../domain/errors.js';

export type PassphraseSource =
  | { readonly kind: 'file'; readonly path: string }
  | { readonly kind: 'value'; readonly value: string };

/**
 * Port: authenticated encryption of the configuration bundle.
 *
 * `unseal` fails closed: a wrong passphrase or any modified byte yields a
 * `sealing` error, never partial plaintext.
 */
export interface SecretSealerPort {
  seal(plain: Uint8Array, passphrase: PassphraseSource): ResultAsync<Uint8Array, EngineError>;
  unseal(sealed: Uint8Array, passphrase: PassphraseSource): ResultAsync<Uint8Array, EngineError>;
}
