import { isCancel, password } from '@clack/prompts'

import { DecryptionError } from '../errors/crypto.error'

/** What the key loader knows when it asks for a passphrase. */
export interface PassphraseRequest {
  /** Path of the key file being imported. */
  path: string
  /** 1-based import attempt. */
  attempt: number
}

/**
 * @summary Supplies the passphrase for an encrypted private key.
 * @remarks
 * Injected into {@link ServiceKeyLoader} so the interactive prompt can be swapped for a
 * fixed list or a secret manager.
 */
export type PassphraseSource = (request: PassphraseRequest) => Promise<string>

/**
 * @summary Prompt for the passphrase on the terminal, masking input.
 * @throws {@link DecryptionError} when the prompt is cancelled.
 */
export const terminalPassphraseSource: PassphraseSource = async ({ path }) => {
  const value = await password({
    message: `Enter the password for the private key (${path})`,
  })
  if (isCancel(value)) {
    throw new DecryptionError('Passphrase entry cancelled', { path })
  }
  return value
}

/**
 * @summary Answer attempt `n` with the `n`-th passphrase; an empty string once exhausted.
 */
export function fixedPassphraseSource(passphrases: readonly string[]): PassphraseSource {
  return async ({ attempt }) => passphrases[attempt - 1] ?? ''
}
