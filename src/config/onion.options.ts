import { terminalPassphraseSource } from '../keystore/passphrase-source'

import type { PassphraseSource } from '../keystore/passphrase-source'
import type { ModuleMetadata } from '@nestjs/common'

export interface OnionModuleOptions {
  enableKeyLoader?: boolean
  enableControl?: boolean
  /** Import attempts for an RSA private key before giving up (default: 3) */
  keyDecryptRetries?: number
  /** Wait before re-authenticating to the control port (default: 10s) */
  reauthDelayMs?: number
  controlPassword?: string
  passphraseSource?: PassphraseSource
  /** Current time in seconds since the epoch */
  clock?: () => number
}

export type OnionModuleAsyncOptions = Pick<ModuleMetadata, 'imports'> & {
  useFactory: (...args: unknown[]) => Promise<OnionModuleOptions> | OnionModuleOptions
  inject?: ReadonlyArray<
    | import('@nestjs/common').InjectionToken
    | import('@nestjs/common').OptionalFactoryDependency
  >
}

export type ResolvedOnionModuleOptions = Required<
  Omit<OnionModuleOptions, 'controlPassword'>
> &
  Pick<OnionModuleOptions, 'controlPassword'>

export const defaultOnionOptions: ResolvedOnionModuleOptions = {
  enableKeyLoader: true,
  enableControl: true,
  keyDecryptRetries: 3,
  reauthDelayMs: 10_000,
  passphraseSource: terminalPassphraseSource,
  clock: () => Math.floor(Date.now() / 1000),
}

/**
 * @summary Fill unset options with {@link defaultOnionOptions}.
 */
export function resolveOnionOptions(
  options: OnionModuleOptions = {},
): ResolvedOnionModuleOptions {
  return {
    enableKeyLoader: options.enableKeyLoader ?? defaultOnionOptions.enableKeyLoader,
    enableControl: options.enableControl ?? defaultOnionOptions.enableControl,
    keyDecryptRetries: options.keyDecryptRetries ?? defaultOnionOptions.keyDecryptRetries,
    reauthDelayMs: options.reauthDelayMs ?? defaultOnionOptions.reauthDelayMs,
    controlPassword: options.controlPassword,
    passphraseSource: options.passphraseSource ?? defaultOnionOptions.passphraseSource,
    clock: options.clock ?? defaultOnionOptions.clock,
  }
}
