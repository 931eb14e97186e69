import { CryptoError, CryptoErrorCode } from '../errors/crypto.error'

import type { OnionModuleOptions } from './onion.options'

/**
 * @summary Parse an optional integer environment variable.
 * @throws {@link CryptoError} with code `CONFIG_ERROR` when set but not an integer >= `min`.
 */
function envInteger(env: NodeJS.ProcessEnv, key: string, min: number): number | undefined {
  const raw = env[key]?.trim()
  if (!raw) return undefined
  if (!/^\d+$/.test(raw) || Number(raw) < min) {
    throw new CryptoError(
      CryptoErrorCode.CONFIG_ERROR,
      `${key} must be an integer >= ${min}`,
      { value: raw },
    )
  }
  return Number(raw)
}

/**
 * @summary Read module options from the environment.
 * @param env Environment map to read from (default: `process.env`).
 * @remarks
 * Recognised variables: `ONION_KEY_DECRYPT_RETRIES`, `ONION_REAUTH_DELAY_MS` and
 * `ONION_CONTROL_PASSWORD`. Unset variables are left out so module defaults apply.
 * @example
 * ```ts
 * OnionModule.registerAsync({ useFactory: () => loadOnionOptionsFromEnv() })
 * ```
 */
export function loadOnionOptionsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): OnionModuleOptions {
  const options: OnionModuleOptions = {}
  const retries = envInteger(env, 'ONION_KEY_DECRYPT_RETRIES', 1)
  if (retries !== undefined) options.keyDecryptRetries = retries
  const delay = envInteger(env, 'ONION_REAUTH_DELAY_MS', 0)
  if (delay !== undefined) options.reauthDelayMs = delay
  const password = env.ONION_CONTROL_PASSWORD
  if (password) options.controlPassword = password
  return options
}
