import { CryptoError, CryptoErrorCode } from '../errors/crypto.error'

import type { Logger } from '@nestjs/common'

/** Default wait before re-authenticating, giving the control port time to come back. */
export const DEFAULT_REAUTH_DELAY_MS = 10_000

/**
 * @summary A control-port connection that can be asked to authenticate again.
 * @remarks
 * Implementations reject with a {@link CryptoError} coded `AUTHENTICATION_FAILED` when the
 * password is refused; any other rejection is treated as a connection problem.
 */
export interface ControlAuthenticator {
  authenticate(password?: string): Promise<void>
}

export interface ReauthenticateOptions {
  password?: string
  logger?: Logger
  delayMs?: number
}

/**
 * @summary Wait, then authenticate the controller again.
 * @returns `true` once authenticated, `false` when the password was refused.
 * @throws Whatever the controller throws for anything other than a refused password.
 */
export async function reauthenticate(
  controller: ControlAuthenticator,
  options: ReauthenticateOptions = {},
): Promise<boolean> {
  const delayMs = options.delayMs ?? DEFAULT_REAUTH_DELAY_MS
  if (delayMs > 0) {
    await new Promise<void>(resolve => {
      setTimeout(resolve, delayMs)
    })
  }

  try {
    await controller.authenticate(options.password)
    return true
  } catch (error) {
    if (
      error instanceof CryptoError &&
      error.code === CryptoErrorCode.AUTHENTICATION_FAILED
    ) {
      options.logger?.error('Failed to re-authenticate controller.', {
        reason: error.message,
      })
      return false
    }
    throw error
  }
}
