import { Inject, Injectable, Optional } from '@nestjs/common'

import { reauthenticate } from '../control/reauthenticate'
import { ONION_OPTIONS } from '../module/onion.tokens'

import type { ResolvedOnionModuleOptions } from '../config/onion.options'
import type { ControlAuthenticator } from '../control/reauthenticate'
import type { Logger } from '@nestjs/common'

/**
 * @summary Re-authenticates control-port connections with the configured password.
 */
@Injectable()
export class ControlAuthService {
  constructor(
    @Inject(ONION_OPTIONS)
    private readonly options: Pick<
      ResolvedOnionModuleOptions,
      'controlPassword' | 'reauthDelayMs'
    >,
    @Optional() private readonly logger?: Logger,
  ) {}

  /**
   * @summary Wait the configured delay, then authenticate again.
   * @returns `false` when the password was refused; the failure is logged.
   */
  async reauthenticate(controller: ControlAuthenticator): Promise<boolean> {
    return reauthenticate(controller, {
      password: this.options.controlPassword,
      delayMs: this.options.reauthDelayMs,
      logger: this.logger,
    })
  }
}
