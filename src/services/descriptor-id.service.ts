import { Inject, Injectable } from '@nestjs/common'

import {
  calcDescriptorIdB32,
  calcDescriptorIds,
} from '../identifiers/descriptor-id'
import { decodeOnionAddress } from '../identifiers/onion-address'
import { getSecondsValid, getTimePeriod } from '../identifiers/time-period'
import { ONION_OPTIONS } from '../module/onion.tokens'

import type { ResolvedOnionModuleOptions } from '../config/onion.options'
import type { DescriptorIdEntry, DescriptorIdQuery } from '../types/descriptor'

/** Per-call overrides for {@link DescriptorIdService.descriptorId}. */
export interface DescriptorIdOptions {
  deviation?: number
  descriptorCookie?: Uint8Array
  /** Seconds since the epoch; defaults to the configured clock. */
  timestamp?: number
}

/**
 * @summary Descriptor IDs and rotation timing for v2 onion addresses.
 * @remarks
 * Every method reads "now" from the module's clock unless a timestamp is given.
 */
@Injectable()
export class DescriptorIdService {
  constructor(
    @Inject(ONION_OPTIONS)
    private readonly options: Pick<ResolvedOnionModuleOptions, 'clock'>,
  ) {}

  /**
   * @summary Current time in seconds since the epoch, from the configured clock.
   */
  now(): number {
    return this.options.clock()
  }

  /**
   * @summary Time period of a service.
   * @param address v2 onion address.
   * @param deviation Whole periods to shift by.
   * @param timestamp Seconds since the epoch.
   */
  timePeriod(address: string, deviation = 0, timestamp = this.now()): number {
    return getTimePeriod(timestamp, decodeOnionAddress(address), deviation)
  }

  /**
   * @summary Seconds until the service's descriptor IDs rotate.
   */
  secondsValid(address: string, timestamp = this.now()): number {
    return getSecondsValid(timestamp, decodeOnionAddress(address))
  }

  /**
   * @summary Base32 descriptor ID for one replica.
   * @example
   * ```ts
   * descriptors.descriptorId('abcdefghijklmnop', 0, { timestamp: 1_700_000_000 })
   * // 'mo2surpo3gaxgqjii5rafupq5xl5gulg'
   * ```
   */
  descriptorId(address: string, replica: number, options: DescriptorIdOptions = {}): string {
    return calcDescriptorIdB32(
      address,
      options.timestamp ?? this.now(),
      replica,
      options.deviation ?? 0,
      options.descriptorCookie,
    )
  }

  /**
   * @summary Every descriptor ID to fetch for a service, ordered by deviation then replica.
   */
  descriptorIds(
    address: string,
    query: DescriptorIdQuery = {},
    timestamp = this.now(),
  ): DescriptorIdEntry[] {
    return calcDescriptorIds(address, timestamp, query)
  }
}
