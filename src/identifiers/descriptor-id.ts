import { uint32BE, uint8 } from '../utils/bytes'
import { base32Encode } from '../utils/encoding'
import { sha1 } from '../utils/hash'
import { assertLength } from '../utils/validation'

import { decodeOnionAddress } from './onion-address'
import { PERMANENT_ID_LENGTH } from './permanent-id'
import { getSecondsValid, getTimePeriod } from './time-period'

import type { DescriptorIdEntry, DescriptorIdQuery } from '../types/descriptor'

export const DESCRIPTOR_COOKIE_LENGTH = 16
export const SECRET_ID_PART_LENGTH = 20

/** Replica indexes published by a v2 hidden service. */
export const DEFAULT_REPLICAS: readonly number[] = [0, 1]

/**
 * @summary secret-id-part = SHA-1(time-period ∥ descriptor-cookie ∥ replica).
 * @param timePeriod Period index, written as 4 big-endian bytes.
 * @param descriptorCookie Optional 16-byte cookie of a client-authorized service. An
 * empty array counts as absent.
 * @param replica Replica index, written as a single byte.
 */
export function calcSecretIdPart(
  timePeriod: number,
  descriptorCookie: Uint8Array | undefined,
  replica: number,
): Uint8Array {
  const cookie =
    descriptorCookie && descriptorCookie.length > 0 ? descriptorCookie : undefined
  if (cookie) assertLength('descriptor cookie', cookie, DESCRIPTOR_COOKIE_LENGTH)

  const chunks = [uint32BE(timePeriod)]
  if (cookie) chunks.push(cookie)
  chunks.push(uint8(replica))
  return sha1(...chunks)
}

/**
 * @summary descriptor-id = SHA-1(permanent-id ∥ secret-id-part).
 */
export function calcDescriptorId(
  permanentId: Uint8Array,
  secretIdPart: Uint8Array,
): Uint8Array {
  assertLength('permanent ID', permanentId, PERMANENT_ID_LENGTH)
  assertLength('secret-id-part', secretIdPart, SECRET_ID_PART_LENGTH)
  return sha1(permanentId, secretIdPart)
}

/**
 * @summary Base32 descriptor ID of a v2 onion address at a point in time.
 * @param onionAddress 16-character v2 address, any case, `.onion` optional.
 * @param timestamp Seconds since the epoch.
 * @param replica Replica index.
 * @param deviation Whole periods to shift by.
 * @param descriptorCookie Optional 16-byte cookie.
 * @returns The 32-character lowercase base32 descriptor ID.
 * @throws {@link InvalidEncodingError} when the address does not decode to a permanent ID.
 * @example
 * ```ts
 * calcDescriptorIdB32('abcdefghijklmnop', 1_700_000_000, 0)
 * // 'mo2surpo3gaxgqjii5rafupq5xl5gulg'
 * ```
 */
export function calcDescriptorIdB32(
  onionAddress: string,
  timestamp: number,
  replica: number,
  deviation = 0,
  descriptorCookie?: Uint8Array,
): string {
  const permanentId = decodeOnionAddress(onionAddress)
  const timePeriod = getTimePeriod(timestamp, permanentId, deviation)
  const secretIdPart = calcSecretIdPart(timePeriod, descriptorCookie, replica)
  return base32Encode(calcDescriptorId(permanentId, secretIdPart))
}

/**
 * @summary Every descriptor ID to look up for a service around `timestamp`.
 * @remarks
 * Entries are ordered by deviation, then replica. `secondsValid` is measured from
 * `timestamp` to the end of the current period; for a deviated entry it is the same
 * value, since neighbouring periods rotate at the same instant.
 */
export function calcDescriptorIds(
  onionAddress: string,
  timestamp: number,
  query: DescriptorIdQuery = {},
): DescriptorIdEntry[] {
  const permanentId = decodeOnionAddress(onionAddress)
  const replicas = query.replicas ?? DEFAULT_REPLICAS
  const deviations = query.deviations ?? [0]
  const secondsValid = getSecondsValid(timestamp, permanentId)

  const entries: DescriptorIdEntry[] = []
  for (const deviation of deviations) {
    const timePeriod = getTimePeriod(timestamp, permanentId, deviation)
    for (const replica of replicas) {
      const secretIdPart = calcSecretIdPart(timePeriod, query.descriptorCookie, replica)
      entries.push({
        descriptorId: base32Encode(calcDescriptorId(permanentId, secretIdPart)),
        replica,
        deviation,
        timePeriod,
        secondsValid,
      })
    }
  }
  return entries
}
