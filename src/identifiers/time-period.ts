import { assertInteger, assertLength } from '../utils/validation'

import { PERMANENT_ID_LENGTH } from './permanent-id'

/** Length of one descriptor rotation period in seconds. */
export const TIME_PERIOD_SECONDS = 86_400

/**
 * Offset in seconds that shifts this service's rotation away from midnight UTC.
 * The first permanent-ID byte picks one of 256 slots across the day.
 */
function phaseOffset(permanentId: Uint8Array): number {
  assertLength('permanent ID', permanentId, PERMANENT_ID_LENGTH)
  return (permanentId[0] * TIME_PERIOD_SECONDS) / 256
}

function wholeSeconds(timestamp: number): number {
  const seconds = Math.trunc(timestamp)
  assertInteger('timestamp', seconds, 0)
  return seconds
}

/**
 * @summary Index of the descriptor rotation period containing `timestamp`.
 * @param timestamp Seconds since the epoch; fractions are truncated.
 * @param permanentId The service's 10-byte permanent ID.
 * @param deviation Whole periods to add, e.g. `-1` or `1` to look at neighbouring periods.
 * @remarks
 * `floor((timestamp + phase * 86400 / 256) / 86400)`. The phase term is a multiple of
 * 337.5 and is added before dividing.
 */
export function getTimePeriod(
  timestamp: number,
  permanentId: Uint8Array,
  deviation = 0,
): number {
  assertInteger('deviation', deviation)
  const shifted = wholeSeconds(timestamp) + phaseOffset(permanentId)
  return Math.floor(shifted / TIME_PERIOD_SECONDS) + deviation
}

/**
 * @summary Seconds until the descriptor ID for `timestamp` changes.
 * @returns A value in 1..86400.
 */
export function getSecondsValid(timestamp: number, permanentId: Uint8Array): number {
  const shifted = wholeSeconds(timestamp) + phaseOffset(permanentId)
  return TIME_PERIOD_SECONDS - Math.floor(shifted % TIME_PERIOD_SECONDS)
}
