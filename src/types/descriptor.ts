/** Which descriptor IDs to compute for one lookup. */
export interface DescriptorIdQuery {
  /** Replica indexes, default `[0, 1]`. */
  replicas?: readonly number[]
  /** Period deviations, default `[0]`; `[-1, 0, 1]` tolerates clock skew. */
  deviations?: readonly number[]
  /** 16-byte cookie of a client-authorized service. */
  descriptorCookie?: Uint8Array
}

/** A descriptor ID together with the inputs that produced it. */
export interface DescriptorIdEntry {
  /** Lowercase base32, 32 characters. */
  descriptorId: string
  replica: number
  deviation: number
  timePeriod: number
  /** Seconds until the current period rotates. */
  secondsValid: number
}
