export * from './config/env-options'
export * from './config/onion.options'
export * from './control/reauthenticate'
export * from './errors/crypto.error'
export * from './identifiers/descriptor-id'
export * from './identifiers/onion-address'
export * from './identifiers/permanent-id'
export * from './identifiers/pkcs1-padding'
export * from './identifiers/time-period'
export * from './keystore/passphrase-source'
export * from './keystore/service-key-loader'
export * from './module/onion.module'
export * from './module/onion.tokens'
export * from './services/control-auth.service'
export * from './services/descriptor-id.service'
export * from './services/onion-address.service'
export * from './types/descriptor'
export * from './types/keys'
export { base32Decode, base32Encode } from './utils/encoding'
export { zeroize } from './utils/bytes'
export { roundedTimestamp } from './utils/time'
