/** Injection token for the resolved {@link OnionModuleOptions}. */
export const ONION_OPTIONS = Symbol('ONION_OPTIONS')
