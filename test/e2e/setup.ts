/**
 * Runs before each test suite.
 */

// RSA key generation in fixtures can be slow on shared CI runners
jest.setTimeout(30_000)

// keep ONION_* variables from the developer's shell out of option parsing
for (const key of Object.keys(process.env)) {
  if (key.startsWith('ONION_')) delete process.env[key]
}
