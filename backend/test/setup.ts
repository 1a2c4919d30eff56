/**
 * Test Setup - loaded before every test file (node --import ./test/setup.ts)
 *
 * reflect-metadata must load before any decorated class.
 */
import 'reflect-metadata'

if (!process.env.NODE_ENV) {
    process.env.NODE_ENV = 'test'
}
