/**
 * decoders/index.ts - Barrel export for RawRoot entry decoding.
 */

export { buildAuthenticatedEntry, decodePerson, personDateTime } from './personDecoder';
