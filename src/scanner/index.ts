/**
 * Scanner Module - Public API
 */

export { isTrivialRepetition, MAX_CORE_LENGTH, MIN_REPEATS } from './repetition-detector.js';
