/**
 * Type exports for the tool-calling protocol.
 */

export * from './common.js';
