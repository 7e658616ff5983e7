/**
 * CLI Commands index
 * Re-exports all command registration functions
 */

export { registerConvertCommands, runConvert, runBatch, readInput } from './convert.js';
