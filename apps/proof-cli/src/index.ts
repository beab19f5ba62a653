export { createProgram, processIo, type CliIo } from './program.js';
export { verifyProofFile, validateBaselineFile, summarizeProof, formatVerdict, type CommandResult } from './commands.js';
