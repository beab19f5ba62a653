import { Command } from 'commander';
import { validateBaselineFile, verifyProofFile, type CommandResult } from './commands.js';

const VERSION = '0.1.0';

export interface CliIo {
  write(line: string): void;
  setExitCode(code: number): void;
}

export const processIo: CliIo = {
  write: (line) => console.log(line),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

function report(io: CliIo, result: CommandResult): void {
  for (const line of result.lines) io.write(line);
  io.setExitCode(result.exitCode);
}

export function createProgram(io: CliIo = processIo): Command {
  const program = new Command();

  program
    .name('proof-cli')
    .description('Offline tools for attestation proofs and TDX measurement baselines')
    .version(VERSION);

  // Verify command
  program
    .command('verify')
    .description('Decrypt a .attestproof file and print its summary')
    .argument('<file>', 'proof file')
    .requiredOption('-p, --password <password>', 'password the proof was sealed with')
    .action(async (file: string, options: { password: string }) => {
      report(io, await verifyProofFile(file, options.password));
    });

  // Validate-baseline command
  program
    .command('validate-baseline')
    .description('Compare a hex or base64 TDX quote file against a VM baseline')
    .argument('<quote-file>', 'quote file')
    .requiredOption('--vm <identity>', 'VM identity whose baseline applies')
    .option('--baselines <path>', 'baselines JSON file', 'config/baselines.json')
    .action(async (quoteFile: string, options: { vm: string; baselines: string }) => {
      report(io, await validateBaselineFile(quoteFile, options.vm, options.baselines));
    });

  return program;
}
