// Library logs go to stdout; keep them out of command output unless asked for.
process.env.LOG_LEVEL ??= 'warn';

const { createProgram } = await import('./program.js');

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 2;
  });
