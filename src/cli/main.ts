/**
 * main.ts - Process entry shared by the command binaries
 */

type Command = (args: string[]) => Promise<number>;

/**
 * Run a command on this process's arguments and exit with its code.
 */
export function runMain(command: Command): void {
  command(process.argv.slice(2)).then(
    code => process.exit(code),
    (err: unknown) => {
      console.error('Error:', err instanceof Error ? err.message : String(err));
      process.exit(1);
    }
  );
}
