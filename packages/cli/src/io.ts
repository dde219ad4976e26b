/**
 * Output sinks for CLI commands. Commands write through these instead of
 * the console so they can run inside tests.
 */
export interface CliOutput {
  out: (text: string) => void;
  err: (text: string) => void;
}

export const consoleOutput: CliOutput = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};
