/**
 * Where CLI output goes. Commands never touch the console directly, so
 * tests can capture what they print.
 */
export interface CliOutput {
  stdout(text: string): void;
  stderr(text: string): void;
}

/**
 * State shared by every command of one CLI invocation
 */
export interface CliContext {
  readonly output: CliOutput;
  /** Set to 1 when any command fails */
  exitCode: number;
}

export const consoleOutput: CliOutput = {
  stdout: text => console.log(text),
  stderr: text => console.error(text),
};
