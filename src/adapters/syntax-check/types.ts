/**
 * Syntax checker collaborator
 *
 * Runs an external tool against one source file. A non-zero exit code is a
 * normal result; implementations throw SyntaxCheckerUnavailableError only
 * when the tool could not be run.
 */

export interface SyntaxCheckRun {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface SyntaxCheckOpts {
  /** Directory for tool outputs (the workflow directory) */
  cwd: string;
}

export interface SyntaxChecker {
  readonly name: string;
  check(filePath: string, opts: SyntaxCheckOpts): Promise<SyntaxCheckRun>;
}
