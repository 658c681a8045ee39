import { execFile, type ExecFileException } from "node:child_process";
import path from "node:path";
import { config } from "../../config/index.js";
import { SYNTAX_CHECK_TIMEOUT_MS } from "../../config/timeouts.js";
import { log } from "../../utils/telemetry.js";
import { SyntaxCheckerUnavailableError } from "../../spec-agent/errors.js";
import type { SyntaxChecker, SyntaxCheckOpts, SyntaxCheckRun } from "./types.js";

export interface IverilogOptions {
  command?: string;
  outputFile?: string;
  timeoutMs?: number;
}

/**
 * Icarus Verilog syntax checker: `iverilog -o <cwd>/design.out <file>`.
 */
export class IverilogSyntaxChecker implements SyntaxChecker {
  readonly name = "iverilog";
  readonly command: string;
  private readonly outputFile: string;
  private readonly timeoutMs: number;

  constructor(options: IverilogOptions = {}) {
    this.command = options.command ?? config.syntaxCheck.iverilogPath;
    this.outputFile = options.outputFile ?? config.syntaxCheck.outputFile;
    this.timeoutMs = options.timeoutMs ?? SYNTAX_CHECK_TIMEOUT_MS;
  }

  check(filePath: string, opts: SyntaxCheckOpts): Promise<SyntaxCheckRun> {
    const cwd = path.resolve(opts.cwd);
    const args = ["-o", path.join(cwd, this.outputFile), path.resolve(filePath)];
    log.debug({ command: this.command, args }, "Running syntax check");

    return new Promise((resolve, reject) => {
      execFile(
        this.command,
        args,
        { cwd, timeout: this.timeoutMs, encoding: "utf-8", windowsHide: true },
        (error: ExecFileException | null, stdout: string, stderr: string) => {
          if (!error) {
            resolve({ exitCode: 0, stdout, stderr });
            return;
          }

          // A numeric code is the tool's exit status; anything else means it never ran to completion
          if (typeof error.code === "number" && !error.killed) {
            resolve({ exitCode: error.code, stdout, stderr });
            return;
          }

          const reason = error.killed
            ? `timed out after ${this.timeoutMs}ms`
            : `${error.code ?? "spawn failed"}: ${error.message}`;
          reject(
            new SyntaxCheckerUnavailableError(`Syntax checker ${this.name} could not run (${reason})`, this.command, error)
          );
        }
      );
    });
  }
}
