/**
 * Launching external commands.
 *
 * The analysis and merge tools are separate programs. A unit is one child
 * process; its stdout and stderr go to a log file in the unit's own output
 * directory. Environment modules requested by the configuration are loaded
 * by a login shell that then execs the command, so nothing from the
 * configuration file is evaluated in this process.
 */

import { spawn, type ChildProcess } from "node:child_process";
import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";

export interface CommandSpec {
  readonly command: string;
  readonly args: readonly string[];
  /** Appended with the child's stdout and stderr; output is inherited when absent */
  readonly logFile?: string;
}

export interface CommandOutcome {
  readonly exitCode: number | null;
  readonly durationMs: number;
  /** Set whenever the command did not succeed, including a log that could not be written */
  readonly error?: string;
}

/**
 * Starts one command and settles when it has exited.
 * Implementations resolve with a failed outcome rather than reject.
 */
export interface CommandRunner {
  run(spec: CommandSpec): Promise<CommandOutcome>;
}

export interface ProcessRunnerOptions {
  /** Environment modules loaded before each command */
  modules?: readonly string[];
  /** Shell used when modules are requested */
  moduleShell?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Executable and arguments to spawn, wrapping the command in a module-loading
 * shell when modules are requested.
 */
export function wrapWithModules(
  command: string,
  args: readonly string[],
  modules: readonly string[],
  shell: string
): { file: string; args: string[] } {
  if (modules.length === 0) {
    return { file: command, args: [...args] };
  }
  return {
    file: shell,
    args: ["-lc", `module load ${modules.join(" ")} && exec "$0" "$@"`, command, ...args],
  };
}

function quoteArg(arg: string): string {
  if (arg !== "" && /^[A-Za-z0-9_./:=+@%-]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render a command as a copy-pasteable shell line.
 */
export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args].map(quoteArg).join(" ");
}

export class ProcessRunner implements CommandRunner {
  private readonly modules: readonly string[];
  private readonly moduleShell: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ProcessRunnerOptions = {}) {
    this.modules = options.modules ?? [];
    this.moduleShell = options.moduleShell ?? "bash";
    this.env = options.env ?? process.env;
  }

  run(spec: CommandSpec): Promise<CommandOutcome> {
    const started = Date.now();
    const { file, args } = wrapWithModules(spec.command, spec.args, this.modules, this.moduleShell);

    return new Promise((resolve) => {
      let log: WriteStream | null = null;
      let logError: string | undefined;
      let child: ChildProcess | null = null;
      let onLogClosed: (() => void) | null = null;
      let finished = false;

      // Settles only once the child has exited; a broken log never does.
      const finish = (exitCode: number | null, error?: string): void => {
        if (finished) {
          return;
        }
        finished = true;
        const done = (): void => {
          const reason = error ?? logError;
          resolve({
            exitCode,
            durationMs: Date.now() - started,
            ...(reason ? { error: reason } : {}),
          });
        };
        if (log) {
          onLogClosed = done;
          log.end(done);
        } else {
          done();
        }
      };

      try {
        if (spec.logFile) {
          mkdirSync(dirname(spec.logFile), { recursive: true });
          log = createWriteStream(spec.logFile, { flags: "a" });
          log.on("error", (err) => {
            logError ??= `log file ${spec.logFile}: ${err.message}`;
            log = null;
            // Keep draining the child so it never blocks on a full pipe
            if (child) {
              child.stdout?.unpipe().resume();
              child.stderr?.unpipe().resume();
            }
            onLogClosed?.();
          });
        }
      } catch (err) {
        finish(null, err instanceof Error ? err.message : String(err));
        return;
      }

      child = spawn(file, args, {
        env: this.env,
        stdio: log ? ["ignore", "pipe", "pipe"] : ["ignore", "inherit", "inherit"],
      });

      if (log) {
        child.stdout?.pipe(log, { end: false });
        child.stderr?.pipe(log, { end: false });
      }

      child.on("error", (err) => finish(null, `failed to start ${spec.command}: ${err.message}`));
      child.on("close", (code, signal) => {
        if (code === 0) {
          finish(0);
        } else if (signal) {
          finish(null, `${spec.command} terminated by ${signal}`);
        } else {
          finish(code, `${spec.command} exited with code ${code}`);
        }
      });
    });
  }
}
