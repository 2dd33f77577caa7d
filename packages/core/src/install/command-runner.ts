/**
 * Command Runner
 * Spawns one external tool with an argument list and captures the tail of its output
 */

import { createChildLogger } from '@boostsmith/shared';
import { spawn } from 'node:child_process';
import { StringDecoder } from 'node:string_decoder';

export type OutputStream = 'stdout' | 'stderr';

export interface OutputLine {
  stream: OutputStream;
  text: string;
}

export interface CommandSpec {
  command: string;
  args: readonly string[];
  cwd: string;
  /** Kill the process after this many ms; 0 disables the timeout */
  timeoutMs: number;
  env?: Record<string, string>;
}

export interface CommandOutcome {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  /** Set when the process could not be started */
  error?: string;
  /** Last captured lines across both streams */
  lines: OutputLine[];
  output: string[];
  durationMs: number;
}

export interface CommandRunnerConfig {
  outputTailLines: number;
  /** Wait after SIGTERM before SIGKILL and giving up on the process */
  killGraceMs: number;
  /** Start the command in its own process group so a timeout kills its children too */
  killProcessGroup: boolean;
}

export type LineListener = (line: OutputLine) => void;

class LineSplitter {
  private pending = '';
  // multi-byte characters may be split across chunks
  private decoder = new StringDecoder('utf8');

  push(chunk: Buffer): string[] {
    const parts = (this.pending + this.decoder.write(chunk)).split(/\r?\n/);
    this.pending = parts.pop() ?? '';
    return parts;
  }

  flush(): string[] {
    const rest = this.pending + this.decoder.end();
    this.pending = '';
    return rest.length > 0 ? [rest] : [];
  }
}

export class CommandRunner {
  private readonly config: CommandRunnerConfig;
  private logger = createChildLogger({ component: 'CommandRunner' });

  constructor(config: Partial<CommandRunnerConfig> = {}) {
    this.config = {
      outputTailLines: 40,
      killGraceMs: 1000,
      killProcessGroup: process.platform !== 'win32',
      ...config,
    };
  }

  run(spec: CommandSpec, onLine?: LineListener): Promise<CommandOutcome> {
    const startTime = Date.now();
    const tail: OutputLine[] = [];
    const splitters: Record<OutputStream, LineSplitter> = {
      stdout: new LineSplitter(),
      stderr: new LineSplitter(),
    };

    const record = (stream: OutputStream, texts: string[]) => {
      for (const text of texts) {
        const line = { stream, text };
        tail.push(line);
        if (tail.length > this.config.outputTailLines) {
          tail.shift();
        }
        onLine?.(line);
      }
    };

    this.logger.debug({ command: spec.command, args: spec.args, cwd: spec.cwd }, 'Spawning command');

    return new Promise((resolve) => {
      let settled = false;
      let timedOut = false;
      let timer: NodeJS.Timeout | undefined;
      let killTimer: NodeJS.Timeout | undefined;
      const { killProcessGroup } = this.config;

      const proc = spawn(spec.command, [...spec.args], {
        cwd: spec.cwd,
        env: { ...process.env, ...spec.env },
        windowsHide: true,
        detached: killProcessGroup,
      });

      const kill = (signal: NodeJS.Signals) => {
        if (killProcessGroup && proc.pid !== undefined) {
          try {
            process.kill(-proc.pid, signal);
            return;
          } catch (error) {
            this.logger.debug({ pid: proc.pid, signal, error }, 'Process group already gone');
          }
        }
        proc.kill(signal);
      };

      const finish = (
        exitCode: number | null,
        signal: NodeJS.Signals | null,
        error?: string
      ) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        if (killTimer) clearTimeout(killTimer);

        record('stdout', splitters.stdout.flush());
        record('stderr', splitters.stderr.flush());

        const outcome: CommandOutcome = {
          exitCode,
          signal,
          timedOut,
          lines: tail,
          output: tail.map((line) => line.text),
          durationMs: Date.now() - startTime,
        };
        if (error !== undefined) outcome.error = error;
        resolve(outcome);
      };

      if (spec.timeoutMs > 0) {
        timer = setTimeout(() => {
          timedOut = true;
          this.logger.warn({ command: spec.command, timeoutMs: spec.timeoutMs }, 'Command timed out');
          kill('SIGTERM');

          // close never fires while a descendant still holds the pipes
          killTimer = setTimeout(() => {
            kill('SIGKILL');
            proc.stdout.destroy();
            proc.stderr.destroy();
            finish(null, 'SIGKILL');
          }, this.config.killGraceMs);
        }, spec.timeoutMs);
      }

      proc.stdout.on('data', (data: Buffer) => {
        record('stdout', splitters.stdout.push(data));
      });

      proc.stderr.on('data', (data: Buffer) => {
        record('stderr', splitters.stderr.push(data));
      });

      proc.on('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
        finish(exitCode, signal);
      });

      proc.on('error', (error: Error) => {
        finish(null, null, error.message);
      });
    });
  }
}

/**
 * Human-readable reason a command did not succeed
 */
export function describeOutcome(command: string, outcome: CommandOutcome): string {
  if (outcome.error !== undefined) {
    return `${command} could not be started: ${outcome.error}`;
  }
  if (outcome.timedOut) {
    return `${command} timed out`;
  }
  if (outcome.signal) {
    return `${command} was terminated by ${outcome.signal}`;
  }
  return `${command} exited with code ${outcome.exitCode ?? 'unknown'}`;
}
