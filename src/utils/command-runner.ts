import { execa } from 'execa';
import { CommandError } from './errors.js';
import { MASK } from './logger.js';

export interface CommandOptions {
  /** Written to the child's stdin. */
  input?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
  /** Values to hide when the command line or its stderr is reported. */
  secrets?: string[];
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Seam between the pipeline and the CLIs it drives (az, kubectl, gh).
 * Implementations reject with a CommandError on a non-zero exit.
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandOutput>;
}

export function maskSecrets(text: string, secrets: string[] = []): string {
  return secrets
    .filter(secret => secret.length > 0)
    .reduce((result, secret) => result.split(secret).join(MASK), text);
}

export function describeCommand(command: string, args: string[], secrets: string[] = []): string {
  return maskSecrets([command, ...args].join(' '), secrets);
}

export class ExecaRunner implements CommandRunner {
  async run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandOutput> {
    const result = await execa(command, args, {
      input: options.input,
      env: options.env,
      timeout: options.timeoutMs,
      reject: false,
      stripFinalNewline: true
    });

    const stdout = typeof result.stdout === 'string' ? result.stdout : '';
    const stderr = typeof result.stderr === 'string' ? result.stderr : '';

    if (result.failed || result.timedOut) {
      throw new CommandError({
        command: describeCommand(command, args, options.secrets),
        exitCode: result.exitCode,
        stderr: maskSecrets(stderr, options.secrets),
        timedOut: result.timedOut
      });
    }

    return { stdout, stderr, exitCode: result.exitCode ?? 0 };
  }
}
