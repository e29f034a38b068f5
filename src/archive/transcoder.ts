import { execFile, type ExecFileException } from 'node:child_process';
import ffmpeg from 'fluent-ffmpeg';

export type AudioMode = 'copy' | 'aac';

export type ConcatRequest = {
  manifestPath: string;
  outputPath: string;
  audio: AudioMode;
  timeoutMs: number;
};

export type TranscodeFailureReason = 'timeout' | 'exit' | 'spawn';

export type TranscodeOutcome =
  | { ok: true }
  | {
      ok: false;
      reason: TranscodeFailureReason;
      message: string;
      exitCode?: number | null;
      stderr?: string;
    };

export interface Transcoder {
  concat(request: ConcatRequest): Promise<TranscodeOutcome>;
  probe(filePath: string, timeoutMs: number): Promise<boolean>;
  checkAvailable(timeoutMs: number): Promise<TranscodeOutcome>;
}

/** The part of a fluent-ffmpeg command that a concat run drives. */
export interface ConcatCommand {
  setFfmpegPath(path: string): unknown;
  input(source: string): unknown;
  inputOptions(options: string[]): unknown;
  outputOptions(options: string[]): unknown;
  output(target: string): unknown;
  once(event: 'end', listener: () => void): unknown;
  once(event: 'error', listener: (error: Error, stdout: string | null, stderr: string | null) => void): unknown;
  kill(signal: string): unknown;
  run(): void;
}

export type FfmpegTranscoderOptions = {
  ffmpegPath: string;
  ffprobePath: string;
  commandFactory?: () => ConcatCommand;
};

const STDERR_TAIL_LENGTH = 2000;

export class FfmpegTranscoder implements Transcoder {
  constructor(private readonly options: FfmpegTranscoderOptions) {}

  concat(request: ConcatRequest): Promise<TranscodeOutcome> {
    const command: ConcatCommand = this.options.commandFactory ? this.options.commandFactory() : ffmpeg();
    command.setFfmpegPath(this.options.ffmpegPath);

    const audioOptions =
      request.audio === 'copy' ? ['-c:a', 'copy'] : ['-c:a', 'aac', '-strict', 'experimental'];

    command.input(request.manifestPath);
    command.inputOptions(['-f', 'concat', '-safe', '0']);
    command.outputOptions(['-c:v', 'copy', ...audioOptions, '-y']);
    command.output(request.outputPath);

    return new Promise<TranscodeOutcome>(resolve => {
      let settled = false;
      let killTimer: NodeJS.Timeout | null = null;

      const settle = (outcome: TranscodeOutcome) => {
        if (settled) {
          return;
        }
        settled = true;
        if (killTimer) {
          clearTimeout(killTimer);
          killTimer = null;
        }
        resolve(outcome);
      };

      command.once('end', () => {
        settle({ ok: true });
      });

      command.once('error', (error: Error, _stdout: string | null, stderr: string | null) => {
        const code = errnoCode(error);
        if (code === 'ENOENT' || code === 'EACCES') {
          settle({ ok: false, reason: 'spawn', message: error.message });
          return;
        }
        settle({
          ok: false,
          reason: 'exit',
          message: error.message,
          exitCode: parseExitCode(error.message),
          stderr: tail(stderr ?? '')
        });
      });

      if (request.timeoutMs > 0) {
        killTimer = setTimeout(() => {
          killTimer = null;
          command.kill('SIGKILL');
          settle({
            ok: false,
            reason: 'timeout',
            message: `ffmpeg concat timed out after ${request.timeoutMs}ms`
          });
        }, request.timeoutMs);
      }

      try {
        command.run();
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        settle({ ok: false, reason: 'spawn', message: err.message });
      }
    });
  }

  async probe(filePath: string, timeoutMs: number): Promise<boolean> {
    const result = await execFileAsync(
      this.options.ffprobePath,
      ['-v', 'quiet', '-print_format', 'json', '-show_format', filePath],
      { timeoutMs }
    );
    return result.ok;
  }

  async checkAvailable(timeoutMs: number): Promise<TranscodeOutcome> {
    const result = await execFileAsync(this.options.ffmpegPath, ['-version'], { timeoutMs });
    if (result.ok) {
      return { ok: true };
    }
    return result;
  }
}

export type ExecFileResult =
  | { ok: true; stdout: string; stderr: string }
  | {
      ok: false;
      reason: TranscodeFailureReason;
      message: string;
      exitCode: number | null;
      stderr: string;
    };

export function execFileAsync(
  command: string,
  args: string[],
  options: { timeoutMs?: number } = {}
): Promise<ExecFileResult> {
  return new Promise<ExecFileResult>(resolve => {
    let finished = false;
    let timeout: NodeJS.Timeout | null = null;
    let child: ReturnType<typeof execFile> | null = null;

    const finish = (result: ExecFileResult) => {
      if (finished) {
        return;
      }
      finished = true;
      if (timeout) {
        clearTimeout(timeout);
        timeout = null;
      }
      resolve(result);
    };

    const onComplete = (error: ExecFileException | null, stdout: string, stderr: string) => {
      if (!error) {
        finish({ ok: true, stdout, stderr });
        return;
      }

      if (typeof error.code === 'string') {
        finish({ ok: false, reason: 'spawn', message: error.message, exitCode: null, stderr });
        return;
      }

      finish({
        ok: false,
        reason: 'exit',
        message: error.message,
        exitCode: typeof error.code === 'number' ? error.code : null,
        stderr: tail(stderr)
      });
    };

    try {
      child = execFile(command, args, onComplete);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      finish({ ok: false, reason: 'spawn', message: err.message, exitCode: null, stderr: '' });
      return;
    }

    const timeoutMs = options.timeoutMs ?? 0;
    if (timeoutMs > 0) {
      timeout = setTimeout(() => {
        timeout = null;
        child?.kill('SIGKILL');
        finish({
          ok: false,
          reason: 'timeout',
          message: `Command "${command}" timed out after ${timeoutMs}ms`,
          exitCode: null,
          stderr: ''
        });
      }, timeoutMs);
    }
  });
}

function errnoCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function parseExitCode(message: string): number | null {
  const match = /exited with code (\d+)/.exec(message);
  return match ? Number(match[1]) : null;
}

function tail(text: string) {
  return text.length > STDERR_TAIL_LENGTH ? text.slice(-STDERR_TAIL_LENGTH) : text;
}
