import { EventEmitter } from 'node:events';
import { describe, expect, it, vi } from 'vitest';
import { FfmpegTranscoder, execFileAsync, type ConcatCommand } from '../src/archive/transcoder.js';

const MISSING_BINARY = '/nonexistent/archiver-test-binary';

class FakeCommand extends EventEmitter implements ConcatCommand {
  ffmpegPath: string | null = null;
  readonly inputs: string[] = [];
  readonly inputOpts: string[][] = [];
  readonly outputOpts: string[][] = [];
  readonly outputs: string[] = [];
  readonly killedSignals: string[] = [];

  constructor(private readonly onRun: (command: FakeCommand) => void = () => undefined) {
    super();
  }

  setFfmpegPath(ffmpegPath: string) {
    this.ffmpegPath = ffmpegPath;
    return this;
  }

  input(source: string) {
    this.inputs.push(source);
    return this;
  }

  inputOptions(options: string[]) {
    this.inputOpts.push(options);
    return this;
  }

  outputOptions(options: string[]) {
    this.outputOpts.push(options);
    return this;
  }

  output(target: string) {
    this.outputs.push(target);
    return this;
  }

  kill(signal: string) {
    this.killedSignals.push(signal);
    return this;
  }

  run() {
    this.onRun(this);
  }
}

function createTranscoder(command: FakeCommand) {
  return new FfmpegTranscoder({ ffmpegPath: '/opt/ffmpeg', ffprobePath: '/opt/ffprobe', commandFactory: () => command });
}

describe('FfmpegTranscoder', () => {
  it('reports a missing executable as a spawn failure', async () => {
    const result = await execFileAsync(MISSING_BINARY, ['-version'], { timeoutMs: 5000 });

    expect(result).toMatchObject({ ok: false, reason: 'spawn', exitCode: null });
  });

  it('treats unavailable binaries as a failed check', async () => {
    const transcoder = new FfmpegTranscoder({ ffmpegPath: MISSING_BINARY, ffprobePath: MISSING_BINARY });

    await expect(transcoder.checkAvailable(5000)).resolves.toMatchObject({ ok: false, reason: 'spawn' });
    await expect(transcoder.probe('/tmp/none.mp4', 5000)).resolves.toBe(false);
  });

  it('runs the concat demuxer with stream copy and resolves on end', async () => {
    const command = new FakeCommand(cmd => cmd.emit('end'));

    const outcome = await createTranscoder(command).concat({
      manifestPath: '/work/list.txt',
      outputPath: '/work/out.mp4',
      audio: 'copy',
      timeoutMs: 0
    });

    expect(outcome).toEqual({ ok: true });
    expect(command.ffmpegPath).toBe('/opt/ffmpeg');
    expect(command.inputs).toEqual(['/work/list.txt']);
    expect(command.inputOpts).toEqual([['-f', 'concat', '-safe', '0']]);
    expect(command.outputOpts).toEqual([['-c:v', 'copy', '-c:a', 'copy', '-y']]);
    expect(command.outputs).toEqual(['/work/out.mp4']);
  });

  it('maps a non-zero exit to an exit failure with the stderr tail', async () => {
    const command = new FakeCommand(cmd =>
      cmd.emit('error', new Error('ffmpeg exited with code 1: Invalid data'), null, 'moov atom not found')
    );

    const outcome = await createTranscoder(command).concat({
      manifestPath: '/work/list.txt',
      outputPath: '/work/out.mp4',
      audio: 'aac',
      timeoutMs: 0
    });

    expect(outcome).toEqual({
      ok: false,
      reason: 'exit',
      message: 'ffmpeg exited with code 1: Invalid data',
      exitCode: 1,
      stderr: 'moov atom not found'
    });
    expect(command.outputOpts).toEqual([['-c:v', 'copy', '-c:a', 'aac', '-strict', 'experimental', '-y']]);
  });

  it('maps a missing binary to a spawn failure', async () => {
    const command = new FakeCommand(cmd =>
      cmd.emit('error', Object.assign(new Error('spawn /opt/ffmpeg ENOENT'), { code: 'ENOENT' }), null, null)
    );

    const outcome = await createTranscoder(command).concat({
      manifestPath: '/work/list.txt',
      outputPath: '/work/out.mp4',
      audio: 'copy',
      timeoutMs: 0
    });

    expect(outcome).toEqual({ ok: false, reason: 'spawn', message: 'spawn /opt/ffmpeg ENOENT' });
  });

  it('kills the process and reports a timeout when it runs too long', async () => {
    vi.useFakeTimers();
    try {
      const command = new FakeCommand();
      const pending = createTranscoder(command).concat({
        manifestPath: '/work/list.txt',
        outputPath: '/work/out.mp4',
        audio: 'copy',
        timeoutMs: 500
      });

      vi.advanceTimersByTime(500);

      await expect(pending).resolves.toEqual({
        ok: false,
        reason: 'timeout',
        message: 'ffmpeg concat timed out after 500ms'
      });
      expect(command.killedSignals).toEqual(['SIGKILL']);
    } finally {
      vi.useRealTimers();
    }
  });
});
