import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import type { ChildProcessLike, SpawnFn } from '../../src/process/bounded.js';

export type FakeScript = {
  stdout?: string;
  stderr?: string;
  code?: number | null;
  error?: NodeJS.ErrnoException;
  hang?: boolean;
};

export class FakeChildProcess extends EventEmitter implements ChildProcessLike {
  public readonly stdout = new PassThrough();
  public readonly stderr = new PassThrough();
  public readonly killedSignals: Array<NodeJS.Signals | number | undefined> = [];
  private closed = false;

  constructor(
    public readonly command: string,
    public readonly args: readonly string[]
  ) {
    super();
  }

  kill(signal?: NodeJS.Signals | number) {
    this.killedSignals.push(signal);
    setImmediate(() => this.close(null, typeof signal === 'string' ? signal : 'SIGTERM'));
    return true;
  }

  run(script: FakeScript) {
    if (script.hang) {
      return;
    }
    setImmediate(() => {
      if (script.error) {
        this.emit('error', script.error);
        return;
      }
      if (script.stdout) {
        this.stdout.write(script.stdout);
      }
      if (script.stderr) {
        this.stderr.write(script.stderr);
      }
      setImmediate(() => this.close(script.code ?? 0, null));
    });
  }

  private close(code: number | null, signal: NodeJS.Signals | null) {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.stdout.end();
    this.stderr.end();
    this.emit('close', code, signal);
  }
}

/**
 * Returns a spawn function that plays the given scripts in order, one per spawned process.
 */
export function createFakeSpawn(scripts: FakeScript[]) {
  const children: FakeChildProcess[] = [];
  const spawn: SpawnFn = (command, args) => {
    const child = new FakeChildProcess(command, args);
    children.push(child);
    child.run(scripts[children.length - 1] ?? { hang: true });
    return child;
  };
  return { spawn, children };
}

export class FakeFfmpegCommand extends EventEmitter {
  public readonly killedSignals: Array<string | undefined> = [];
  public readonly inputs: string[] = [];
  public readonly outputs: string[] = [];
  public ffmpegPath: string | null = null;
  public outputFormat: string | null = null;
  public output: NodeJS.WritableStream | null = null;

  constructor(public readonly source: string) {
    super();
  }

  setFfmpegPath(path: string) {
    this.ffmpegPath = path;
    return this;
  }

  inputOptions(options: string[]) {
    this.inputs.push(...options);
    return this;
  }

  outputOptions(options: string[]) {
    this.outputs.push(...options);
    return this;
  }

  format(format: string) {
    this.outputFormat = format;
    return this;
  }

  pipe(stream: NodeJS.WritableStream) {
    this.output = stream;
    return stream;
  }

  kill(signal?: string) {
    this.killedSignals.push(signal);
    setImmediate(() => {
      if (this.listenerCount('error') > 0) {
        this.emit('error', new Error(`ffmpeg was killed with signal ${signal ?? 'SIGKILL'}`));
      }
    });
    return this;
  }

  produce(bytes: number) {
    setImmediate(() => {
      this.output?.write(Buffer.alloc(bytes));
      setImmediate(() => this.emit('end'));
    });
  }
}
