/**
 * In-process stand-in for fluent-ffmpeg
 *
 * Records every command built through the fluent API instead of spawning
 * ffmpeg. A successful run writes a small file at the output path so
 * renames and existence checks behave as with the real tool.
 *
 * Usage in a test file:
 *   jest.mock('fluent-ffmpeg', () =>
 *     jest.requireActual<typeof import('../helpers/fakeFfmpeg')>('../helpers/fakeFfmpeg').fakeFfmpeg);
 */

import fs from 'fs';

type Listener = (...args: unknown[]) => void;

export interface RecordedInput {
  source: string;
  format?: string;
  options: string[];
}

export interface RecordedCommand {
  inputs: RecordedInput[];
  videoFilters: string[];
  outputOptions: string[];
  format?: string;
  output?: string;
}

export interface FakeProbeResult {
  width: number;
  height: number;
  duration?: number;
  hasAudio: boolean;
}

interface FakeFfmpegState {
  commands: RecordedCommand[];
  probes: Map<string, FakeProbeResult>;
  /** Return an error message to make a command fail */
  failWhen: ((command: RecordedCommand) => string | null) | null;
  reset(): void;
}

export const fakeFfmpegState: FakeFfmpegState = {
  commands: [],
  probes: new Map(),
  failWhen: null,
  reset() {
    this.commands = [];
    this.probes = new Map();
    this.failWhen = null;
  },
};

class FakeCommand {
  private readonly recorded: RecordedCommand = { inputs: [], videoFilters: [], outputOptions: [] };
  private readonly listeners = new Map<string, Listener[]>();

  private get lastInput(): RecordedInput {
    const input = this.recorded.inputs[this.recorded.inputs.length - 1];
    if (!input) {
      throw new Error('fake ffmpeg: input option set before any input');
    }
    return input;
  }

  input(source: string): this {
    this.recorded.inputs.push({ source, options: [] });
    return this;
  }

  inputFormat(format: string): this {
    this.lastInput.format = format;
    return this;
  }

  inputOptions(options: string[]): this {
    this.lastInput.options.push(...options);
    return this;
  }

  videoFilters(filters: string | string[]): this {
    this.recorded.videoFilters.push(...(Array.isArray(filters) ? filters : [filters]));
    return this;
  }

  outputOptions(options: string[]): this {
    this.recorded.outputOptions.push(...options);
    return this;
  }

  format(format: string): this {
    this.recorded.format = format;
    return this;
  }

  output(target: string): this {
    this.recorded.output = target;
    return this;
  }

  on(event: string, listener: Listener): this {
    const existing = this.listeners.get(event) ?? [];
    existing.push(listener);
    this.listeners.set(event, existing);
    return this;
  }

  private emit(event: string, ...args: unknown[]): void {
    for (const listener of this.listeners.get(event) ?? []) {
      listener(...args);
    }
  }

  run(): void {
    fakeFfmpegState.commands.push(this.recorded);

    setImmediate(() => {
      this.emit('start', `ffmpeg ${this.recorded.inputs.map(i => `-i ${i.source}`).join(' ')} ${this.recorded.output ?? ''}`);

      const failure = fakeFfmpegState.failWhen?.(this.recorded) ?? null;
      if (failure) {
        this.emit('error', new Error(failure), null, `fake stderr: ${failure}`);
        return;
      }

      if (this.recorded.output) {
        fs.writeFileSync(this.recorded.output, this.recorded.inputs.map(i => i.source).join('\n'));
      }
      this.emit('end');
    });
  }
}

type ProbeCallback = (err: Error | null, data?: unknown) => void;

function ffprobe(filePath: string, callback: ProbeCallback): void {
  setImmediate(() => {
    const probe = fakeFfmpegState.probes.get(filePath);
    if (!probe) {
      callback(new Error(`${filePath}: No such file or directory`));
      return;
    }

    const streams: Array<Record<string, unknown>> = [
      { codec_type: 'video', width: probe.width, height: probe.height },
    ];
    if (probe.hasAudio) {
      streams.push({ codec_type: 'audio' });
    }
    callback(null, { streams, format: { duration: probe.duration ?? 10 } });
  });
}

export const fakeFfmpeg = Object.assign(() => new FakeCommand(), { ffprobe });
