import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'events';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { encodeWav } from '../audio/wav';
import { EngineError } from '../errors';
import { LogLevel, Logger } from '../logger';
import type { CommandEngineConfig } from '../../types/config';
import type { VoiceProfile } from '../../types/dialogue';

const { spawnMock } = vi.hoisted(() => ({ spawnMock: vi.fn() }));

vi.mock('child_process', () => ({ spawn: spawnMock }));

import { CommandSynthesizer, DEFAULT_COMMAND_ARGS, expandArgs } from './commandSynthesizer';

class FakeChild extends EventEmitter {
  stderr = new EventEmitter();
  kill = vi.fn((signal: string) => {
    setImmediate(() => this.emit('close', null, signal));
    return true;
  });
}

const ENGINE: CommandEngineConfig = { type: 'command', command: 'paddlespeech', args: DEFAULT_COMMAND_ARGS, lang: 'zh' };
const VOICE: VoiceProfile = {
  acousticModel: 'fastspeech2_aishell3',
  vocoder: 'hifigan_aishell3',
  speakerId: 7,
  gender: 'male',
  description: '',
};
const quiet = new Logger('CommandSynthesizer', { level: LogLevel.SILENT, console: false });

function outputArg(args: string[]): string {
  const output = args[args.indexOf('--output') + 1];
  if (!output) throw new Error('no --output argument');
  return output;
}

/** Writes a small WAV where the command was told to and exits 0. */
function succeedingChild(args: string[]): FakeChild {
  const child = new FakeChild();
  fs.writeFileSync(
    outputArg(args),
    encodeWav({ format: { sampleRate: 24000, channels: 1, bitDepth: 16 }, data: Buffer.from([1, 0, 2, 0]) })
  );
  setImmediate(() => child.emit('close', 0, null));
  return child;
}

describe('expandArgs', () => {
  it('fills known placeholders and leaves others', () => {
    expect(expandArgs(['--spk_id', '{spk_id}', '{unknown}', 'x{lang}y'], { spk_id: '3', lang: 'zh' })).toEqual([
      '--spk_id',
      '3',
      '{unknown}',
      'xzhy',
    ]);
  });
});

describe('CommandSynthesizer', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dialogue-tts-cmd-'));
    spawnMock.mockReset();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('runs the command with voice parameters and decodes its output', async () => {
    spawnMock.mockImplementation((_command: string, args: string[]) => succeedingChild(args));
    const synth = new CommandSynthesizer({ engine: ENGINE, workerId: 1, tempDir, logger: quiet });

    const audio = await synth.synthesize('你好。', VOICE, { taskId: '4:0' });

    expect(audio.format).toEqual({ sampleRate: 24000, channels: 1, bitDepth: 16 });
    expect([...audio.data]).toEqual([1, 0, 2, 0]);

    const [command, args] = spawnMock.mock.calls[0] ?? [];
    expect(command).toBe('paddlespeech');
    expect(args).toEqual([
      'tts',
      '--input', '你好。',
      '--am', 'fastspeech2_aishell3',
      '--voc', 'hifigan_aishell3',
      '--spk_id', '7',
      '--lang', 'zh',
      '--output', path.join(tempDir, 'chunk_w1_4_0_1.wav'),
    ]);
  });

  it('deletes the chunk file unless temp files are kept', async () => {
    spawnMock.mockImplementation((_command: string, args: string[]) => succeedingChild(args));

    await new CommandSynthesizer({ engine: ENGINE, workerId: 0, tempDir, logger: quiet }).synthesize('a', VOICE);
    expect(fs.readdirSync(tempDir)).toEqual([]);

    await new CommandSynthesizer({ engine: ENGINE, workerId: 0, tempDir, keepTempFiles: true, logger: quiet })
      .synthesize('b', VOICE);
    expect(fs.readdirSync(tempDir)).toEqual(['chunk_w0_1.wav']);
  });

  it('gives every call its own file name', async () => {
    const outputs: string[] = [];
    spawnMock.mockImplementation((_command: string, args: string[]) => {
      outputs.push(outputArg(args));
      return succeedingChild(args);
    });
    const synth = new CommandSynthesizer({ engine: ENGINE, workerId: 2, tempDir, logger: quiet });

    await synth.synthesize('a', VOICE, { taskId: '0:0' });
    await synth.synthesize('b', VOICE, { taskId: '0:0' });

    expect(outputs.map(p => path.basename(p))).toEqual(['chunk_w2_0_0_1.wav', 'chunk_w2_0_0_2.wav']);
  });

  it('reports a non-zero exit with the captured stderr', async () => {
    spawnMock.mockImplementation(() => {
      const child = new FakeChild();
      setImmediate(() => {
        child.stderr.emit('data', Buffer.from('model not found\n'));
        child.emit('close', 2, null);
      });
      return child;
    });
    const synth = new CommandSynthesizer({ engine: ENGINE, workerId: 0, tempDir, logger: quiet });

    const call = synth.synthesize('a', VOICE);
    await expect(call).rejects.toBeInstanceOf(EngineError);
    await expect(call).rejects.toThrow('paddlespeech exited with code 2: model not found');
  });

  it('reports a command that cannot be started', async () => {
    spawnMock.mockImplementation(() => {
      const child = new FakeChild();
      setImmediate(() => child.emit('error', new Error('spawn paddlespeech ENOENT')));
      return child;
    });
    const synth = new CommandSynthesizer({ engine: ENGINE, workerId: 0, tempDir, logger: quiet });

    await expect(synth.synthesize('a', VOICE)).rejects.toThrow('Failed to start paddlespeech: spawn paddlespeech ENOENT');
  });

  it('kills the process when the call is aborted', async () => {
    const child = new FakeChild();
    spawnMock.mockReturnValue(child);
    const controller = new AbortController();
    const synth = new CommandSynthesizer({ engine: ENGINE, workerId: 0, tempDir, logger: quiet });

    const call = synth.synthesize('a', VOICE, { signal: controller.signal });
    await vi.waitFor(() => expect(spawnMock).toHaveBeenCalled());
    controller.abort(new Error('timed out'));

    await expect(call).rejects.toThrow('paddlespeech was stopped');
    expect(child.kill).toHaveBeenCalledWith('SIGTERM');
  });

  it('does not start when already aborted', async () => {
    const synth = new CommandSynthesizer({ engine: ENGINE, workerId: 0, tempDir, logger: quiet });
    await expect(synth.synthesize('a', VOICE, { signal: AbortSignal.abort(new Error('late')) })).rejects.toThrow('late');
    expect(spawnMock).not.toHaveBeenCalled();
  });
});
