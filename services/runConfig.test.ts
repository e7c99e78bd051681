import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadRunConfig, parseRunConfig, type RunConfigInput } from './runConfig';
import { ConfigurationError, FileIOError } from './errors';

const minimal: RunConfigInput = {
  input_file: 'script.txt',
  output_file: 'out/dialogue.wav',
  characters: [{ name: 'Naomi Nagata', aliases: ['Naomi', '娜奥米'], gender: 'female', voice_profile: { spk_id: 10 } }],
};

describe('parseRunConfig', () => {
  it('fills defaults and resolves paths against the config directory', () => {
    const config = parseRunConfig(minimal, '/work/project/characters.json', { cpuCount: 8 });

    expect(config.configPath).toBe(path.resolve('/work/project/characters.json'));
    expect(config.inputFile).toBe(path.resolve('/work/project/script.txt'));
    expect(config.outputFile).toBe(path.resolve('/work/project/out/dialogue.wav'));
    expect(config.processing).toEqual({
      maxWorkers: 7,
      chunkSize: 200,
      pauseBetweenSpeakersMs: 300,
      cleanupTempFiles: true,
      taskTimeoutMs: 120000,
      tempDir: path.join(path.resolve('/work/project/out'), 'temp_segments'),
    });
    expect(config.engine).toEqual({
      type: 'command',
      command: 'paddlespeech',
      args: ['tts', '--input', '{text}', '--am', '{am}', '--voc', '{voc}', '--spk_id', '{spk_id}', '--lang', '{lang}', '--output', '{output}'],
      lang: 'zh',
    });
    expect(config.narrator).toBeNull();
  });

  it('converts characters and the narrator into camelCase profiles', () => {
    const config = parseRunConfig(
      {
        ...minimal,
        default_narrator: { gender: 'male', voice_profile: { am: 'custom_am', spk_id: 2, voice_name: 'Orus' } },
      },
      '/work/characters.json'
    );

    expect(config.characters[0]).toEqual({
      name: 'Naomi Nagata',
      aliases: ['Naomi', '娜奥米'],
      gender: 'female',
      description: '',
      voice: {
        acousticModel: 'fastspeech2_aishell3',
        vocoder: 'hifigan_aishell3',
        speakerId: 10,
        gender: 'female',
        description: '',
      },
    });
    expect(config.narrator).toMatchObject({
      name: 'Narrator',
      aliases: ['Narrator', '旁白'],
      voice: { acousticModel: 'custom_am', speakerId: 2, voiceName: 'Orus', description: 'Default Narrator' },
    });
  });

  it('never uses fewer than one worker', () => {
    expect(parseRunConfig(minimal, '/c.json', { cpuCount: 1 }).processing.maxWorkers).toBe(1);
  });

  it('accepts a gemini engine', () => {
    const config = parseRunConfig({ ...minimal, engine: { type: 'gemini' } }, '/c.json');
    expect(config.engine).toEqual({ type: 'gemini', model: 'gemini-2.5-flash-preview-tts', apiKeyEnv: 'GEMINI_API_KEY' });
  });

  it('lists every invalid field', () => {
    let caught: unknown;
    try {
      parseRunConfig(
        {
          output_file: 'o.wav',
          characters: [{ name: 'A' }, { name: 'a' }],
          processing: { chunk_size: 0 },
        },
        '/c.json'
      );
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({
      issues: [
        'input_file: Required',
        'processing.chunk_size: Number must be greater than 0',
      ],
    });
  });

  it('reports duplicate names after the schema passes', () => {
    expect(() =>
      parseRunConfig({ ...minimal, characters: [{ name: 'A' }, { name: 'a' }] }, '/c.json')
    ).toThrow('characters.1.name: Duplicate character name "a"');
  });

  it('requires a character or a narrator', () => {
    expect(() => parseRunConfig({ input_file: 'i', output_file: 'o' }, '/c.json')).toThrow(
      'characters: At least one character or a default_narrator is required'
    );
  });

  it('returns a frozen config', () => {
    const config = parseRunConfig(minimal, '/c.json');
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.processing)).toBe(true);
    expect(Object.isFrozen(config.characters[0]?.voice)).toBe(true);
  });
});

describe('loadRunConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'dialogue-tts-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads a JSON file with a byte order mark', async () => {
    const file = path.join(dir, 'characters.json');
    fs.writeFileSync(file, `\uFEFF${JSON.stringify(minimal)}`, 'utf-8');

    const config = await loadRunConfig(file, { cpuCount: 4 });
    expect(config.inputFile).toBe(path.join(dir, 'script.txt'));
    expect(config.processing.maxWorkers).toBe(3);
  });

  it('raises FileIOError for a missing file', async () => {
    await expect(loadRunConfig(path.join(dir, 'missing.json'))).rejects.toBeInstanceOf(FileIOError);
  });

  it('raises ConfigurationError for malformed JSON', async () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{ "input_file": ', 'utf-8');
    await expect(loadRunConfig(file)).rejects.toBeInstanceOf(ConfigurationError);
  });
});
