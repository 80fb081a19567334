import fs from 'fs';
import os from 'os';
import path from 'path';
import { createRegistry, runCli } from './commands';
import { CommandRegistry } from './commands/registry';
import { defaultOutputPath, parseEntries, serializeEntries } from './commands/translate';
import { Command, CommandDependencies, CommandError, CommandIO } from './commands/types';
import { applyOverrides, parseCommandLine } from './commands/utils';
import { help } from './help';
import { ConfigStore, DEFAULT_CONFIG } from './state/ConfigStore';
import { CompletionRequest, TranslationProvider } from './translation/providers';

class QueuedProvider implements TranslationProvider {
  readonly name = 'openai';
  requests: CompletionRequest[] = [];

  constructor(private responses: string[]) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const next = this.responses.shift();
    if (next === undefined) {
      throw new Error('service unavailable');
    }
    return next;
  }
}

function createIO(): { io: CommandIO; out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: {
      print: text => out.push(text),
      error: text => err.push(text)
    },
    out,
    err
  };
}

describe('parseCommandLine', () => {
  it('should split the command, arguments and flags', () => {
    expect(parseCommandLine(['Translate', 'in.json', '--out', 'o.json', '--batch=3', '--dry'])).toEqual({
      command: 'translate',
      args: ['in.json'],
      flags: { out: 'o.json', batch: '3', dry: true }
    });
  });

  it('should default to help', () => {
    expect(parseCommandLine([])).toEqual({ command: 'help', args: [], flags: {} });
  });
});

describe('applyOverrides', () => {
  it('should map flags onto config keys', () => {
    const config = applyOverrides(DEFAULT_CONFIG, { source: 'Korean', batch: '4', template: 'prompt.txt' });

    expect(config.sourceLanguage).toBe('Korean');
    expect(config.batchSize).toBe(4);
    expect(config.promptTemplatePath).toBe('prompt.txt');
    expect(DEFAULT_CONFIG.batchSize).toBe(10);
  });

  it('should reject missing and invalid values', () => {
    expect(() => applyOverrides(DEFAULT_CONFIG, { model: true })).toThrow(new CommandError('--model needs a value'));
    expect(() => applyOverrides(DEFAULT_CONFIG, { batch: 'x' })).toThrow('--batch: Invalid value for "batchSize": x');
  });
});

describe('CommandRegistry', () => {
  const command: Command = {
    names: ['Render', 'prompt'],
    usage: 'render',
    execute: jest.fn().mockResolvedValue(undefined)
  };

  it('should register every name case-insensitively', () => {
    const registry = new CommandRegistry();
    registry.register(command);

    expect(registry.get('RENDER')).toBe(command);
    expect(registry.has('prompt')).toBe(true);
    expect(registry.getCommandNames()).toEqual(['render', 'prompt']);
  });

  it('should list each command once and refuse a taken name', () => {
    const registry = new CommandRegistry();
    registry.registerAll([command, command]);

    expect(registry.list()).toEqual([command]);
    expect(() => registry.register({ ...command, names: ['prompt'] })).toThrow('Command name "prompt" is already registered');
  });

  it('should know every built-in command', () => {
    const registry = createRegistry();
    expect(registry.getCommandNames().sort()).toEqual(['check', 'config', 'help', 'prompt', 'render', 'translate']);
  });
});

describe('entry files', () => {
  it('should read text files one entry per line', () => {
    expect(parseEntries('a.txt', 'x\r\ny\n')).toEqual({ format: 'text', sources: ['x', 'y'] });
    expect(parseEntries('a.txt', '')).toEqual({ format: 'text', sources: [] });
  });

  it('should read JSON arrays and objects of strings', () => {
    expect(parseEntries('a.json', '["x"]')).toEqual({ format: 'json-array', sources: ['x'] });
    expect(parseEntries('a.JSON', '{"k":"v"}')).toEqual({ format: 'json-object', keys: ['k'], sources: ['v'] });
  });

  it('should reject other JSON', () => {
    expect(() => parseEntries('a.json', '{"k":1}')).toThrow('a.json: value of "k" is not a string');
    expect(() => parseEntries('a.json', '[1]')).toThrow('a.json must contain only strings');
    expect(() => parseEntries('a.json', '42')).toThrow('a.json must contain a JSON object or array of strings');
  });

  it('should write translations in the input shape', () => {
    expect(serializeEntries({ format: 'text', sources: ['a', 'b'] }, ['x', 'y'])).toBe('x\ny\n');
    expect(serializeEntries({ format: 'json-array', sources: ['a'] }, ['x'])).toBe('[\n  "x"\n]\n');
    expect(serializeEntries({ format: 'json-object', keys: ['k'], sources: ['a'] }, ['x'])).toBe('{\n  "k": "x"\n}\n');
  });

  it('should name the output after the target language', () => {
    expect(defaultOutputPath(path.join('dir', 'game.json'), 'Simplified Chinese'))
      .toBe(path.join('dir', 'game.simplified_chinese.json'));
  });
});

describe('runCli', () => {
  let dir: string;
  let store: ConfigStore;
  let provider: QueuedProvider;
  let deps: CommandDependencies;
  let warn: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-'));
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    store = new ConfigStore(path.join(dir, 'config.json'));
    await store.save({ dataDir: path.join(dir, 'cache'), retryDelayMs: 0 });
    provider = new QueuedProvider([]);
    deps = { configStore: store, createProvider: () => provider };
  });

  afterEach(() => {
    warn.mockRestore();
    error.mockRestore();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should print help for no command and for --help', async () => {
    const { io, out } = createIO();

    await expect(runCli([], deps, io)).resolves.toBe(0);
    expect(out).toHaveLength(help.length + 1);
    expect(out[0]).toContain('# STEPWISE TRANSLATOR');

    const second = createIO();
    await expect(runCli(['translate', '--help'], deps, second.io)).resolves.toBe(0);
    expect(second.out).toHaveLength(help.length + 1);
  });

  it('should report unknown commands', async () => {
    const { io, err } = createIO();

    await expect(runCli(['bogus'], deps, io)).resolves.toBe(1);
    expect(err).toEqual(['[ERROR] Unrecognized command "bogus". Available commands: help, config, render, check, translate.']);
  });

  it('should render the prompt for the requested languages', async () => {
    const { io, out } = createIO();

    await expect(runCli(['render', '--source', 'Korean', '--target', 'French'], deps, io)).resolves.toBe(0);
    expect(out).toHaveLength(1);
    expect(out[0].startsWith('You are a professional translator working from Korean into French.')).toBe(true);
    expect(out[0]).toContain('<textarea>\n1.French text\n</textarea>');
  });

  it('should pass the built-in prompt check', async () => {
    const { io, out } = createIO();

    await expect(runCli(['check'], deps, io)).resolves.toBe(0);
    expect(out).toEqual(['✅ Built-in prompt has no issues']);
  });

  it('should fail the check for a broken template', async () => {
    const template = path.join(dir, 'prompt.txt');
    fs.writeFileSync(template, 'Translate {source_language}.');
    const { io, err } = createIO();

    await expect(runCli(['check', '--template', template], deps, io)).resolves.toBe(1);
    expect(err[0]).toBe('- [missing-placeholder] Placeholder {target_language} does not appear in the template');
    expect(err[err.length - 1]).toBe(`[ERROR] ${template} has 5 issue(s)`);
  });

  it('should show and store config values', async () => {
    const set = createIO();
    await expect(runCli(['config', 'batchSize', '4'], deps, set.io)).resolves.toBe(0);
    expect(set.err).toEqual(['[SYSTEM] Set batchSize to 4']);

    const show = createIO();
    await expect(runCli(['config', 'batchSize'], deps, show.io)).resolves.toBe(0);
    expect(show.out).toEqual(['4']);

    const all = createIO();
    await expect(runCli(['config'], deps, all.io)).resolves.toBe(0);
    expect(JSON.parse(all.out[0])).toEqual({
      ...DEFAULT_CONFIG,
      dataDir: path.join(dir, 'cache'),
      retryDelayMs: 0,
      batchSize: 4
    });
  });

  it('should reject bad config keys and values', async () => {
    const key = createIO();
    await expect(runCli(['config', 'nope', '1'], deps, key.io)).resolves.toBe(1);
    expect(key.err).toEqual(['[ERROR] Unknown config key "nope". Run "config" to list the keys.']);

    const value = createIO();
    await expect(runCli(['config', 'batchSize', 'zero'], deps, value.io)).resolves.toBe(1);
    expect(value.err).toEqual(['[ERROR] Invalid value for "batchSize": zero']);
  });

  it('should translate a JSON file beside the input', async () => {
    const input = path.join(dir, 'game.json');
    fs.writeFileSync(input, JSON.stringify({ greeting: 'こんにちは', farewell: 'さようなら' }));
    provider = new QueuedProvider(['<textarea>\n1.Hello\n2.Goodbye\n</textarea>']);
    const { io, err } = createIO();

    await expect(runCli(['translate', input], deps, io)).resolves.toBe(0);

    const output = path.join(dir, 'game.english.json');
    expect(fs.readFileSync(output, 'utf8')).toBe('{\n  "greeting": "Hello",\n  "farewell": "Goodbye"\n}\n');
    expect(provider.requests[0].user).toBe('<textarea>\n1.こんにちは\n2.さようなら\n</textarea>');
    expect(err[err.length - 1]).toBe(`[SYSTEM] Wrote 2 item(s) to ${output}`);
  });

  it('should keep source text and fail when items could not be translated', async () => {
    const input = path.join(dir, 'lines.txt');
    const output = path.join(dir, 'out.txt');
    fs.writeFileSync(input, 'one\ntwo\n');
    const { io, err } = createIO();

    await expect(runCli(['translate', input, '--out', output], deps, io)).resolves.toBe(1);
    expect(fs.readFileSync(output, 'utf8')).toBe('one\ntwo\n');
    expect(provider.requests).toHaveLength(3);
    expect(err[err.length - 1]).toBe('[ERROR] 2 item(s) failed and kept their source text. Run the command again to retry them.');
  });

  it('should require an input file', async () => {
    const { io, err } = createIO();

    await expect(runCli(['translate'], deps, io)).resolves.toBe(1);
    expect(err).toEqual(['[ERROR] Usage: translate <input> [--out FILE]']);
  });
});
