import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { Command } from 'commander';

import { SelectorError } from '../../browser/selectors.js';
import { ConfigurationError } from '../../core/errors.js';
import {
  buildSessionConfig,
  formatClassification,
  registerClassifyCommand,
  registerRunCommand,
} from '../run.js';

describe('buildSessionConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'wrightly-cli-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('layers env, config file and flags', async () => {
    const file = path.join(dir, 'wrightly.yaml');
    await writeFile(file, 'browser: firefox\ntimeout: 2500\n');

    const config = await buildSessionConfig(
      { config: file, headed: true, timeout: '3000' },
      { WRIGHTLY_BROWSER: 'webkit', WRIGHTLY_POLL_INTERVAL: '50' },
    );

    expect(config).toEqual({
      browser: 'firefox',
      headless: false,
      timeout: 3_000,
      pollInterval: 50,
      args: [],
      verbose: false,
    });
  });

  it('lets --browser override the file', async () => {
    const file = path.join(dir, 'wrightly.yaml');
    await writeFile(file, 'browser: firefox\n');

    const config = await buildSessionConfig({ config: file, browser: 'webkit' }, {});

    expect(config.browser).toBe('webkit');
    expect(config.headless).toBe(true);
  });

  it('requires an explicitly named config file to exist', async () => {
    await expect(
      buildSessionConfig({ config: path.join(dir, 'missing.yaml') }, {}),
    ).rejects.toThrow(ConfigurationError);
  });

  it('rejects a non-numeric --timeout', async () => {
    const file = path.join(dir, 'wrightly.yaml');
    await writeFile(file, '{}\n');

    await expect(buildSessionConfig({ config: file, timeout: 'soon' }, {})).rejects.toThrow(
      /^Invalid session config: timeout: /,
    );
  });
});

describe('formatClassification', () => {
  it('prints the strategy for each selector', () => {
    expect(formatClassification(['#q', '//h1', 'a[href="/x"]'])).toEqual([
      'css\t#q',
      'xpath\t//h1',
      'css\ta[href="/x"]',
    ]);
  });

  it('throws for an empty selector', () => {
    expect(() => formatClassification(['#ok', ''])).toThrow(SelectorError);
  });
});

describe('command registration', () => {
  it('adds run and classify commands', () => {
    const program = new Command();
    registerRunCommand(program);
    registerClassifyCommand(program);

    const run = program.commands.find((command) => command.name() === 'run');
    expect(program.commands.map((command) => command.name())).toEqual(['run', 'classify']);
    expect(run?.options.map((option) => option.long)).toEqual([
      '--config',
      '--browser',
      '--headed',
      '--timeout',
      '--json',
    ]);
  });
});
