import path from 'node:path';

import type { Command } from 'commander';
import { ZodError } from 'zod';

import { classifySelector } from '../browser/selectors.js';
import { DEFAULT_CONFIG_PATH } from '../config/defaults.js';
import {
  formatIssues,
  loadConfigFile,
  loadEnvConfig,
  resolveSessionConfig,
} from '../config/loader.js';
import { runScript } from '../core/runner.js';
import type { ScriptRunResult } from '../core/runner.js';
import { Session } from '../core/session.js';
import { parseScript } from '../schema/index.js';
import type { Script, SessionConfig } from '../schema/index.js';
import { readStructuredFile } from '../utils/fs.js';
import * as log from '../utils/logger.js';

export const EXIT_CODES = {
  PASSED: 0,
  FAILED: 1,
  ERROR: 4,
} as const;

// ── Config merging ───────────────────────────────────────────

export interface RunCommandOptions {
  config: string;
  browser?: string;
  headed?: true;
  timeout?: string;
  json?: true;
}

/**
 * Session settings for a run: env, then config file, then CLI flags.
 * Only the default config path may be missing.
 */
export async function buildSessionConfig(
  opts: RunCommandOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<SessionConfig> {
  const fileConfig = await loadConfigFile(opts.config, {
    optional: opts.config === DEFAULT_CONFIG_PATH,
  });

  return resolveSessionConfig(loadEnvConfig(env), fileConfig, {
    browser: opts.browser,
    headless: opts.headed === true ? false : undefined,
    timeout: opts.timeout !== undefined ? Number(opts.timeout) : undefined,
  });
}

function describeError(err: unknown): string {
  if (err instanceof ZodError) return formatIssues(err);
  return err instanceof Error ? err.message : String(err);
}

// ── Stderr summary ───────────────────────────────────────────

function printSummary(result: ScriptRunResult): void {
  const count = (status: string): number =>
    result.steps.filter((s) => s.status === status).length;

  process.stderr.write(`\n--- wrightly result ---\n`);
  process.stderr.write(`Result:  ${result.passed ? 'PASS' : 'FAIL'}\n`);
  process.stderr.write(
    `Steps:   ${String(count('passed'))} passed, ${String(count('failed'))} failed, ${String(count('skipped'))} skipped\n`,
  );
  for (const step of result.steps) {
    if (step.error !== undefined) {
      process.stderr.write(`Error:   [${String(step.index + 1)}] ${step.error}\n`);
    }
  }
  process.stderr.write(`Time:    ${(result.durationMs / 1000).toFixed(1)}s\n\n`);
}

// ── Run command ──────────────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run the steps of a YAML or JSON script in a browser')
    .argument('<script>', 'Path to the script file')
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--browser <name>', 'chromium, chrome, edge, firefox or webkit')
    .option('--headed', 'Show the browser window')
    .option('--timeout <ms>', 'Default wait in milliseconds')
    .option('--json', 'Output JSON to stdout')
    .action(async (scriptPath: string, opts: RunCommandOptions) => {
      let config: SessionConfig;
      let script: Script;
      try {
        config = await buildSessionConfig(opts);
        script = parseScript(await readStructuredFile(scriptPath));
      } catch (err) {
        log.error(`Config error: ${describeError(err)}`);
        process.exitCode = EXIT_CODES.ERROR;
        return;
      }

      log.info(`${String(script.steps.length)} steps from ${scriptPath}`);
      log.detail(
        `${config.browser}${config.headless ? ' (headless)' : ''}, default wait ${String(config.timeout)}ms`,
      );

      let session: Session;
      try {
        session = await Session.launch(config);
      } catch (err) {
        log.error(describeError(err));
        process.exitCode = EXIT_CODES.ERROR;
        return;
      }

      try {
        log.section(script.name ?? path.basename(scriptPath));
        const result = await runScript(session, script);

        if (opts.json) {
          process.stdout.write(JSON.stringify(result, null, 2) + '\n');
        }
        printSummary(result);

        process.exitCode = result.passed ? EXIT_CODES.PASSED : EXIT_CODES.FAILED;
      } finally {
        await session.quit();
      }
    });
}

// ── Classify command ─────────────────────────────────────────

/** One `kind<TAB>selector` line per selector. */
export function formatClassification(selectors: readonly string[]): string[] {
  return selectors.map(
    (selector) => `${classifySelector(selector).kind}\t${selector}`,
  );
}

export function registerClassifyCommand(program: Command): void {
  program
    .command('classify')
    .description('Show whether each selector will be located as CSS or XPath')
    .argument('<selectors...>', 'Selectors to classify')
    .action((selectors: string[]) => {
      try {
        for (const line of formatClassification(selectors)) {
          process.stdout.write(line + '\n');
        }
      } catch (err) {
        log.error(describeError(err));
        process.exitCode = EXIT_CODES.ERROR;
      }
    });
}
