#!/usr/bin/env node
/**
 * Lasso Search CLI Entry Point
 *
 * Single command: capture the screen, take a lasso region and search it.
 */

import { createReadStream } from 'node:fs';
import type { Readable } from 'node:stream';
import { type SearchMode, searchModeSchema } from './0_types.js';
import { runSession, type SelectionSource } from './actions/run-session.js';
import {
  createLensVisualSearch,
  createXdgBrowserOpener,
} from './adapters/browser.adapter.js';
import { createExecCommandRunner } from './adapters/command.exec.adapter.js';
import { createSharpImageCodec } from './adapters/image.sharp.adapter.js';
import { createTesseractOcrEngine } from './adapters/ocr.tesseract.adapter.js';
import { createSlurpRegionSelector } from './adapters/selection.slurp.adapter.js';
import { loadConfig } from './config.js';
import { detectEnvironment } from './domain/environment.js';
import { parseRegionPath, readPointerEvents } from './domain/region.js';
import { CaptureFailedError, errorMessage, LassoError } from './errors.js';
import {
  checkPrerequisites,
  detectPackageManager,
  formatCaptureFailure,
  printDoctorResults,
} from './prerequisites.js';

const MODE_ALIASES: Record<string, SearchMode> = {
  text: 'text-search',
  translate: 'translate',
  visual: 'visual-search',
  homework: 'homework-search',
};

interface ParsedArgs {
  mode: SearchMode;
  path: string | null;
  events: string | null;
  image: string | null;
  languages: string[] | null;
  doctor: boolean;
  verbose: boolean;
  help: boolean;
}

function valueOf(argsArray: string[], flag: string): string | null {
  const index = argsArray.indexOf(flag);
  return index !== -1 ? argsArray[index + 1] || null : null;
}

function parseArgs(argsArray: string[]): ParsedArgs {
  const modeArg = valueOf(argsArray, '--mode') ?? 'text';
  const mode = MODE_ALIASES[modeArg] ?? searchModeSchema.safeParse(modeArg).data;
  if (!mode) {
    throw new Error(
      `Unknown mode "${modeArg}" (expected one of: ${Object.keys(MODE_ALIASES).join(', ')})`
    );
  }

  const lang = valueOf(argsArray, '--lang');

  return {
    mode,
    path: valueOf(argsArray, '--path'),
    events: valueOf(argsArray, '--events'),
    image: valueOf(argsArray, '--image'),
    languages: lang ? lang.split(/[+,]/).filter(Boolean) : null,
    doctor: argsArray.includes('--doctor'),
    verbose: argsArray.includes('--verbose') || argsArray.includes('-v'),
    help: argsArray.includes('--help') || argsArray.includes('-h'),
  };
}

function showHelp(): void {
  console.log(`
Lasso Search - draw around anything on screen and search it

Usage:
  lasso                                  Capture, select a rectangle, search the text
  lasso --mode translate                 Translate the text instead
  lasso --mode homework                  Search for a solution
  lasso --mode visual                    Skip OCR, reverse-image search the region
  lasso --path "10,10 200,15 180,90"     Use a freeform path instead of selecting
  lasso --events <file|->                Read JSON-lines pointer events
  lasso --image <png>                    Use an existing screenshot
  lasso --lang eng+deu                   OCR languages
  lasso --doctor                         Check installed tools
  lasso --verbose                        Show debug output
  lasso --help                           Show this help

Environment:
  LASSO_LANGUAGES, LASSO_MIN_CONFIDENCE, LASSO_NOISE_FLOOR,
  LASSO_CAPTURE_TIMEOUT_MS, LASSO_OCR_TIMEOUT_MS, LASSO_TRANSLATE_TARGET,
  LASSO_CHROME_PATH, LASSO_TMPDIR, LASSO_VERBOSE
`);
}

async function resolveSelectionSource(args: ParsedArgs): Promise<SelectionSource> {
  if (args.path) {
    return { kind: 'path', path: parseRegionPath(args.path) };
  }
  if (args.events) {
    const input: Readable =
      args.events === '-' ? process.stdin : createReadStream(args.events);
    return { kind: 'events', events: await readPointerEvents(input) };
  }
  return { kind: 'interactive' };
}

async function doctor(): Promise<void> {
  const config = loadConfig();
  const profile = detectEnvironment(process.env);
  const results = await checkPrerequisites(profile, createExecCommandRunner(), {
    chromePath: config.browser.chromePath,
  });
  printDoctorResults(profile, results);
}

async function run(args: ParsedArgs): Promise<number> {
  const config = loadConfig(process.env, {
    verbose: args.verbose || undefined,
    languages: args.languages ?? undefined,
  });
  const profile = detectEnvironment(process.env);
  const runner = createExecCommandRunner();
  const ocr = createTesseractOcrEngine(config.ocr);

  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);

  try {
    const result = await runSession(
      {
        mode: args.mode,
        selection: await resolveSelectionSource(args),
        profile,
        imagePath: args.image ?? undefined,
        signal: controller.signal,
      },
      {
        runner,
        codec: createSharpImageCodec(),
        ocr,
        selector: createSlurpRegionSelector(runner, config.selectionTimeoutMs),
        opener: createXdgBrowserOpener(runner),
        visualSearch: createLensVisualSearch(config.browser),
      },
      config
    );

    if (result.status === 'cancelled') {
      console.log(`Selection cancelled (${result.reason}).`);
      return 0;
    }

    if (result.decision === 'visual-search') {
      console.log('No usable text found; using visual search.');
    } else {
      console.log(`Found text: ${result.consensus.text}`);
    }
    if (result.url) console.log(`Opened: ${result.url}`);
    return result.handedOff ? 0 : 1;
  } catch (error) {
    if (error instanceof CaptureFailedError) {
      console.error(
        formatCaptureFailure(error.attempts, await detectPackageManager(runner))
      );
      return 1;
    }
    throw error;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    await ocr.terminate();
  }
}

function main(): void {
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error('Error:', errorMessage(error));
    process.exit(2);
  }

  if (args.help) {
    showHelp();
    process.exit(0);
  }

  const task = args.doctor ? doctor().then(() => 0) : run(args);
  task.then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('Error:', errorMessage(error));
      if (!(error instanceof LassoError) && error instanceof Error) {
        console.error(error.stack);
      }
      process.exitCode = 1;
    }
  );
}

main();
