/**
 * Tesseract OCR Adapter
 *
 * One lazily created tesseract.js worker per session, reused for every
 * candidate. Page segmentation is "single uniform block of text".
 * Language data comes from the `@tesseract.js-data/<lang>` npm packages
 * (`@tesseract.js-data/eng` is a dependency; add the package of every other
 * language listed in LASSO_LANGUAGES), so no traineddata is downloaded.
 */

import { copyFile, mkdir } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { createWorker, OEM, PSM, type Worker, type WorkerOptions } from 'tesseract.js';
import type { OcrConfig, OcrEngine } from '../0_types.js';
import { errorMessage, OcrLanguageMissingError, OcrTimeoutError } from '../errors.js';
import { log } from '../pipeline/context.js';

/** Model variant shipped by every @tesseract.js-data package */
export const TESSDATA_VARIANT = '4.0.0_best_int';

export type ModuleResolver = (id: string) => string;

export interface TesseractEngineOptions {
  /** Defaults to node's resolution from this module */
  resolveModule?: ModuleResolver;
  /** Where several languages' data files are gathered into one langPath */
  cacheDir?: string;
}

export function languageDataPackage(language: string): string {
  return `@tesseract.js-data/${language}`;
}

/** Directory holding `<language>.traineddata.gz` */
export function resolveLanguageDir(language: string, resolveModule: ModuleResolver): string {
  const packageName = languageDataPackage(language);
  try {
    const manifest = resolveModule(`${packageName}/package.json`);
    return path.join(path.dirname(manifest), TESSDATA_VARIANT);
  } catch (error) {
    throw new OcrLanguageMissingError(language, packageName, { cause: error });
  }
}

/**
 * tesseract.js reads every language from a single langPath. One language uses
 * its package directory directly; several are copied side by side into
 * `cacheDir`.
 */
export async function prepareLangPath(
  languages: string[],
  resolveModule: ModuleResolver,
  cacheDir: string
): Promise<string> {
  const dirs = languages.map((language) => resolveLanguageDir(language, resolveModule));
  if (dirs.length === 1) return dirs[0];

  await mkdir(cacheDir, { recursive: true });
  await Promise.all(
    languages.map((language, i) => {
      const file = `${language}.traineddata.gz`;
      return copyFile(path.join(dirs[i], file), path.join(cacheDir, file));
    })
  );
  return cacheDir;
}

async function startWorker(
  languages: string[],
  options: Required<TesseractEngineOptions>
): Promise<Worker> {
  const langPath = await prepareLangPath(languages, options.resolveModule, options.cacheDir);
  log('debug', `Starting tesseract worker (${languages.join('+')}) from ${langPath}`);

  const workerOptions: Partial<WorkerOptions> = { langPath, gzip: true, cacheMethod: 'none' };
  const worker = await createWorker(languages.join('+'), OEM.LSTM_ONLY, workerOptions);
  await worker.setParameters({ tessedit_pageseg_mode: PSM.SINGLE_BLOCK });
  return worker;
}

export function createTesseractOcrEngine(
  config: OcrConfig,
  options: TesseractEngineOptions = {}
): OcrEngine {
  const resolved: Required<TesseractEngineOptions> = {
    resolveModule: options.resolveModule ?? createRequire(import.meta.url).resolve,
    cacheDir: options.cacheDir ?? path.join(tmpdir(), 'lasso-tessdata'),
  };
  let pending: Promise<Worker> | null = null;

  const getWorker = (): Promise<Worker> => {
    if (!pending) {
      pending = startWorker(config.languages, resolved).catch((error: unknown) => {
        pending = null;
        throw error;
      });
    }
    return pending;
  };

  const terminate = async (): Promise<void> => {
    const current = pending;
    pending = null;
    if (!current) return;
    const worker = await current.catch((error: unknown) => {
      log('debug', `Tesseract worker never started: ${errorMessage(error)}`);
      return null;
    });
    await worker?.terminate();
  };

  return {
    recognize: async (imagePath) => {
      const worker = await getWorker();

      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new OcrTimeoutError(config.timeoutMs)),
          config.timeoutMs
        );
      });

      try {
        const { data } = await Promise.race([worker.recognize(imagePath), timeout]);
        return data.words.map((word) => ({
          text: word.text,
          confidence: word.confidence,
        }));
      } catch (error) {
        if (error instanceof OcrTimeoutError) {
          // The worker is still busy with the abandoned page
          await terminate();
        }
        throw error;
      } finally {
        clearTimeout(timer);
      }
    },
    terminate,
  };
}
