import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ExtractorConfig } from '../config.js';
import { parseHtml } from '../dom/jsdom.js';
import { TextExtractor } from '../extractor/text-extractor.js';
import { PageRecord } from '../types.js';
import { ExtractionError } from '../util/errors.js';
import { LOG_LEVELS, logger, setLogLevel } from '../util/logger.js';
import { validateArgs } from '../util/security.js';

export const CliOptionsSchema = z.object({
  xpath: z.string().min(1).max(2048).optional(),
  clean: z.boolean().optional(),
  url: z.string().url().max(2048).optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export interface CliIo {
  /** Read one named file, or standard input when `file` is undefined */
  read(file: string | undefined): Promise<string>;
  write(text: string): void;
}

export type CliResult = { file: string; pages: PageRecord[] } | { file: string; text: string | null };

const STDIN_NAME = '-';

export async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export const nodeIo: CliIo = {
  read: (file) => (file === undefined ? readStdin() : readFile(file, 'utf-8')),
  write: (text) => {
    process.stdout.write(`${text}\n`);
  },
};

async function readSource(io: CliIo, file: string | undefined): Promise<string> {
  try {
    return await io.read(file);
  } catch (error) {
    throw new ExtractionError(`Failed to read ${file ?? 'standard input'}`, file ?? STDIN_NAME, undefined, {
      cause: error,
    });
  }
}

/**
 * Extract every input and write one JSON array with a result per input.
 */
export async function runExtraction(
  files: string[],
  rawOptions: Record<string, unknown>,
  config: ExtractorConfig,
  io: CliIo = nodeIo
): Promise<CliResult[]> {
  const options = validateArgs(rawOptions, CliOptionsSchema);
  setLogLevel(options.logLevel ?? config.logLevel);

  const extractor = new TextExtractor({
    fallbackXPath: config.fallbackXPath,
    sectionMarker: config.sectionMarker,
  });
  const xpath = options.xpath ?? extractor.fallbackXPath;
  const inputs: Array<string | undefined> = files.length > 0 ? files : [undefined];

  const results: CliResult[] = [];
  for (const file of inputs) {
    const name = file ?? STDIN_NAME;
    const html = await readSource(io, file);
    const document = parseHtml(html, { url: options.url });

    try {
      if (options.clean) {
        results.push({ file: name, text: extractor.cleanRegion(document, xpath) });
      } else {
        const pages = extractor.extractPages(document, xpath);
        logger.info(`[CLI] ${name}: ${pages.length} pages`);
        results.push({ file: name, pages });
      }
    } catch (error) {
      throw new ExtractionError(`Extraction failed for ${name}`, name, xpath, { cause: error });
    }
  }

  io.write(JSON.stringify(results, null, 2));
  return results;
}
