import { z } from 'zod';
import { DEFAULT_SECTION_MARKER } from './extractor/segmenter.js';
import { DEFAULT_FALLBACK_XPATH } from './extractor/text-extractor.js';
import { SectionMarker } from './types.js';
import { LOG_LEVELS, LogLevel, logger } from './util/logger.js';

export interface ExtractorConfig {
  logLevel: LogLevel;
  fallbackXPath: string;
  sectionMarker: SectionMarker;
}

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  EXTRACTOR_FALLBACK_XPATH: z.string().min(1).default(DEFAULT_FALLBACK_XPATH),
  EXTRACTOR_SECTION_ATTRIBUTE: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_.-]*$/, 'must be a valid attribute name')
    .default(DEFAULT_SECTION_MARKER.attribute),
  EXTRACTOR_SECTION_VALUES: z
    .string()
    .default(DEFAULT_SECTION_MARKER.values.join(','))
    .transform((value) =>
      value
        .split(',')
        .map((part) => part.trim())
        .filter(Boolean)
    )
    .pipe(z.array(z.string()).min(1, 'must list at least one value')),
});

/**
 * Read extractor settings from environment variables.
 * @throws Error naming every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExtractorConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${errors}`);
  }

  const config: ExtractorConfig = {
    logLevel: result.data.LOG_LEVEL,
    fallbackXPath: result.data.EXTRACTOR_FALLBACK_XPATH,
    sectionMarker: {
      attribute: result.data.EXTRACTOR_SECTION_ATTRIBUTE,
      values: result.data.EXTRACTOR_SECTION_VALUES,
    },
  };

  logger.debug('[Config] Configuration loaded:', config);
  return config;
}
