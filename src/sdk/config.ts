import dotenv from 'dotenv';
import { z } from 'zod';
import { LOG_LEVELS, MNIST_DATA_URL, configuredLogLevel, envTrue } from '../constants';
import { ConfigurationError } from '../errors';
import { MnistReaderOptions } from '../client/types';

const readerConfigSchema = z.object({
  saveDir: z.string().min(1, 'saveDir must not be empty'),
  mnistUrl: z.string().url('mnistUrl must be an absolute URL'),
  debug: z.boolean(),
  logLevel: z.enum(LOG_LEVELS, {
    errorMap: () => ({ message: `MNIST_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}` }),
  }),
});

export type ReaderConfig = z.infer<typeof readerConfigSchema>;

/**
 * Resolve reader settings from explicit options, then the environment (.env included),
 * then defaults.
 * @throws ConfigurationError when a resolved value is invalid
 */
export function resolveReaderConfig(saveDir: string, options: MnistReaderOptions = {}): ReaderConfig {
  dotenv.config();

  const debug = options.debug ?? envTrue(process.env.MNIST_DEBUG);
  const parsed = readerConfigSchema.safeParse({
    saveDir,
    mnistUrl: options.mnistUrl ?? process.env.MNIST_URL ?? MNIST_DATA_URL,
    debug,
    logLevel: debug ? 'debug' : configuredLogLevel(),
  });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid reader configuration: ${details}`);
  }

  return { ...parsed.data, mnistUrl: parsed.data.mnistUrl.replace(/\/$/, '') };
}
