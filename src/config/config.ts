import type { Logger } from 'pino';
import { z } from 'zod';
import type { CacheClientOptions } from '../cache/client.js';
import { ConfigError } from '../error/configError.js';
import { MissingCredentialError } from '../error/missingCredentialError.js';
import { ValidationError } from '../error/validationError.js';
import type { TransportProvider } from '../fetch/types.js';
import type { HeaderOptions } from '../types/request.js';
import type { SafeWrap } from '../utils/wrap.js';
import { VERSION } from '../version.js';

/** API host used when no `baseUrl` is given. */
export const DEFAULT_BASE_URL = 'https://api.covalenthq.com';

/** Identifying header value used when no `userAgent` is given. */
export const DEFAULT_USER_AGENT = `chainquery/${VERSION}`;

const settingsSchema = z
  .object({
    baseUrl: z
      .string()
      .url()
      .refine((url) => /^https?:\/\//i.test(url), 'baseUrl must use http or https')
      .default(DEFAULT_BASE_URL),
    timeout: z.union([z.number().int().positive(), z.literal(false)]).default(30_000),
    maxRetries: z.number().int().min(0).max(10).default(3),
    baseDelay: z.number().int().nonnegative().default(200),
    maxDelay: z.number().int().nonnegative().default(5_000),
    userAgent: z.string().trim().min(1).default(DEFAULT_USER_AGENT),
  })
  .refine((settings) => settings.maxDelay >= settings.baseDelay, {
    message: 'maxDelay must be at least baseDelay',
    path: ['maxDelay'],
  });

/** Plain-data settings, each optional with a default. */
export type ClientSettings = z.input<typeof settingsSchema>;

/** Options for constructing a {@link ChainQueryClient}. */
export interface ChainQueryClientProps extends ClientSettings {
  /** API key sent as `Authorization: Bearer <apiKey>`; must not be blank. */
  apiKey: string;
  /** Extra headers sent with every request; `null` removes a default. */
  headers?: HeaderOptions;
  /** Enables the in-memory GET response cache. */
  cache?: CacheClientOptions;
  /** Logger to derive the client's logger from; defaults to the package logger. */
  logger?: Logger;
  /** Transport implementation. Defaults to {@link FetchClient}. */
  transport?: TransportProvider;
}

/** Validated settings, frozen once resolved. */
export interface ClientConfig extends Readonly<z.output<typeof settingsSchema>> {
  readonly apiKey: string;
  readonly headers?: HeaderOptions;
}

/**
 * Validates client props and fills in defaults.
 *
 * Unknown keys (logger, transport, cache) are ignored here. A blank key fails with {@link MissingCredentialError} and bad settings with {@link ConfigError},
 * both before anything touches the network.
 */
export function resolveConfig(props: ChainQueryClientProps): SafeWrap<Error, ClientConfig> {
  const { apiKey, headers } = props;
  if (typeof apiKey !== 'string' || !apiKey.trim()) {
    return [new MissingCredentialError(), null];
  }

  const result = settingsSchema.safeParse(props);
  if (!result.success) {
    return [
      new ConfigError('error invalid client settings', {
        cause: new ValidationError('error validating client settings', result.error.issues),
      }),
      null,
    ];
  }

  return [null, Object.freeze({ ...result.data, apiKey: apiKey.trim(), ...(headers && { headers }) })];
}
