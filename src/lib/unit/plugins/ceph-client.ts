import { z } from 'zod';
import type { CheckResult, OptionalValue } from '../types';
import type { UnitPlugin, UnitPluginContext } from '../base-unit';
import type { UnitConfig } from '../config';
import { activeStatus, blockedStatus } from '../status';

export const BLUESTORE_COMPRESSION_ALGORITHMS = [
  'lz4',
  'snappy',
  'zlib',
  'zstd',
] as const;

export const BLUESTORE_COMPRESSION_MODES = [
  'none',
  'passive',
  'aggressive',
  'force',
] as const;

const oneOf = (values: readonly string[]) => ({
  errorMap: () => ({ message: `must be one of ${values.join(', ')}` }),
});

const blobSize = z
  .number({ invalid_type_error: 'must be an integer' })
  .int('must be an integer')
  .nonnegative('must not be negative');

const bluestoreCompressionSchema = z
  .object({
    'bluestore-compression-algorithm': z.enum(
      BLUESTORE_COMPRESSION_ALGORITHMS,
      oneOf(BLUESTORE_COMPRESSION_ALGORITHMS),
    ),
    'bluestore-compression-mode': z.enum(
      BLUESTORE_COMPRESSION_MODES,
      oneOf(BLUESTORE_COMPRESSION_MODES),
    ),
    'bluestore-compression-required-ratio': z
      .number({ invalid_type_error: 'must be a number' })
      .min(0, 'must be between 0 and 1')
      .max(1, 'must be between 0 and 1'),
    'bluestore-compression-min-blob-size': blobSize,
    'bluestore-compression-min-blob-size-hdd': blobSize,
    'bluestore-compression-min-blob-size-ssd': blobSize,
    'bluestore-compression-max-blob-size': blobSize,
    'bluestore-compression-max-blob-size-hdd': blobSize,
    'bluestore-compression-max-blob-size-ssd': blobSize,
  })
  .partial();

export type BluestoreCompressionConfig = z.infer<
  typeof bluestoreCompressionSchema
>;

export const BLUESTORE_COMPRESSION_OPTIONS = Object.keys(
  bluestoreCompressionSchema.shape,
);

const OPTION_PREFIX = 'bluestore-';

/**
 * Broker request keywords, e.g. `{ 'compression-mode': 'aggressive' }`
 */
export type BluestoreCompressionKwargs = Record<string, string | number>;

/**
 * BlueStore compression settings of a Ceph client unit.
 *
 * `absent` when the unit declares none of the options. Only options that are
 * set appear in the result, keyed without the `bluestore-` prefix.
 */
export function getBluestoreCompression(
  config: UnitConfig,
): OptionalValue<BluestoreCompressionKwargs> {
  const options = config.readGroup(
    BLUESTORE_COMPRESSION_OPTIONS,
    bluestoreCompressionSchema,
  );

  if (options.state !== 'valid') {
    return options;
  }

  const kwargs: BluestoreCompressionKwargs = {};
  for (const [key, value] of Object.entries(options.value)) {
    if (value !== undefined) {
      kwargs[key.slice(OPTION_PREFIX.length)] = value;
    }
  }

  return { state: 'valid', value: kwargs };
}

export function checkBluestoreCompression(config: UnitConfig): CheckResult {
  const compression = getBluestoreCompression(config);

  return compression.state === 'invalid'
    ? blockedStatus(`Invalid configuration: ${compression.reason}`)
    : activeStatus();
}

/**
 * Status checks shared by units that consume Ceph storage
 *
 * @example
 * ```typescript
 * const unit = new GlanceUnit(logger, collaborators).use(new CephClientPlugin());
 * ```
 */
export class CephClientPlugin implements UnitPlugin {
  public readonly name = 'ceph-client';

  public setup(context: UnitPluginContext): void {
    context.registerStatusCheck('bluestore-compression', () =>
      checkBluestoreCompression(context.config),
    );
  }
}
