import { z } from 'zod';
import type { OptionalValue } from './types';

export type ConfigValues = Readonly<Record<string, unknown>>;

function isUnset(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

/**
 * Render the first zod issue as `option: message`
 */
export function describeZodError(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return 'invalid value';
  }

  const path = issue.path.join('.');
  return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Runtime configuration of a unit.
 *
 * Tracks which options the unit *declares* separately from their values, so
 * a reader can tell "this unit has no such option" from "the option is unset".
 *
 * @example
 * ```typescript
 * const config = new UnitConfig({ source: 'cloud:test-pocket' });
 * const source = config.read('source', z.string().min(1));
 *
 * if (source.state === 'valid') {
 *   await installer.addSource(source.value);
 * }
 * ```
 */
export class UnitConfig {
  private values: Record<string, unknown>;
  private readonly declared: ReadonlySet<string>;

  /**
   * @param values - Current option values
   * @param declaredOptions - Options the unit defines (default: the keys of `values`)
   */
  constructor(values: ConfigValues = {}, declaredOptions?: Iterable<string>) {
    this.values = { ...values };
    this.declared = new Set(declaredOptions ?? Object.keys(values));
  }

  public isDeclared(key: string): boolean {
    return this.declared.has(key);
  }

  public get(key: string): unknown {
    return this.values[key];
  }

  /**
   * Replace option values, e.g. after a config-changed notification.
   * Undeclared keys are ignored.
   */
  public update(values: ConfigValues): void {
    const next = { ...this.values };

    for (const [key, value] of Object.entries(values)) {
      if (this.declared.has(key)) {
        next[key] = value;
      }
    }

    this.values = next;
  }

  /**
   * Read and validate one option.
   *
   * - `absent`: not declared, or unset (`undefined`, `null`, `''`)
   * - `invalid`: set, but rejected by `schema`
   * - `valid`: set and accepted
   */
  public read<T>(
    key: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): OptionalValue<T> {
    const value = this.values[key];

    if (!this.declared.has(key) || isUnset(value)) {
      return { state: 'absent' };
    }

    const result = schema.safeParse(value);
    if (!result.success) {
      return {
        state: 'invalid',
        reason: `${key}: ${describeZodError(result.error)}`,
      };
    }

    return { state: 'valid', value: result.data };
  }

  /**
   * Validate the declared options in `keys` as one object.
   *
   * Returns `absent` when the unit declares none of `keys`; otherwise the
   * object holds only options that are set.
   */
  public readGroup<T>(
    keys: readonly string[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): OptionalValue<T> {
    const declaredKeys = keys.filter((key) => this.declared.has(key));

    if (declaredKeys.length === 0) {
      return { state: 'absent' };
    }

    const group: Record<string, unknown> = {};
    for (const key of declaredKeys) {
      const value = this.values[key];
      if (!isUnset(value)) {
        group[key] = value;
      }
    }

    const result = schema.safeParse(group);
    if (!result.success) {
      return { state: 'invalid', reason: describeZodError(result.error) };
    }

    return { state: 'valid', value: result.data };
  }
}

export interface InstallSource {
  source: string;
  key?: string;
}

/**
 * The optional package source (`source` option, signed by `key`)
 */
export function readInstallSource(config: UnitConfig): OptionalValue<InstallSource> {
  const source = config.read('source', z.string().min(1));

  if (source.state !== 'valid') {
    return source;
  }

  const key = config.read('key', z.string().min(1));
  if (key.state === 'invalid') {
    return key;
  }

  return {
    state: 'valid',
    value: {
      source: source.value,
      key: key.state === 'valid' ? key.value : undefined,
    },
  };
}
