import { ConfigurationError } from './errors';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | readonly JsonValue[] | { readonly [key: string]: JsonValue };
/** Any JSON value except an array; written to the field as is. */
export type ScalarValue = Exclude<JsonValue, readonly JsonValue[]>;

export interface ReplacePair {
  target: JsonValue;
  replacement: JsonValue;
}

/** One mutation of an array-valued field. */
export type FieldUpdate =
  | { readonly kind: 'add'; readonly values: readonly JsonValue[] }
  | { readonly kind: 'remove'; readonly values: readonly JsonValue[] }
  | { readonly kind: 'set'; readonly values: readonly JsonValue[] }
  | { readonly kind: 'replace'; readonly pairs: readonly ReplacePair[] }
  | { readonly kind: 'clear' };

export const FieldUpdate = {
  add: (values: readonly JsonValue[]): FieldUpdate => ({ kind: 'add', values: [...values] }),
  remove: (values: readonly JsonValue[]): FieldUpdate => ({ kind: 'remove', values: [...values] }),
  set: (values: readonly JsonValue[]): FieldUpdate => ({ kind: 'set', values: [...values] }),
  replace: (pairs: readonly ReplacePair[]): FieldUpdate => ({
    kind: 'replace',
    pairs: pairs.map(({ target, replacement }) => ({ target, replacement })),
  }),
  clear: (): FieldUpdate => ({ kind: 'clear' }),
} as const;

export type EncodedFieldUpdate =
  | { add: JsonValue[] }
  | { remove: JsonValue[] }
  | { set: JsonValue[] }
  | { replace: Array<{ target: JsonValue; replacement: JsonValue }> }
  | null;

export function encodeFieldUpdate(update: FieldUpdate): EncodedFieldUpdate {
  switch (update.kind) {
    case 'add':
      return { add: [...update.values] };
    case 'remove':
      return { remove: [...update.values] };
    case 'set':
      return { set: [...update.values] };
    case 'replace':
      return { replace: update.pairs.map(({ target, replacement }) => ({ target, replacement })) };
    case 'clear':
      return null;
  }
}

/** Encodes a field→update mapping; keys keep their insertion order. */
export function encodeFieldUpdates(updates: Readonly<Record<string, FieldUpdate>>): Record<string, EncodedFieldUpdate> {
  const body: Record<string, EncodedFieldUpdate> = {};
  for (const [field, update] of Object.entries(updates)) {
    body[field] = encodeFieldUpdate(update);
  }
  return body;
}

export type PatchBody = Readonly<Record<string, JsonValue>>;

const MUTATING_KEYS = new Set(['add', 'remove', 'replace']);

function isMutatingUpdate(update: FieldUpdate): boolean {
  return MUTATING_KEYS.has(update.kind);
}

/**
 * True when re-sending the body leaves the resource as a single send would:
 * every field is replaced (scalar, `set`, `clear`) rather than mutated
 * relative to its current value (`add`, `remove`, `replace`).
 */
export function isIdempotentPatch(body: PatchBody): boolean {
  return Object.values(body).every((value) => {
    if (value === null || typeof value !== 'object' || Array.isArray(value)) return true;
    const keys = Object.keys(value);
    return !(keys.length === 1 && MUTATING_KEYS.has(keys[0] ?? ''));
  });
}

type StagedValue = { kind: 'update'; update: FieldUpdate } | { kind: 'scalar'; value: ScalarValue };

/**
 * Staged builder for a partial-update body. Each field may be touched once;
 * touching it again is reported by {@link PatchBuilder.build}.
 *
 * @example
 * ```typescript
 * const body = new PatchBuilder()
 *   .set('summary', 'Renamed')
 *   .update('followers', FieldUpdate.add(['user1']))
 *   .build();
 * ```
 */
export class PatchBuilder {
  private readonly staged = new Map<string, StagedValue>();
  private readonly duplicates = new Set<string>();

  update(field: string, update: FieldUpdate): this {
    return this.stage(field, { kind: 'update', update });
  }

  set(field: string, value: ScalarValue): this {
    return this.stage(field, { kind: 'scalar', value });
  }

  get size(): number {
    return this.staged.size;
  }

  /** See {@link isIdempotentPatch}. */
  get idempotent(): boolean {
    for (const staged of this.staged.values()) {
      if (staged.kind === 'update' && isMutatingUpdate(staged.update)) return false;
    }
    return true;
  }

  build(): PatchBody {
    if (this.duplicates.size > 0) {
      throw new ConfigurationError(
        `Fields may be updated only once per patch: ${[...this.duplicates].join(', ')}`,
      );
    }
    const body: Record<string, JsonValue> = {};
    for (const [field, staged] of this.staged) {
      body[field] = staged.kind === 'scalar' ? staged.value : encodeFieldUpdate(staged.update);
    }
    return Object.freeze(body);
  }

  private stage(field: string, value: StagedValue): this {
    if (this.staged.has(field)) {
      this.duplicates.add(field);
    } else {
      this.staged.set(field, value);
    }
    return this;
  }
}
