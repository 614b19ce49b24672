// src/values.ts
// Per-call values submitted for dynamic_form and controls fields

import { INTENSITY_FIELD_ALIAS, INTENSITY_FIELD_DEFAULT } from './constants.js';
import { ControlNotFoundError } from './errors.js';
import type { Control } from './options.js';
import type { ContentPayload, ContentType } from './types.js';

export type Settings = Readonly<Record<string, unknown>>;

export interface OptionValueInit {
  type: string;
  settings?: Record<string, unknown>;
}

/**
 * A picked option together with the values of its nested fields, keyed by
 * field alias.
 */
export class OptionValue {
  readonly type: string;
  readonly settings: Settings;

  constructor(init: OptionValueInit) {
    this.type = init.type;
    this.settings = Object.freeze({ ...(init.settings ?? {}) });
  }

  getSetting(key: string, fallback?: unknown): unknown {
    return Object.prototype.hasOwnProperty.call(this.settings, key) ? this.settings[key] : fallback;
  }
}

export interface ControlContentValue {
  readonly type: ContentType;
  readonly content: ContentPayload;
}

export interface ControlValueInit extends OptionValueInit {
  contents?: readonly ControlContentValue[];
}

export class ControlValue extends OptionValue {
  readonly contents: readonly ControlContentValue[];

  constructor(init: ControlValueInit) {
    super(init);
    this.contents = Object.freeze((init.contents ?? []).map((entry) => Object.freeze({ ...entry })));
  }

  /** Strength from the `intensity` setting, 1.0 when unset. */
  get influence(): number {
    const value = this.getSetting(INTENSITY_FIELD_ALIAS);
    return typeof value === 'number' ? value : INTENSITY_FIELD_DEFAULT;
  }

  getContent(type: ContentType): ContentPayload | undefined {
    return this.contents.find((entry) => entry.type === type)?.content;
  }

  hasContent(type: ContentType): boolean {
    return this.contents.some((entry) => entry.type === type);
  }
}

/**
 * First submitted value for `control`.
 *
 * @throws ControlNotFoundError when the caller did not submit one
 */
export function nextControl(values: readonly ControlValue[], control: Control): ControlValue {
  const value = values.find((candidate) => candidate.type === control.value);
  if (!value) {
    const available = values.map((candidate) => candidate.type).join(', ') || 'none';
    throw new ControlNotFoundError(
      `${control.title} (${control.value}) control is required. Available controls: ${available}`,
    );
  }
  return value;
}
