// src/constants.ts

/** Largest integer a JavaScript renderer can represent exactly. */
export const MAX_SAFE_INTEGER = Number.MAX_SAFE_INTEGER;

export const MAX_SAFE_DECIMAL = MAX_SAFE_INTEGER * 1.0;

export const PROMPT_FIELD_ALIAS = 'prompt';

export const NEGATIVE_PROMPT_FIELD_ALIAS = 'negative_prompt';

export const CONTROLS_FIELD_ALIAS = 'controls';

export const INTENSITY_FIELD_ALIAS = 'intensity';

export const INTENSITY_FIELD_DEFAULT = 1.0;

export const COLOR_PATTERN = /^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/;
