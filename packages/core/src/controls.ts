// src/controls.ts
// Preset controls for image workflows

import { intensityField } from './fields.js';
import { Control, imageContent, maskContent, maskFromColorContent, maskFromPromptContent, type ControlInit } from './options.js';
import { ControlType } from './types.js';

export type ControlOverrides = Partial<Omit<ControlInit, 'value'>>;

function preset(value: ControlType, defaults: Omit<ControlInit, 'value'>, overrides: ControlOverrides): Control {
  return new Control({ ...defaults, ...overrides, value });
}

/** Required source image for image-to-image workflows. */
export function inputImageControl(overrides: ControlOverrides = {}): Control {
  return preset(
    ControlType.INPUT,
    {
      title: 'Source Image',
      description: 'Provide an input image for Image generation.',
      required: true,
      supported_contents: [imageContent({ required: true })],
    },
    overrides,
  );
}

export function maskImageControl(overrides: ControlOverrides = {}): Control {
  return preset(
    ControlType.MASK,
    {
      title: 'Mask',
      description: 'Define areas to be modified for Image generation.',
      required: true,
      supported_contents: [maskContent(), maskFromPromptContent(), maskFromColorContent()],
    },
    overrides,
  );
}

export function cannyImageControl(overrides: ControlOverrides = {}): Control {
  return preset(
    ControlType.CONTROL_CANNY,
    {
      title: 'Edge Detection',
      description: 'Emphasize edges for sketch-to-image generation.',
      supported_contents: [imageContent({ required: true })],
      advanced_fields: [intensityField()],
    },
    overrides,
  );
}

export function poseImageControl(overrides: ControlOverrides = {}): Control {
  return preset(
    ControlType.CONTROL_POSE,
    {
      title: 'Pose Guide',
      description: 'Specify a pose to be incorporated into the generated image.',
      supported_contents: [imageContent({ required: true })],
      advanced_fields: [intensityField()],
    },
    overrides,
  );
}

export function styleTransferControl(overrides: ControlOverrides = {}): Control {
  return preset(
    ControlType.CONTROL_STYLE_TRANSFER,
    {
      title: 'Style Image',
      description: 'Use an image to influence the style, composition, and colors of the generated result.',
      supported_contents: [imageContent({ required: true })],
      advanced_fields: [intensityField()],
    },
    overrides,
  );
}

export function faceReplacementControl(overrides: ControlOverrides = {}): Control {
  return preset(
    ControlType.CONTROL_FACE_REPLACEMENT,
    {
      title: 'Face Replacement',
      description: 'Replace faces in the generated image.',
      supported_contents: [imageContent({ required: true })],
    },
    overrides,
  );
}
