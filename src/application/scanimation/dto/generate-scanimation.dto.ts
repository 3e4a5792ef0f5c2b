import path from 'node:path';

import { z } from 'zod';

import {
  POST_PASS_MODES,
  RESIZE_STRATEGIES,
  STRIPE_DIRECTIONS,
} from '../../../domain/scanimation/index.js';

export const DEFAULT_FRAME_EXTENSIONS = ['png', 'jpg', 'jpeg', 'webp', 'bmp', 'gif'] as const;

export const DEFAULT_BASE_OUTPUT = 'scanimation_base.png';

const BASE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg', '.webp']);
const MASK_EXTENSIONS = new Set(['.png', '.webp']);

export const frameSourceSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('directory'),
    path: z.string().min(1).default('.'),
    recursive: z.boolean().default(false),
    extensions: z.array(z.string().min(1)).min(1).default([...DEFAULT_FRAME_EXTENSIONS]),
  }),
  z.object({
    type: z.literal('animatedGif'),
    path: z.string().min(1),
  }),
]);

export const scanimationOptionsSchema = z.object({
  sliceSize: z.number().int().positive().default(1),
  direction: z.enum(STRIPE_DIRECTIONS).default('vertical'),
  resize: z.enum(RESIZE_STRATEGIES).default('first'),
  postPass: z.enum(POST_PASS_MODES).default('none'),
});

export const outputTargetsSchema = z.object({
  basePath: z
    .string()
    .min(1)
    .refine((value) => BASE_EXTENSIONS.has(path.extname(value).toLowerCase()), {
      message: 'Write the base as .png, .jpg, .jpeg or .webp',
    })
    .default(DEFAULT_BASE_OUTPUT),
  maskPath: z
    .string()
    .min(1)
    .refine((value) => MASK_EXTENSIONS.has(path.extname(value).toLowerCase()), {
      message: 'The mask needs an alpha channel; write it as .png or .webp',
    })
    .optional(),
});

export const generateScanimationCommandSchema = z.object({
  id: z.string().min(1),
  source: frameSourceSchema,
  options: scanimationOptionsSchema.default({}),
  output: outputTargetsSchema.default({}),
});

export type GenerateScanimationInput = z.input<typeof generateScanimationCommandSchema>;

export type GenerateScanimationPayload = z.infer<typeof generateScanimationCommandSchema>;
