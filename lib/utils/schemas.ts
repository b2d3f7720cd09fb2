/**
 * @fileoverview Schemas de validación con Zod para las peticiones de descarga y los ajustes del motor.
 * @module schemas
 */

import path from 'path';
import { z } from 'zod';
import { VALIDATION_ERRORS } from '../constants/errors';
import { isValidUrl } from './validation';

export interface ZodValidationResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

const chunkStateSchema = z
  .object({
    chunkIndex: z
      .number()
      .int(VALIDATION_ERRORS.CHUNK_INDEX_INVALID)
      .min(0, VALIDATION_ERRORS.CHUNK_INDEX_INVALID),
    startByte: z.number().int().min(0),
    endByte: z.number().int().min(0),
    downloadedBytes: z.number().int().min(0),
    tempFile: z
      .string()
      .min(1, VALIDATION_ERRORS.TEMP_FILE_REQUIRED)
      .refine(name => !['.', '..'].includes(path.basename(name)), VALIDATION_ERRORS.TEMP_FILE_INVALID),
  })
  .refine(chunk => chunk.endByte >= chunk.startByte, VALIDATION_ERRORS.CHUNK_RANGE_INVALID)
  .refine(
    chunk => chunk.downloadedBytes <= chunk.endByte - chunk.startByte + 1,
    VALIDATION_ERRORS.CHUNK_BYTES_EXCEEDED
  );

/**
 * Plan reutilizable: índices 0..k-1 en orden, contiguo desde el byte 0 y con un archivo temporal
 * distinto por rango. ChunkStore solo usa el basename, así que la unicidad se comprueba sobre él.
 */
const chunkPlanSchema = z
  .array(chunkStateSchema)
  .refine(chunks => {
    let expectedStart = 0;
    for (let i = 0; i < chunks.length; i++) {
      if (chunks[i].chunkIndex !== i || chunks[i].startByte !== expectedStart) return false;
      expectedStart = chunks[i].endByte + 1;
    }
    return true;
  }, VALIDATION_ERRORS.CHUNK_PLAN_NOT_CONTIGUOUS)
  .refine(
    chunks => new Set(chunks.map(chunk => path.basename(chunk.tempFile))).size === chunks.length,
    VALIDATION_ERRORS.TEMP_FILE_DUPLICATE
  );

const downloadRequestSchema = z.object({
  id: z.string().min(1, VALIDATION_ERRORS.ID_REQUIRED),
  url: z.string().refine(isValidUrl, VALIDATION_ERRORS.URL_INVALID),
  savePath: z.string().min(1, VALIDATION_ERRORS.SAVE_PATH_REQUIRED),
  segments: z.number().int(VALIDATION_ERRORS.SEGMENTS_MUST_BE_INTEGER).optional(),
  chunks: chunkPlanSchema.optional(),
});

const engineSettingsSchema = z.object({
  defaultSegments: z.number().int().min(1).max(8).optional(),
  writeBlockSize: z.number().int().positive().optional(),
  mergeBlockSize: z.number().int().positive().optional(),
  fallbackOnAnyError: z.boolean().optional(),
  tempRoot: z.string().min(1).optional(),
});

export type EngineSettingsInput = z.infer<typeof engineSettingsSchema>;

export function validate<T>(schema: z.ZodSchema<T>, data: unknown): ZodValidationResult<T> {
  try {
    const result = schema.safeParse(data);

    if (result.success) {
      return {
        success: true,
        data: result.data,
      };
    }
    const errorMessages = result.error.issues.map((err: z.ZodIssue) => {
      const pathStr = err.path.length > 0 ? `${err.path.join('.')}: ` : '';
      return `${pathStr}${err.message}`;
    });

    return {
      success: false,
      error: errorMessages.join('; '),
    };
  } catch (error) {
    return {
      success: false,
      error: `${VALIDATION_ERRORS.VALIDATION_ERROR}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
}

export function validateDownloadRequest(
  params: unknown
): ZodValidationResult<z.infer<typeof downloadRequestSchema>> {
  return validate(downloadRequestSchema, params);
}

export function validateChunkState(
  chunk: unknown
): ZodValidationResult<z.infer<typeof chunkStateSchema>> {
  return validate(chunkStateSchema, chunk);
}

export function validateEngineSettings(params: unknown): ZodValidationResult<EngineSettingsInput> {
  return validate(engineSettingsSchema, params);
}

export const schemas = {
  chunkState: chunkStateSchema,
  chunkPlan: chunkPlanSchema,
  downloadRequest: downloadRequestSchema,
  engineSettings: engineSettingsSchema,
};
