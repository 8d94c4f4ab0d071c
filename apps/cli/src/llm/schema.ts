// Zod schemas for Ollama and registry payloads
import { z } from 'zod';

// POST /api/generate (stream: false)
export const GenerateResponseSchema = z
  .object({
    model: z.string().optional(),
    response: z.string(),
    done: z.boolean().optional(),
  })
  .passthrough();

export type GenerateResponse = z.infer<typeof GenerateResponseSchema>;

// Error body returned on non-2xx
export const ErrorBodySchema = z.object({
  error: z.string(),
});

const LocalModelSchema = z
  .object({
    name: z.string(),
    model: z.string().optional(),
    size: z.number().optional(),
    modified_at: z.string().optional(),
    details: z
      .object({
        family: z.string().optional(),
        parameter_size: z.string().optional(),
        quantization_level: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

// GET /api/tags
export const TagsResponseSchema = z.object({
  models: z.array(LocalModelSchema).nullable().default([]).transform((models) => models ?? []),
});

// One line of the POST /api/pull stream
export const PullEventSchema = z
  .object({
    status: z.string().optional(),
    digest: z.string().optional(),
    total: z.number().nonnegative().optional(),
    completed: z.number().nonnegative().optional(),
    error: z.string().optional(),
  })
  .passthrough();

// Registry manifest (Docker distribution manifest v2)
const DescriptorSchema = z.object({
  mediaType: z.string().optional(),
  digest: z.string(),
  size: z.number().nonnegative(),
});

export const ManifestSchema = z.object({
  schemaVersion: z.number().optional(),
  config: DescriptorSchema,
  layers: z.array(DescriptorSchema).default([]),
});

export type Manifest = z.infer<typeof ManifestSchema>;

// Model config blob referenced by the manifest
export const ModelConfigBlobSchema = z
  .object({
    model_family: z.string().optional(),
    model_families: z.array(z.string()).nullable().optional(),
    model_type: z.string().optional(),
    file_type: z.string().optional(),
  })
  .passthrough();

// Get validation errors as readable string
export function formatValidationErrors(errors: z.ZodError): string {
  return errors.errors
    .map((e: z.ZodIssue) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
    .join('; ');
}
