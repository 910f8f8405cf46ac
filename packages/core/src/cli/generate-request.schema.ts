import { z } from 'zod';
import { DEVICE_CLASSES } from '@persona-forge/shared';

const titleCase = (value: string) => value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();

const catalogKey = z.string().trim().toLowerCase().min(1);

/**
 * Command-line request after flags, prompt answers and environment defaults are merged.
 */
export const GenerateRequestSchema = z.object({
    count: z.coerce.number({ invalid_type_error: 'Expected a number' }).int().min(1, 'Must be at least 1'),
    seed: z.coerce.number().int().refine(Number.isSafeInteger, 'Must be a safe integer').optional(),
    device: z.string().trim().transform(titleCase).pipe(z.enum(DEVICE_CLASSES)).optional(),
    browser: catalogKey.optional(),
    os: catalogKey.optional(),
    locale: z.string().trim().min(1),
    out: z.string().trim().min(1),
    financial: z.boolean(),
    professional: z.boolean()
});

export type GenerateRequest = z.infer<typeof GenerateRequestSchema>;
