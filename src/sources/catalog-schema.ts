import { z } from 'zod';

/**
 * Optional scalar card field. Numbers are kept as their decimal text;
 * anything that is not a string or number counts as absent.
 */
const ScalarField = z
    .union([z.string(), z.number()])
    .transform((value) => String(value))
    .optional()
    .catch(undefined);

/**
 * A card object as found in any catalog export. Unknown fields are dropped.
 */
export const RawCardSchema = z.object({
    id: ScalarField,
    name: z.union([z.string(), z.record(z.string(), z.unknown())]).optional().catch(undefined),
    type: ScalarField,
    alignment: ScalarField,
    set: ScalarField,
});

export type RawCard = z.infer<typeof RawCardSchema>;
