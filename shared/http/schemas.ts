/**
 * Field schemas for request bodies. Absent and null fields read as the type's zero value,
 * so presence checks happen in the handlers.
 */

import { z } from 'zod';

export const text = () => z.string().nullish().transform((value) => value ?? '');

export const integer = () => z.number().int().nullish().transform((value) => value ?? 0);

export const decimal = () => z.number().finite().nullish().transform((value) => value ?? 0);

export const flag = () => z.boolean().nullish().transform((value) => value ?? false);

export const IdRefSchema = z.object({ id: integer() });

export const idRefs = () => z.array(IdRefSchema).nullish().transform((value) => value ?? []);
