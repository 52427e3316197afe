import { z } from 'zod';
import { idRefs, integer, text } from '@geav/shared';

export const CancaoPayloadSchema = z.object({
  nome: text(),
  link_youtube: text(),
  letra: text(),
  user_id: integer(),
  tags: idRefs(),
  ramos: idRefs(),
});

export const TagLinkPayloadSchema = z.object({ tag_id: integer() });

export const RamoLinkPayloadSchema = z.object({ ramo_id: integer() });

export type CancaoPayload = z.infer<typeof CancaoPayloadSchema>;
