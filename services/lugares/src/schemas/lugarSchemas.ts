import { z } from 'zod';
import { decimal, flag, idRefs, integer, text } from '@geav/shared';

export const LugarImagePayloadSchema = z.object({
  image_url: text(),
  display_order: integer(),
});

export const LugarPayloadSchema = z.object({
  nome_local: text(),
  nome_dono_local: text(),
  telefone_para_contato: integer(),
  link_google_maps: text(),
  link_site: text(),
  endereco_completo: text(),
  local_publico: flag(),
  valor_fixo: decimal(),
  valor_individual: decimal(),
  user_id: integer(),
  images: z
    .array(LugarImagePayloadSchema)
    .nullish()
    .transform((value) => value ?? []),
  tags: idRefs(),
  ramos: idRefs(),
});

export const TagLinkPayloadSchema = z.object({ tag_id: integer() });

export const RamoLinkPayloadSchema = z.object({ ramo_id: integer() });

export const RatingPayloadSchema = z.object({
  rating: integer(),
  user_id: integer(),
});

export type LugarPayload = z.infer<typeof LugarPayloadSchema>;
export type LugarImagePayload = z.infer<typeof LugarImagePayloadSchema>;
