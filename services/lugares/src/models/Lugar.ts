/**
 * Lugar (place) model with its images, ratings and lookup links
 */

import { NamedEntity, NamedEntityJSON, decodeNumeric, serializeNamedEntity } from '@geav/shared';

export type Lugar = {
  id: number;
  nomeLocal: string;
  nomeDonoLocal: string;
  telefoneParaContato: number;
  linkGoogleMaps: string;
  linkSite: string;
  enderecoCompleto: string;
  localPublico: boolean;
  valorFixo: number;
  valorIndividual: number;
  userId: number;
  createdAt: Date;
  updatedAt: Date;
  images: LugarImage[];
  tags: NamedEntity[];
  ramos: NamedEntity[];
  averageRating: number;
  ratingCount: number;
};

/** Columns a client writes */
export type LugarFields = Pick<
  Lugar,
  | 'nomeLocal'
  | 'nomeDonoLocal'
  | 'telefoneParaContato'
  | 'linkGoogleMaps'
  | 'linkSite'
  | 'enderecoCompleto'
  | 'localPublico'
  | 'valorFixo'
  | 'valorIndividual'
  | 'userId'
>;

export type NewLugar = LugarFields & Pick<Lugar, 'createdAt' | 'updatedAt'>;

export type LugarImage = {
  id: number;
  lugarId: number;
  imageUrl: string;
  displayOrder: number;
  createdAt: Date;
};

export type LugarRating = {
  id: number;
  lugarId: number;
  userId: number;
  rating: number;
  date: Date;
};

export const MIN_RATING = 1;
export const MAX_RATING = 5;

export function isValidRating(rating: number): boolean {
  return Number.isInteger(rating) && rating >= MIN_RATING && rating <= MAX_RATING;
}

export type LugarRow = {
  id: number;
  nome_local: string;
  nome_dono_local: string | null;
  telefone_para_contato: string | null;
  link_google_maps: string | null;
  link_site: string | null;
  endereco_completo: string | null;
  local_publico: boolean;
  valor_fixo: string;
  valor_individual: string;
  user_id: number;
  created_at: Date;
  updated_at: Date;
  average_rating: string | number | null;
  rating_count: string | number | null;
};

export type LugarImageRow = {
  id: number;
  lugar_id: number;
  image_url: string;
  display_order: number;
  created_at: Date;
};

export type LugarRatingRow = {
  id: number;
  lugar_id: number;
  user_id: number;
  rating: number;
  date: Date;
};

export function toLugar(row: LugarRow): Lugar {
  return {
    id: row.id,
    nomeLocal: row.nome_local,
    nomeDonoLocal: row.nome_dono_local ?? '',
    telefoneParaContato: decodeNumeric(row.telefone_para_contato),
    linkGoogleMaps: row.link_google_maps ?? '',
    linkSite: row.link_site ?? '',
    enderecoCompleto: row.endereco_completo ?? '',
    localPublico: row.local_publico,
    valorFixo: decodeNumeric(row.valor_fixo),
    valorIndividual: decodeNumeric(row.valor_individual),
    userId: row.user_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    images: [],
    tags: [],
    ramos: [],
    averageRating: decodeNumeric(row.average_rating),
    ratingCount: decodeNumeric(row.rating_count),
  };
}

export function toLugarImage(row: LugarImageRow): LugarImage {
  return {
    id: row.id,
    lugarId: row.lugar_id,
    imageUrl: row.image_url,
    displayOrder: row.display_order,
    createdAt: row.created_at,
  };
}

export function toLugarRating(row: LugarRatingRow): LugarRating {
  return {
    id: row.id,
    lugarId: row.lugar_id,
    userId: row.user_id,
    rating: row.rating,
    date: row.date,
  };
}

export type LugarImageJSON = {
  id: number;
  lugar_id: number;
  image_url: string;
  display_order: number;
  created_at: Date;
};

export type LugarRatingJSON = {
  id: number;
  lugar_id: number;
  user_id: number;
  rating: number;
  date: Date;
};

export type LugarJSON = {
  id: number;
  nome_local: string;
  nome_dono_local: string;
  telefone_para_contato: number;
  link_google_maps: string;
  link_site: string;
  endereco_completo: string;
  local_publico: boolean;
  valor_fixo: number;
  valor_individual: number;
  user_id: number;
  created_at: Date;
  updated_at: Date;
  images: LugarImageJSON[];
  tags: NamedEntityJSON[];
  ramos: NamedEntityJSON[];
  average_rating: number;
  rating_count: number;
};

export function serializeLugarImage(image: LugarImage): LugarImageJSON {
  return {
    id: image.id,
    lugar_id: image.lugarId,
    image_url: image.imageUrl,
    display_order: image.displayOrder,
    created_at: image.createdAt,
  };
}

export function serializeLugarRating(rating: LugarRating): LugarRatingJSON {
  return {
    id: rating.id,
    lugar_id: rating.lugarId,
    user_id: rating.userId,
    rating: rating.rating,
    date: rating.date,
  };
}

export function serializeLugar(lugar: Lugar): LugarJSON {
  return {
    id: lugar.id,
    nome_local: lugar.nomeLocal,
    nome_dono_local: lugar.nomeDonoLocal,
    telefone_para_contato: lugar.telefoneParaContato,
    link_google_maps: lugar.linkGoogleMaps,
    link_site: lugar.linkSite,
    endereco_completo: lugar.enderecoCompleto,
    local_publico: lugar.localPublico,
    valor_fixo: lugar.valorFixo,
    valor_individual: lugar.valorIndividual,
    user_id: lugar.userId,
    created_at: lugar.createdAt,
    updated_at: lugar.updatedAt,
    images: lugar.images.map(serializeLugarImage),
    tags: lugar.tags.map(serializeNamedEntity),
    ramos: lugar.ramos.map(serializeNamedEntity),
    average_rating: lugar.averageRating,
    rating_count: lugar.ratingCount,
  };
}
