/**
 * Cancao (song) model with its tag and ramo links
 */

import { NamedEntity, NamedEntityJSON, serializeNamedEntity } from '@geav/shared';

export type Cancao = {
  id: number;
  nome: string;
  linkYoutube: string;
  letra: string;
  userId: number;
  createdAt: Date;
  updatedAt: Date;
  tags: NamedEntity[];
  ramos: NamedEntity[];
};

export type CancaoFields = Pick<Cancao, 'nome' | 'linkYoutube' | 'letra' | 'userId'>;

export type NewCancao = CancaoFields & Pick<Cancao, 'createdAt' | 'updatedAt'>;

export type CancaoRow = {
  id: number;
  nome: string;
  link_youtube: string | null;
  letra: string | null;
  user_id: number;
  created_at: Date;
  updated_at: Date;
};

export type CancaoJSON = {
  id: number;
  nome: string;
  link_youtube: string;
  letra: string;
  user_id: number;
  created_at: Date;
  updated_at: Date;
  tags: NamedEntityJSON[];
  ramos: NamedEntityJSON[];
};

export function toCancao(row: CancaoRow): Cancao {
  return {
    id: row.id,
    nome: row.nome,
    linkYoutube: row.link_youtube ?? '',
    letra: row.letra ?? '',
    userId: row.user_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    tags: [],
    ramos: [],
  };
}

export function serializeCancao(cancao: Cancao): CancaoJSON {
  return {
    id: cancao.id,
    nome: cancao.nome,
    link_youtube: cancao.linkYoutube,
    letra: cancao.letra,
    user_id: cancao.userId,
    created_at: cancao.createdAt,
    updated_at: cancao.updatedAt,
    tags: cancao.tags.map(serializeNamedEntity),
    ramos: cancao.ramos.map(serializeNamedEntity),
  };
}
