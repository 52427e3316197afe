/**
 * Lookup entities that carry only a name: place tags, song tags and scout branches (ramos)
 */

export type NamedEntity = {
  id: number;
  name: string;
  createdAt: Date;
};

export type NamedEntityRow = {
  id: number;
  name: string;
  created_at: Date;
};

export type NamedEntityJSON = {
  id: number;
  name: string;
  created_at: Date;
};

export function toNamedEntity(row: NamedEntityRow): NamedEntity {
  return {
    id: row.id,
    name: row.name,
    createdAt: row.created_at,
  };
}

export function serializeNamedEntity(entity: NamedEntity): NamedEntityJSON {
  return {
    id: entity.id,
    name: entity.name,
    created_at: entity.createdAt,
  };
}
