/**
 * The lookup catalogs this service exposes
 */

import { NamedEntityTable } from '@geav/shared';

export interface CatalogLabels {
  /** Lower-case singular used in messages, e.g. "Invalid ramo ID" */
  entity: string;
  /** Capitalised singular, e.g. "Ramo not found" */
  title: string;
  /** Capitalised plural, e.g. "Ramos listed successfully" */
  titlePlural: string;
  /** Action suffixes, e.g. GetTagLugar / ListTagsLugares */
  action: string;
  actionPlural: string;
}

export interface Catalog {
  table: NamedEntityTable;
  basePath: string;
  labels: CatalogLabels;
}

export const CATALOGS: Catalog[] = [
  {
    table: 'ramos',
    basePath: '/ramos',
    labels: { entity: 'ramo', title: 'Ramo', titlePlural: 'Ramos', action: 'Ramo', actionPlural: 'Ramos' },
  },
  {
    table: 'tags_lugares',
    basePath: '/tags/lugares',
    labels: { entity: 'tag', title: 'Tag', titlePlural: 'Tags', action: 'TagLugar', actionPlural: 'TagsLugares' },
  },
  {
    table: 'tags_cancoes',
    basePath: '/tags/cancoes',
    labels: { entity: 'tag', title: 'Tag', titlePlural: 'Tags', action: 'TagCancao', actionPlural: 'TagsCancoes' },
  },
];
